export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export const logLevels: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
];

export interface LogContext {
  /** 事件名稱，會接在 namespace 之後輸出 */
  event?: string;
  /** 覆寫本次輸出的 emoji */
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
}

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
};

export interface LogRecord {
  time: string;
  level: LogLevel;
  path: string[];
  event?: string;
  msg: string;
  ctx: Record<string, unknown>;
  err?: SerializedError;
}

export interface LogTransport extends AsyncDisposable {
  write(record: LogRecord): void;
}

export type LogTemplate = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (message: string): void;
  (context: LogContext, message: string): void;
  (context?: LogContext): LogTemplate;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** 建立子 logger，namespace 以 `:` 串接 */
  extend(name: string, context?: LogContext): Logger;
  /** 只合併 context，不改變 namespace */
  append(context: LogContext): Logger;
  attachTransport(transport: LogTransport): void;
}
