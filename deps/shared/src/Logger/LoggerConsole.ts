import kleur from "kleur";

import type {
  LogContext,
  LogLevel,
  LogRecord,
  LogTemplate,
  LogTransport,
  Logger,
  SerializedError,
} from "./Logger";

const levelOrder: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

const reservedKeys = new Set(["event", "emoji", "error"]);

export type EmojiMap = Record<string, string>;

export class LoggerConsole implements Logger, AsyncDisposable {
  constructor(
    private readonly level: LogLevel,
    private readonly path: string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = {},
    private readonly transports: LogTransport[] = []
  ) {}

  trace(message: string): void;
  trace(context: LogContext, message: string): void;
  trace(context?: LogContext): LogTemplate;
  trace(contextOrMessage?: LogContext | string, message?: string) {
    return this.log("trace", this.trace, contextOrMessage, message);
  }

  debug(message: string): void;
  debug(context: LogContext, message: string): void;
  debug(context?: LogContext): LogTemplate;
  debug(contextOrMessage?: LogContext | string, message?: string) {
    return this.log("debug", this.debug, contextOrMessage, message);
  }

  info(message: string): void;
  info(context: LogContext, message: string): void;
  info(context?: LogContext): LogTemplate;
  info(contextOrMessage?: LogContext | string, message?: string) {
    return this.log("info", this.info, contextOrMessage, message);
  }

  warn(message: string): void;
  warn(context: LogContext, message: string): void;
  warn(context?: LogContext): LogTemplate;
  warn(contextOrMessage?: LogContext | string, message?: string) {
    return this.log("warn", this.warn, contextOrMessage, message);
  }

  error(message: string): void;
  error(context: LogContext, message: string): void;
  error(context?: LogContext): LogTemplate;
  error(contextOrMessage?: LogContext | string, message?: string) {
    return this.log("error", this.error, contextOrMessage, message);
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  async [Symbol.asyncDispose]() {
    const transports = this.transports.splice(0);
    for (const transport of transports) {
      await transport[Symbol.asyncDispose]();
    }
  }

  private log(
    level: LogLevel,
    caller: Function,
    contextOrMessage: LogContext | string | undefined,
    message: string | undefined
  ): LogTemplate | void {
    if (typeof contextOrMessage === "string") {
      this.write(level, {}, contextOrMessage, contextOrMessage, caller);
      return;
    }
    const context = contextOrMessage ?? {};
    if (message !== undefined) {
      this.write(level, context, message, message, caller);
      return;
    }
    const template: LogTemplate = (strings, ...values) => {
      let plain = strings[0] ?? "";
      let colored = plain;
      const valueContext: Record<string, unknown> = {};
      values.forEach((value, i) => {
        const text = formatValue(value);
        const rest = strings[i + 1] ?? "";
        plain += text + rest;
        colored += kleur.green(text) + rest;
        valueContext[`__${i}`] = value;
      });
      this.write(level, { ...context, ...valueContext }, plain, colored, template);
    };
    return template;
  }

  private write(
    level: LogLevel,
    context: LogContext,
    plain: string,
    colored: string,
    caller: Function
  ) {
    if (levelOrder[level] < levelOrder[this.level]) return;

    const merged: LogContext = { ...this.context, ...context };
    const ctx: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(merged)) {
      if (!reservedKeys.has(key)) ctx[key] = value;
    }

    let error: SerializedError | undefined;
    if (context.error !== undefined) {
      error = serializeError(context.error);
    } else if (level === "error") {
      const trace: { stack?: string } = {};
      Error.captureStackTrace(trace, caller);
      error = {
        name: "Error",
        message: plain,
        stack: `Error: ${plain}${trace.stack?.replace(/^.*\n?/, "\n") ?? ""}`,
      };
    }

    const emoji =
      context.emoji ??
      (context.event ? this.emojiMap[context.event] : undefined) ??
      (level === "warn" || level === "error"
        ? this.emojiMap[level]
        : undefined) ??
      this.context.emoji ??
      this.emojiMap[level];

    const label = [...this.path, context.event ?? level].join(":");
    const json = Object.keys(ctx).length > 0 ? safeStringify(ctx) : "";
    const line = [emoji, `${label}: ${colored}`, json]
      .filter((part) => part)
      .join(" ");

    switch (level) {
      case "trace":
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        if (error?.stack) console.error(kleur.gray(error.stack));
        break;
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path: this.path,
      event: context.event,
      msg: plain,
      ctx,
      err: error,
    };
    for (const transport of this.transports) {
      try {
        transport.write(record);
      } catch (e) {
        console.error(`log transport failed: ${serializeError(e).message}`);
      }
    }
  }
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Date) return value.toISOString();
  if (value !== null && typeof value === "object") return safeStringify(value);
  return String(value);
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) =>
      v instanceof Error ? serializeError(v) : v
    );
  } catch {
    return "[unserializable]";
  }
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  if (typeof error === "object" && error !== null && "message" in error) {
    return { name: "Error", message: String(error.message) };
  }
  return { name: "Error", message: String(error) };
}
