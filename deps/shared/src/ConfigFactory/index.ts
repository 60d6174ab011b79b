import {
  type Static,
  type TBoolean,
  type TObject,
  Type as t,
} from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class ConfigFactoryError extends Error {
  constructor(
    message: string,
    readonly issues: Array<{ path: string; message: string }>
  ) {
    super(message);
    this.name = "ConfigFactoryError";
  }
}

/** 環境變數中的布林值，接受 true/false/1/0 */
export function envBoolean(): TBoolean {
  return t.Boolean();
}

/**
 * 以 TypeBox schema 驗證環境變數，回傳讀取函式。
 * 每次呼叫都重新讀取，測試中可直接改寫 env。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  env: NodeJS.ProcessEnv = process.env
): () => Static<T> {
  return () => {
    const picked: Record<string, unknown> = {};
    for (const key of Object.keys(schema.properties)) {
      const raw = env[key];
      if (raw !== undefined && raw !== "") picked[key] = raw;
    }
    const value = Value.Default(schema, Value.Convert(schema, picked));
    if (Value.Check(schema, value)) return value;

    const issues = [...Value.Errors(schema, value)].map((e) => ({
      path: e.path,
      message: e.message,
    }));
    throw new ConfigFactoryError(
      `環境變數設定錯誤: ${issues.map((i) => `${i.path} ${i.message}`).join(", ")}`,
      issues
    );
  };
}
