import { type Static, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { stat } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import {
  defaultConcurrency,
  defaultDateFormat,
  defaultUnknownDateDir,
  mediaExtensions,
} from "@/constants";
import { normalizeExtensions } from "@/services/FileSystemScanner";
import { checkDateFormat } from "@/services/PathPlanner";
import { errorCode, errorMessage } from "@/utils/helper";

export const OrganizeOptionsSchema = t.Object({
  source: t.String({ minLength: 1 }),
  target: t.String({ minLength: 1 }),
  mode: t.Union([t.Literal("copy"), t.Literal("move")], { default: "copy" }),
  dateFormat: t.String({ minLength: 1, default: defaultDateFormat }),
  failFast: t.Boolean({ default: false }),
  extensions: t.Array(t.String({ minLength: 1 }), {
    minItems: 1,
    default: [...mediaExtensions],
  }),
  concurrency: t.Integer({
    minimum: 1,
    maximum: 64,
    default: defaultConcurrency,
  }),
  /** 沒有拍攝時間的檔案放在這個資料夾（單一層） */
  unknownDateDir: t.String({
    minLength: 1,
    pattern: "^[^/\\\\]+$",
    default: defaultUnknownDateDir,
  }),
  mtimeFallback: t.Boolean({ default: true }),
  /** 先登記目標目錄中已有的檔案，重跑時不會重複整理 */
  resume: t.Boolean({ default: true }),
  dryRun: t.Boolean({ default: false }),
});

export type OrganizeOptions = Static<typeof OrganizeOptionsSchema>;

export type OrganizeInput = Pick<OrganizeOptions, "source" | "target"> &
  Partial<Omit<OrganizeOptions, "source" | "target">>;

export type ConfigError = {
  type:
    | "INVALID_OPTIONS"
    | "SOURCE_NOT_FOUND"
    | "SOURCE_NOT_DIRECTORY"
    | "TARGET_NOT_DIRECTORY"
    | "INVALID_DATE_FORMAT";
  message: string;
};

/**
 * 套用預設值並驗證選項。
 * 回傳的 source、target 為絕對路徑，extensions 為小寫含點。
 */
export async function resolveOrganizeOptions(
  input: OrganizeInput
): Promise<Result<OrganizeOptions, ConfigError>> {
  const value = Value.Default(OrganizeOptionsSchema, Value.Clone(input));
  if (!Value.Check(OrganizeOptionsSchema, value)) {
    const issues = [...Value.Errors(OrganizeOptionsSchema, value)].map(
      (e) => `${e.path || "/"} ${e.message}`
    );
    return err({ type: "INVALID_OPTIONS", message: issues.join(", ") });
  }

  if (value.unknownDateDir === "." || value.unknownDateDir === "..") {
    return err({
      type: "INVALID_OPTIONS",
      message: `不合法的資料夾名稱: ${value.unknownDateDir}`,
    });
  }

  const dateFormat = checkDateFormat(value.dateFormat);
  if (!dateFormat.ok) {
    return err({
      type: "INVALID_DATE_FORMAT",
      message: `${value.dateFormat}: ${dateFormat.error}`,
    });
  }

  const source = path.resolve(value.source);
  try {
    const stats = await stat(source);
    if (!stats.isDirectory()) {
      return err({
        type: "SOURCE_NOT_DIRECTORY",
        message: `來源不是資料夾: ${source}`,
      });
    }
  } catch (e) {
    return err({
      type: "SOURCE_NOT_FOUND",
      message:
        errorCode(e) === "ENOENT"
          ? `來源不存在: ${source}`
          : `無法讀取來源 ${source}: ${errorMessage(e)}`,
    });
  }

  const target = path.resolve(value.target);
  try {
    const stats = await stat(target);
    if (!stats.isDirectory()) {
      return err({
        type: "TARGET_NOT_DIRECTORY",
        message: `目標不是資料夾: ${target}`,
      });
    }
  } catch (e) {
    // 目標不存在時會在搬移時建立
    if (errorCode(e) !== "ENOENT") {
      return err({
        type: "TARGET_NOT_DIRECTORY",
        message: `無法讀取目標 ${target}: ${errorMessage(e)}`,
      });
    }
  }

  return ok({
    ...value,
    source,
    target,
    extensions: [...new Set(normalizeExtensions(value.extensions))],
  });
}
