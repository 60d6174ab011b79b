import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

import type { Logger } from "./Logger";
import { type EmojiMap, LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export { LoggerConsole, serializeError, type EmojiMap } from "./LoggerConsole";
export { RfsTransport, type RfsTransportOptions } from "./RfsTransport";

export const defaultEmojiMap: EmojiMap = {
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
  start: "🏁",
  done: "✅",
};

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Optional(
      t.Union([
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
      ])
    ),
    LOG_FILE: t.Optional(t.String()),
    LOG_DIR: t.Optional(t.String()),
  })
);

/**
 * 依環境變數建立 logger：
 * - LOG_LEVEL 預設 info
 * - 設定 LOG_FILE 時另外寫入 LOG_DIR（預設 logs）下的輪替檔
 */
export function createDefaultLoggerFromEnv(): Logger & AsyncDisposable {
  const { LOG_LEVEL, LOG_FILE, LOG_DIR } = getLoggerConfig();
  const logger = new LoggerConsole(LOG_LEVEL ?? "info", [], {}, defaultEmojiMap);
  if (LOG_FILE) {
    logger.attachTransport(
      new RfsTransport({
        filename: LOG_FILE,
        rfs: { path: LOG_DIR ?? "logs", size: "10M", maxFiles: 5 },
      })
    );
  }
  return logger;
}
