import { LoggerConsole, defaultEmojiMap, logLevels } from "~shared/Logger";

/** 測試用 logger，預設只輸出 warn 以上；TEST_LOG_LEVEL 可調整 */
export function buildTestLogger(): LoggerConsole {
  const level =
    logLevels.find((l) => l === process.env.TEST_LOG_LEVEL) ?? "warn";
  return new LoggerConsole(level, ["test"], {}, defaultEmojiMap);
}
