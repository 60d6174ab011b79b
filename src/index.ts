import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { registerOrganize } from "./app/Organize";
import { ExifServiceExifTool } from "./services/ExifService";

const logger = createDefaultLoggerFromEnv();
const exifService = new ExifServiceExifTool();
const abort = new AbortController();

process.once("SIGINT", () => {
  logger.warn({ emoji: "🛑" })`收到中斷訊號，等待進行中的檔案完成`;
  abort.abort();
});

const cli = cac("media-organizer");

registerOrganize(cli, logger, { exifService, signal: abort.signal });

cli.help();
cli.parse(process.argv, { run: false });

try {
  if (!cli.matchedCommand) {
    cli.outputHelp();
  } else {
    await cli.runMatchedCommand();
  }
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exitCode = 1;
} finally {
  await dispose(exifService, logger);
}
