import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { mediaExtensions } from "@/constants";
import type { ExifService } from "@/services/ExifService";
import {
  type OrganizeInput,
  OrganizerEngineDefault,
} from "@/services/OrganizerEngine";
import { confirm, expandHome } from "@/utils/helper";

type OrganizeCliOptions = {
  target?: string;
  move?: boolean;
  format?: string;
  exts?: string;
  concurrency?: number | string;
  failFast?: boolean;
  resume?: boolean;
  mtimeFallback?: boolean;
  unknownDir?: string;
  dryRun?: boolean;
  yes?: boolean;
};

export function registerOrganize(
  cli: CAC,
  baseLogger: Logger,
  deps: { exifService: ExifService; signal?: AbortSignal }
) {
  cli
    .command(
      "organize <source>",
      "依拍攝日期將照片與影片整理到目標目錄，並略過重複檔"
    )
    .option("--target <path>", "目標目錄（必填）")
    .option("--move", "搬移而非複製", { default: false })
    .option("--format <pattern>", "date-fns 資料夾格式，預設 yyyy/MM/dd")
    .option(
      "--exts <list>",
      `處理的副檔名，逗號分隔，預設 ${mediaExtensions.join(",")}`
    )
    .option("--concurrency <n>", "同時處理的檔案數，預設 4")
    .option("--fail-fast", "第一個錯誤後停止處理新的檔案", { default: false })
    .option("--no-resume", "不先登記目標目錄中已有的檔案")
    .option("--no-mtime-fallback", "沒有內嵌時間時不使用修改時間")
    .option("--unknown-dir <name>", "未知日期的資料夾名稱，預設 unknown-date")
    .option("--dry-run", "只規劃，不寫入任何檔案", { default: false })
    .option("--yes", "略過確認，直接執行搬移", { default: false })
    .action(async (source: string, options: OrganizeCliOptions) => {
      const logger = baseLogger.extend("organize", { emoji: "📦" });

      if (!options.target) {
        logger.error("請以 --target 指定目標目錄");
        process.exitCode = 1;
        return;
      }

      const input: OrganizeInput = {
        source: expandHome(source),
        target: expandHome(options.target),
        mode: options.move ? "move" : "copy",
        dateFormat: options.format,
        failFast: options.failFast,
        extensions: options.exts
          ?.split(",")
          .map((e) => e.trim())
          .filter((e) => e.length > 0),
        concurrency:
          options.concurrency === undefined
            ? undefined
            : Number(options.concurrency),
        unknownDateDir: options.unknownDir,
        mtimeFallback: options.mtimeFallback,
        resume: options.resume,
        dryRun: options.dryRun,
      };

      if (input.mode === "move" && !input.dryRun && !options.yes) {
        const proceed = await confirm(
          `即將把 ${input.source} 中的檔案搬移到 ${input.target}，是否繼續？ [y/N] `
        );
        if (!proceed) {
          logger.warn({ emoji: "⏹️" })`使用者取消`;
          return;
        }
      }

      const engine = new OrganizerEngineDefault({
        exifService: deps.exifService,
        logger,
      });
      let lastLogged = 0;
      const result = await engine.organize(input, {
        signal: deps.signal,
        onRecord: (_record, { completed, total }) => {
          const now = Date.now();
          if (completed < total && now - lastLogged < 1000) return;
          lastLogged = now;
          logger.info({ event: "progress", emoji: "⏳" })`${completed}/${total}`;
        },
      });

      if (isErr(result)) {
        logger.error({
          event: "config",
          error: result.error,
        })`選項錯誤：${result.error.message}`;
        process.exitCode = 1;
        return;
      }

      const report = result.value;
      const reporter = new DumpWriterDefault(logger);
      await reporter.dump(report.dryRun ? "organize-plan" : "organize", report);

      const { statistics } = report;
      logger.info({
        event: "done",
        ...statistics,
      })`處理 ${statistics.processed}，整理 ${statistics.organized}，重複 ${statistics.duplicatesSkipped}，已整理 ${statistics.alreadyOrganized}，錯誤 ${statistics.errors}`;

      if (report.stopReason) {
        logger.warn({
          event: report.stopReason,
          unprocessed: statistics.unprocessed,
        })`提前結束，尚有 ${statistics.unprocessed} 個檔案未處理`;
      }
      if (statistics.errors > 0) process.exitCode = 1;
    });
}
