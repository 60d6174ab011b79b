import { Mutex } from "async-mutex";
import { lstat, stat } from "node:fs/promises";
import path from "node:path";
import pLimit from "p-limit";

import type { Logger } from "~shared/Logger";
import { type Result, ok } from "~shared/utils/Result";

import {
  type DuplicateIndex,
  DuplicateIndexMemory,
  toDuplicateKey,
} from "@/services/DuplicateIndex";
import type { ExifService } from "@/services/ExifService";
import {
  type FileSystemScanner,
  FileSystemScannerDefault,
} from "@/services/FileSystemScanner";
import {
  type MetadataExtractor,
  MetadataExtractorDefault,
} from "@/services/MetadataExtractor";
import {
  type DestinationLookup,
  type PathPlanner,
  PathPlannerDefault,
} from "@/services/PathPlanner";
import {
  type TransferExecutor,
  TransferExecutorFs,
} from "@/services/TransferExecutor";
import type { TraversalIssue } from "@/types";
import { errorCode, isWithin } from "@/utils/helper";

import {
  type ConfigError,
  type OrganizeInput,
  type OrganizeOptions,
  resolveOrganizeOptions,
} from "./OrganizeOptions";
import {
  type FileRecord,
  type OrganizeHooks,
  type OrganizeReport,
  type OrganizerEngine,
  type RunStatistics,
  type StopReason,
  emptyStatistics,
} from "./OrganizerEngine";

/** 單次執行共用的狀態 */
type RunContext = {
  options: OrganizeOptions;
  logger: Logger;
  index: DuplicateIndex;
  extractor: MetadataExtractor;
  planner: PathPlanner;
  /** 本次已分配的目標路徑，整個執行期間保留 */
  reserved: Set<string>;
  /** 每個目標資料夾一把鎖，規劃與保留在鎖內完成 */
  locks: Map<string, Mutex>;
};

export class OrganizerEngineDefault implements OrganizerEngine {
  private readonly exifService: ExifService;
  private readonly scanner: FileSystemScanner;
  private readonly transferExecutor: TransferExecutor;
  private readonly logger: Logger;

  constructor(deps: {
    exifService: ExifService;
    logger: Logger;
    scanner?: FileSystemScanner;
    transferExecutor?: TransferExecutor;
  }) {
    this.exifService = deps.exifService;
    this.logger = deps.logger.extend("OrganizerEngine");
    this.scanner = deps.scanner ?? new FileSystemScannerDefault();
    this.transferExecutor =
      deps.transferExecutor ?? new TransferExecutorFs({ logger: deps.logger });
  }

  async organize(
    input: OrganizeInput,
    hooks: OrganizeHooks = {}
  ): Promise<Result<OrganizeReport, ConfigError>> {
    const resolved = await resolveOrganizeOptions(input);
    if (!resolved.ok) return resolved;
    const options = resolved.value;

    const logger = this.logger.append({
      source: options.source,
      target: options.target,
    });
    const ctx: RunContext = {
      options,
      logger,
      index: new DuplicateIndexMemory(),
      extractor: new MetadataExtractorDefault({
        exifService: this.exifService,
        logger,
        mtimeFallback: options.mtimeFallback,
      }),
      planner: new PathPlannerDefault({
        targetRoot: options.target,
        dateFormat: options.dateFormat,
        unknownDateDir: options.unknownDateDir,
      }),
      reserved: new Set(),
      locks: new Map(),
    };

    logger.info({
      event: "start",
      mode: options.mode,
      dryRun: options.dryRun,
    })`開始整理 ${options.source} → ${options.target}`;

    const traversalIssues: TraversalIssue[] = [];
    const sameRoot = options.source === options.target;

    if (options.resume && !sameRoot && (await isDirectory(options.target))) {
      traversalIssues.push(...(await this.seedFromTarget(ctx)));
    }

    const excludeDirs =
      !sameRoot && isWithin(options.source, options.target)
        ? [options.target]
        : [];
    const scan = await this.scanner.scan(options.source, {
      allowExts: options.extensions,
      excludeDirs,
    });
    let files: string[] = [];
    if (scan.ok) {
      files = scan.value.files;
      traversalIssues.push(...scan.value.issues);
    } else {
      traversalIssues.push({
        path: options.source,
        message: scan.error.message,
      });
    }
    for (const issue of traversalIssues) {
      logger.warn({
        event: "traversal-issue",
        path: issue.path,
      })`無法讀取資料夾 ${issue.path}：${issue.message}`;
    }
    logger.info({
      event: "scanned",
      emoji: "🔎",
      count: files.length,
    })`掃描完成，共 ${files.length} 個檔案`;

    const statistics = emptyStatistics();
    statistics.traversalErrors = traversalIssues.length;
    const records: FileRecord[] = [];
    const total = files.length;
    // 由 worker 改寫
    const run: { stopReason?: StopReason } = {};

    const limit = pLimit(options.concurrency);
    await Promise.all(
      files.map((file) =>
        limit(async () => {
          if (run.stopReason) return;
          if (hooks.signal?.aborted) {
            run.stopReason = "cancelled";
            logger.warn({ event: "cancelled" })`已取消，不再處理新的檔案`;
            return;
          }

          const record = await this.processFile(ctx, file);
          records.push(record);
          tally(statistics, record);
          this.logRecord(logger, record);
          hooks.onRecord?.(record, { completed: records.length, total });

          if (
            record.status === "failed" &&
            options.failFast &&
            !run.stopReason
          ) {
            run.stopReason = "fail-fast";
            logger.error({
              event: "fail-fast",
              file: record.source,
            })`發生錯誤，停止處理新的檔案`;
          }
        })
      )
    );

    statistics.unprocessed = total - statistics.processed;
    records.sort((a, b) =>
      a.source < b.source ? -1 : a.source > b.source ? 1 : 0
    );

    logger.info({
      event: "done",
      ...statistics,
      stopReason: run.stopReason,
    })`整理結束：${statistics.organized} 個已${
      options.dryRun ? "規劃" : options.mode === "move" ? "搬移" : "複製"
    }，${statistics.duplicatesSkipped} 個重複，${statistics.errors} 個錯誤`;

    return ok({
      options,
      statistics,
      records,
      traversalIssues,
      ...(run.stopReason ? { stopReason: run.stopReason } : {}),
      dryRun: options.dryRun,
    });
  }

  /** 先登記目標中既有檔案的重複判定鍵 */
  private async seedFromTarget(ctx: RunContext): Promise<TraversalIssue[]> {
    const { options, logger } = ctx;
    const excludeDirs = isWithin(options.target, options.source)
      ? [options.source]
      : [];
    const scan = await this.scanner.scan(options.target, {
      allowExts: options.extensions,
      excludeDirs,
    });
    if (!scan.ok) {
      return [{ path: options.target, message: scan.error.message }];
    }

    const limit = pLimit(options.concurrency);
    await Promise.all(
      scan.value.files.map((file) =>
        limit(async () => {
          const extracted = await ctx.extractor.extract(file);
          if (!extracted.ok) {
            logger.warn({
              event: "seed-failed",
              file,
            })`無法登記既有檔案 ${file}：${extracted.error.message}`;
            return;
          }
          ctx.index.register(toDuplicateKey(extracted.value), {
            path: extracted.value.path,
            origin: "destination",
          });
        })
      )
    );
    logger.info({
      event: "seeded",
      emoji: "📚",
      files: scan.value.files.length,
      keys: ctx.index.size,
    })`已登記目標中既有的 ${scan.value.files.length} 個檔案`;
    return scan.value.issues;
  }

  private async processFile(
    ctx: RunContext,
    filePath: string
  ): Promise<FileRecord> {
    const { options, index, planner } = ctx;

    const extracted = await ctx.extractor.extract(filePath);
    if (!extracted.ok) {
      return {
        status: "failed",
        source: filePath,
        error: { type: "EXTRACTION_FAILED", message: extracted.error.message },
      };
    }
    const file = extracted.value;

    const claim = index.register(toDuplicateKey(file), {
      path: file.path,
      origin: "source",
    });
    if (!claim.accepted) {
      return claim.existing.origin === "destination"
        ? {
            status: "skipped",
            reason: "already-organized",
            source: file.path,
            target: claim.existing.path,
          }
        : {
            status: "skipped",
            reason: "duplicate",
            source: file.path,
            duplicateOf: claim.existing.path,
          };
    }

    const dir = path.join(options.target, planner.directoryFor(file.captureTime));
    const planned = await lockFor(ctx.locks, dir).runExclusive(async () => {
      const res = await planner.plan(
        {
          captureTime: file.captureTime,
          fileName: file.fileName,
          size: file.size,
        },
        lookupWith(ctx.reserved)
      );
      if (res.ok && res.value.kind === "transfer") {
        ctx.reserved.add(res.value.targetPath);
      }
      return res;
    });

    if (!planned.ok) {
      return {
        status: "failed",
        source: file.path,
        error: planned.error,
      };
    }
    if (planned.value.kind === "already-organized") {
      return {
        status: "skipped",
        reason: "already-organized",
        source: file.path,
        target: planned.value.targetPath,
      };
    }

    const { targetPath, renamed } = planned.value;
    if (options.dryRun) {
      return {
        status: "planned",
        source: file.path,
        target: targetPath,
        renamed,
        captureTime: file.captureTime,
      };
    }

    const transferred = await this.transferExecutor.transfer(
      file.path,
      targetPath,
      options.mode
    );
    if (!transferred.ok) {
      return {
        status: "failed",
        source: file.path,
        error: {
          type: "TRANSFER_FAILED",
          message: `${transferred.error.type}: ${transferred.error.message}`,
        },
      };
    }
    return {
      status: "transferred",
      source: file.path,
      target: targetPath,
      mode: options.mode,
      renamed,
      captureTime: file.captureTime,
    };
  }

  private logRecord(logger: Logger, record: FileRecord) {
    switch (record.status) {
      case "transferred":
      case "planned":
        logger.debug({
          event: record.status,
          file: record.source,
          target: record.target,
          renamed: record.renamed,
        })`${record.source} → ${record.target}`;
        return;
      case "skipped":
        logger.debug({
          event: record.reason,
          file: record.source,
        })`略過 ${record.source}`;
        return;
      case "failed":
        logger.warn({
          event: "file-failed",
          file: record.source,
          type: record.error.type,
        })`${record.source} 處理失敗：${record.error.message}`;
        return;
    }
  }
}

function tally(statistics: RunStatistics, record: FileRecord) {
  statistics.processed++;
  switch (record.status) {
    case "transferred":
    case "planned":
      statistics.organized++;
      if (record.renamed) statistics.renamed++;
      if (record.captureTime.kind === "unknown") statistics.unknownDate++;
      return;
    case "skipped":
      if (record.reason === "duplicate") statistics.duplicatesSkipped++;
      else statistics.alreadyOrganized++;
      return;
    case "failed":
      statistics.errors++;
      return;
  }
}

function lockFor(locks: Map<string, Mutex>, dir: string) {
  let lock = locks.get(dir);
  if (!lock) {
    lock = new Mutex();
    locks.set(dir, lock);
  }
  return lock;
}

/** 每次都重新 lstat，本次已保留的路徑視為被占用 */
function lookupWith(reserved: ReadonlySet<string>): DestinationLookup {
  return async (targetPath) => {
    if (reserved.has(targetPath)) return { kind: "reserved" };
    try {
      const stats = await lstat(targetPath);
      return { kind: "occupied", size: stats.size, isFile: stats.isFile() };
    } catch (e) {
      if (errorCode(e) === "ENOENT") return { kind: "free" };
      throw e;
    }
  };
}

async function isDirectory(p: string) {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}
