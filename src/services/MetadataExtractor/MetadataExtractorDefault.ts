import { stat } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { ExifService, ReadError } from "@/services/ExifService";
import type { CaptureTime, MediaFile } from "@/types";

import type { ExtractError, MetadataExtractor } from "./MetadataExtractor";

export class MetadataExtractorDefault implements MetadataExtractor {
  private readonly exifService: ExifService;
  private readonly mtimeFallback: boolean;
  private readonly logger: Logger;

  constructor(deps: {
    exifService: ExifService;
    logger: Logger;
    /** 沒有內嵌時間時是否採用修改時間，預設 true */
    mtimeFallback?: boolean;
  }) {
    this.exifService = deps.exifService;
    this.mtimeFallback = deps.mtimeFallback ?? true;
    this.logger = deps.logger.extend("MetadataExtractor");
  }

  async extract(filePath: string): Promise<Result<MediaFile, ExtractError>> {
    const fullPath = path.resolve(filePath);
    let size: number;
    let mtime: Date;
    try {
      const stats = await stat(fullPath);
      size = stats.size;
      mtime = stats.mtime;
    } catch (e) {
      return err({
        type: "STAT_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }

    const fileName = path.basename(fullPath);
    return ok({
      path: fullPath,
      fileName,
      extension: path.extname(fileName).toLowerCase(),
      size,
      captureTime: await this.resolveCaptureTime(fullPath, mtime),
    });
  }

  private async resolveCaptureTime(
    fullPath: string,
    mtime: Date
  ): Promise<CaptureTime> {
    const exif = await this.exifService.readExif(fullPath).catch(
      (e: unknown): Result<never, ReadError> =>
        err({
          type: "READ_FAILED",
          message: e instanceof Error ? e.message : String(e),
        })
    );
    if (isErr(exif)) {
      this.logger.debug({
        event: "exif-unavailable",
        file: fullPath,
        reason: exif.error.type,
      })`${fullPath} 無法讀取內嵌時間：${exif.error.message}`;
    } else {
      const { captureTime, captureWallClock, captureTag } = exif.value;
      if (captureTime && !Number.isNaN(captureTime.getTime())) {
        this.logger.debug({
          event: "capture-time",
          file: fullPath,
          tag: captureTag,
        })`${fullPath} 拍攝時間取自 ${captureTag ?? "metadata"}`;
        return {
          kind: "known",
          time: captureTime,
          wallClock: captureWallClock ?? captureTime,
          source: "metadata",
        };
      }
    }

    if (this.mtimeFallback && !Number.isNaN(mtime.getTime())) {
      return { kind: "known", time: mtime, wallClock: mtime, source: "mtime" };
    }
    return { kind: "unknown" };
  }
}
