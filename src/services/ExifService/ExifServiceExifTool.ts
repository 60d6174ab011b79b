import { type ExifTool, exiftool } from "exiftool-vendored";

import { type Result, err, ok } from "~shared/utils/Result";

import { type Exif, type ReadError, captureTags } from "./Exif";
import { getTime } from "./ExifDateTimeHelper";
import type { ExifService } from "./ExifService";

export class ExifServiceExifTool implements ExifService, AsyncDisposable {
  constructor(private readonly tool: ExifTool = exiftool) {}

  async readExif(filePath: string): Promise<Result<Exif, ReadError>> {
    try {
      const tags = await this.tool.read(filePath);
      if (!tags) {
        return err({
          type: "NO_EXIF_DATA",
          message: `無 EXIF 資料: ${filePath}`,
        });
      }

      const exif: Exif = { filePath };
      for (const tag of captureTags) {
        const time = getTime(tags[tag]);
        if (time) {
          exif.captureTime = time.time;
          exif.captureWallClock = time.wallClock;
          exif.captureTag = tag;
          break;
        }
      }
      return ok(exif);
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `讀取 EXIF 失敗: ${filePath}: ${
          e instanceof Error ? e.message : String(e)
        }`,
      });
    }
  }

  async [Symbol.asyncDispose]() {
    await this.tool.end();
  }
}
