import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  private sequence = 0;

  constructor(
    private readonly logger: Logger,
    private readonly dir = process.env.REPORT_DIR || "dist/reports"
  ) {}

  async dump(name: string, data: unknown): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    this.sequence++;
    const fileName = `${format(new Date(), "yyyyMMdd-HHmmss")}-${String(
      this.sequence
    ).padStart(2, "0")}-${sanitize(name)}.json`;
    const filePath = path.join(this.dir, fileName);
    await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
    this.logger.info({
      event: "dump",
      emoji: "📝",
      file: filePath,
    })`報告已輸出：${filePath}`;
    return filePath;
  }
}

function sanitize(name: string) {
  return name.replace(/[\\/:*?"<>|\s]+/g, "_");
}
