import { mkdirSync } from "node:fs";
import { finished } from "node:stream/promises";
import {
  type Options,
  type RotatingFileStream,
  createStream,
} from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

export type RfsTransportOptions = {
  filename: string;
  rfs?: Options;
};

/** 以 JSON lines 寫入可輪替的檔案 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: RfsTransportOptions) {
    if (options.rfs?.path) mkdirSync(options.rfs.path, { recursive: true });
    this.stream = createStream(options.filename, options.rfs ?? {});
  }

  write(record: LogRecord) {
    this.stream.write(JSON.stringify(record) + "\n");
  }

  async [Symbol.asyncDispose]() {
    this.stream.end();
    await finished(this.stream);
  }
}
