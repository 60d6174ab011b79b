import { join } from "node:path";
import { beforeAll, describe, expect, test } from "vitest";

import { type LogRecord, LoggerConsole } from "~shared/Logger";
import { expectErr, expectOk } from "~shared/testkit/ExpectResult";
import { expectHasSubset } from "~shared/testkit/ExpectSubset";
import { buildTestLogger } from "~shared/testkit/TestLogger";

import { MetadataExtractorDefault } from "@/services/MetadataExtractor";
import { ExifServiceFake } from "~test/fakes/ExifServiceFake";
import { freshDir, place } from "~test/utils/fsHelper";

const mtime = new Date(2022, 0, 2, 12, 0, 0);
const shot = new Date(2020, 6, 8, 9, 30, 15);

let tmpDir: string;

describe("MetadataExtractorDefault", () => {
  beforeAll(async () => {
    tmpDir = await freshDir("extractor");
  });

  test("優先使用內嵌的拍攝時間", async () => {
    const file = await place(join(tmpDir, "IMG_0001.JPG"), 12, mtime);
    const exif = new ExifServiceFake();
    exif.setCaptureTime(file, shot);
    const extractor = new MetadataExtractorDefault({
      exifService: exif,
      logger: buildTestLogger(),
    });

    const result = await extractor.extract(file);
    expectOk(result);
    expect(result.value).toEqual({
      path: file,
      fileName: "IMG_0001.JPG",
      extension: ".jpg",
      size: 12,
      captureTime: {
        kind: "known",
        time: shot,
        wallClock: shot,
        source: "metadata",
      },
    });
  });

  test("記錄拍攝時間取自哪個標籤", async () => {
    const file = await place(join(tmpDir, "MVI_0002.MOV"), 8, mtime);
    const exif = new ExifServiceFake();
    exif.setExif(file, {
      captureTime: shot,
      captureWallClock: shot,
      captureTag: "CreateDate",
    });
    const logger = new LoggerConsole("debug");
    const records: LogRecord[] = [];
    logger.attachTransport({
      write(record) {
        records.push(record);
      },
      async [Symbol.asyncDispose]() {},
    });
    const extractor = new MetadataExtractorDefault({
      exifService: exif,
      logger,
    });

    expectOk(await extractor.extract(file));
    expect(records.filter((r) => r.event === "capture-time")).toMatchObject([
      {
        level: "debug",
        path: ["MetadataExtractor"],
        msg: `${file} 拍攝時間取自 CreateDate`,
        ctx: { file, tag: "CreateDate" },
      },
    ]);
  });

  test("沒有內嵌時間時退回修改時間", async () => {
    const file = await place(join(tmpDir, "clip.mp4"), 3, mtime);
    const extractor = new MetadataExtractorDefault({
      exifService: new ExifServiceFake(),
      logger: buildTestLogger(),
    });

    const result = await extractor.extract(file);
    expectOk(result);
    expectHasSubset(result.value, {
      fileName: "clip.mp4",
      extension: ".mp4",
      size: 3,
    });
    expect(result.value.captureTime).toEqual({
      kind: "known",
      time: mtime,
      wallClock: mtime,
      source: "mtime",
    });
  });

  test("內嵌資料讀取失敗時退回修改時間", async () => {
    const file = await place(join(tmpDir, "corrupt.heic"), 4, mtime);
    const exif = new ExifServiceFake();
    exif.setReadError(file, { type: "READ_FAILED", message: "bad header" });
    const extractor = new MetadataExtractorDefault({
      exifService: exif,
      logger: buildTestLogger(),
    });

    const result = await extractor.extract(file);
    expectOk(result);
    expect(result.value.captureTime).toEqual({
      kind: "known",
      time: mtime,
      wallClock: mtime,
      source: "mtime",
    });
  });

  test("讀取內嵌資料拋錯也只會退回修改時間", async () => {
    const file = await place(join(tmpDir, "broken.jpg"), 3, mtime);
    const exif = new ExifServiceFake();
    exif.setThrow(file, new Error("exiftool crashed"));
    const extractor = new MetadataExtractorDefault({
      exifService: exif,
      logger: buildTestLogger(),
    });

    const result = await extractor.extract(file);
    expectOk(result);
    expect(result.value.captureTime).toEqual({
      kind: "known",
      time: mtime,
      wallClock: mtime,
      source: "mtime",
    });
  });

  test("關閉 mtimeFallback 時為 unknown", async () => {
    const file = await place(join(tmpDir, "scan.png"), 3, mtime);
    const extractor = new MetadataExtractorDefault({
      exifService: new ExifServiceFake(),
      logger: buildTestLogger(),
      mtimeFallback: false,
    });

    const result = await extractor.extract(file);
    expectOk(result);
    expect(result.value.captureTime).toEqual({ kind: "unknown" });
  });

  test("無效的內嵌時間視為沒有", async () => {
    const file = await place(join(tmpDir, "bad-date.jpg"), 3, mtime);
    const exif = new ExifServiceFake();
    exif.setCaptureTime(file, new Date(Number.NaN));
    const extractor = new MetadataExtractorDefault({
      exifService: exif,
      logger: buildTestLogger(),
    });

    const result = await extractor.extract(file);
    expectOk(result);
    expect(result.value.captureTime).toEqual({
      kind: "known",
      time: mtime,
      wallClock: mtime,
      source: "mtime",
    });
  });

  test("檔案不存在回傳 STAT_FAILED", async () => {
    const extractor = new MetadataExtractorDefault({
      exifService: new ExifServiceFake(),
      logger: buildTestLogger(),
    });
    const result = await extractor.extract(join(tmpDir, "missing.jpg"));
    expectErr(result);
    expect(result.error.type).toBe("STAT_FAILED");
  });
});
