import { ExifDateTime } from "exiftool-vendored";
import { describe, expect, test } from "vitest";

import { getTime } from "@/services/ExifService/ExifDateTimeHelper";

describe("getTime", () => {
  test("帶時區的 ExifDateTime 轉為 UTC，並保留拍攝地的日期時間", () => {
    const time = ExifDateTime.fromEXIF("2025:07:23 18:26:02+08:00");
    expect(getTime(time)).toEqual({
      time: new Date("2025-07-23T10:26:02.000Z"),
      wallClock: new Date(2025, 6, 23, 18, 26, 2),
    });
  });

  test("exif 格式字串視為本地時間", () => {
    const local = new Date(2023, 4, 1, 10, 0, 0);
    expect(getTime("2023:05:01 10:00:00")).toEqual({
      time: local,
      wallClock: local,
    });
  });

  test.each([undefined, 42, "", "0000:00:00 00:00:00", "not a date"])(
    "無法解析的值 %j 回傳 undefined",
    (value) => {
      expect(getTime(value)).toBeUndefined();
    }
  );
});
