import { describe, expect, test } from "vitest";

import {
  DuplicateIndexMemory,
  toDuplicateKey,
} from "@/services/DuplicateIndex";
import type { MediaFile } from "@/types";

function mediaFile(
  path: string,
  size: number,
  time: Date | undefined
): MediaFile {
  return {
    path,
    fileName: path.split("/").pop() ?? path,
    extension: ".jpg",
    size,
    captureTime: time
      ? { kind: "known", time, wallClock: time, source: "metadata" }
      : { kind: "unknown" },
  };
}

describe("toDuplicateKey", () => {
  test("拍攝時間截斷到整秒", () => {
    const a = toDuplicateKey(
      mediaFile("/a.jpg", 10, new Date("2023-05-01T10:00:00.100Z"))
    );
    const b = toDuplicateKey(
      mediaFile("/b.jpg", 10, new Date("2023-05-01T10:00:00.900Z"))
    );
    expect(a).toEqual({ kind: "known", epochSecond: 1682935200, size: 10 });
    expect(b).toEqual(a);
  });

  test("未知時間產生 unknown 鍵", () => {
    expect(toDuplicateKey(mediaFile("/a.jpg", 10, undefined))).toEqual({
      kind: "unknown",
      size: 10,
    });
  });
});

describe("DuplicateIndexMemory", () => {
  const key = { kind: "known", epochSecond: 100, size: 5 } as const;

  test("第一次登記接受，之後回傳第一個登記者", () => {
    const index = new DuplicateIndexMemory();
    expect(index.register(key, { path: "/a.jpg", origin: "source" })).toEqual(
      { accepted: true }
    );
    expect(index.register(key, { path: "/b.jpg", origin: "source" })).toEqual(
      { accepted: false, existing: { path: "/a.jpg", origin: "source" } }
    );
    expect(index.size).toBe(1);
  });

  test("時間相同但大小不同不算重複", () => {
    const index = new DuplicateIndexMemory();
    index.register(key, { path: "/a.jpg", origin: "destination" });
    const other = { kind: "known", epochSecond: 100, size: 6 } as const;
    expect(index.register(other, { path: "/b.jpg", origin: "source" })).toEqual(
      { accepted: true }
    );
    expect(index.size).toBe(2);
  });

  test("unknown 鍵一律接受且不登記", () => {
    const index = new DuplicateIndexMemory();
    const unknown = { kind: "unknown", size: 5 } as const;
    expect(index.register(unknown, { path: "/a.jpg", origin: "source" })).toEqual(
      { accepted: true }
    );
    expect(index.register(unknown, { path: "/b.jpg", origin: "source" })).toEqual(
      { accepted: true }
    );
    expect(index.size).toBe(0);
  });
});
