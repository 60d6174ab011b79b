import type { PathLike } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { beforeAll, describe, expect, test, vi } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";
import { buildTestLogger } from "~shared/testkit/TestLogger";

import { OrganizerEngineDefault } from "@/services/OrganizerEngine";
import { TransferExecutorFs } from "@/services/TransferExecutor";
import { exists } from "@/utils/helper";
import { ExifServiceFake } from "~test/fakes/ExifServiceFake";
import { freshDir, listFiles, place } from "~test/utils/fsHelper";

const fsControl = vi.hoisted(() => ({
  /** stat 看不到的路徑，模擬檢查之後才出現的檔案 */
  hidden: new Set<string>(),
}));

// bad.jpg 在 20ms 後複製失敗；good.jpg 延遲 150ms 才複製
vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  const { basename } = await import("node:path");
  const { setTimeout: delay } = await import("node:timers/promises");
  return {
    ...actual,
    copyFile: async (src: PathLike, dest: PathLike, mode?: number) => {
      const name = basename(String(src));
      if (name === "bad.jpg") {
        await delay(20);
        throw Object.assign(new Error("EIO: i/o error, copyfile"), {
          code: "EIO",
        });
      }
      if (name === "good.jpg") await delay(150);
      return actual.copyFile(src, dest, mode);
    },
    stat: async (p: PathLike) => {
      if (fsControl.hidden.has(String(p))) {
        throw Object.assign(new Error("ENOENT: no such file or directory"), {
          code: "ENOENT",
        });
      }
      return actual.stat(p);
    },
  };
});

const may1 = new Date(2023, 4, 1, 10, 0, 0);

let tmpDir: string;

describe("TransferExecutorFs 並行", () => {
  beforeAll(async () => {
    tmpDir = await freshDir("transfer-concurrent");
  });

  test("失敗的複製不會刪掉其他檔案正在使用的新資料夾", async () => {
    const executor = new TransferExecutorFs({ logger: buildTestLogger() });
    const bad = await place(join(tmpDir, "a", "bad.jpg"), 5, may1);
    const good = await place(join(tmpDir, "a", "good.jpg"), 6, may1);
    const dir = join(tmpDir, "a-out", "2023", "05", "01");

    const [badResult, goodResult] = await Promise.all([
      executor.transfer(bad, join(dir, "bad.jpg"), "copy"),
      executor.transfer(good, join(dir, "good.jpg"), "copy"),
    ]);
    expectErr(badResult);
    expect(badResult.error.type).toBe("COPY_FAILED");
    expectOk(goodResult);
    expect(await listFiles(join(tmpDir, "a-out"))).toEqual([
      "2023/05/01/good.jpg",
    ]);
  });

  test("整理時一個檔案失敗不影響同資料夾的其他檔案", async () => {
    const src = join(tmpDir, "b", "src");
    const dest = join(tmpDir, "b", "dest");
    await place(join(src, "bad.jpg"), 5, may1);
    await place(join(src, "good.jpg"), 6, may1);

    const engine = new OrganizerEngineDefault({
      exifService: new ExifServiceFake(),
      logger: buildTestLogger(),
    });
    const result = await engine.organize({
      source: src,
      target: dest,
      concurrency: 2,
    });
    expectOk(result);
    expect(result.value.statistics.errors).toBe(1);
    expect(result.value.statistics.organized).toBe(1);
    expect(await listFiles(dest)).toEqual(["2023/05/01/good.jpg"]);
  });

  test("單獨失敗時會清除本次建立的空資料夾", async () => {
    const executor = new TransferExecutorFs({ logger: buildTestLogger() });
    const bad = await place(join(tmpDir, "c", "bad.jpg"), 5, may1);

    const result = await executor.transfer(
      bad,
      join(tmpDir, "c-out", "2023", "bad.jpg"),
      "copy"
    );
    expectErr(result);
    expect(await exists(join(tmpDir, "c-out"))).toBe(false);
  });

  test("搬移時不會覆蓋檢查之後才出現的目標", async () => {
    const executor = new TransferExecutorFs({ logger: buildTestLogger() });
    const source = await place(join(tmpDir, "d", "photo.jpg"), 5, may1);
    const target = join(tmpDir, "d", "taken.jpg");
    await writeFile(target, "other");
    fsControl.hidden.add(target);

    const result = await executor.transfer(source, target, "move");
    expectErr(result);
    expect(result.error.type).toBe("TARGET_EXISTS");
    expect(await readFile(target, "utf8")).toBe("other");
    expect(await readFile(source, "utf8")).toBe("x".repeat(5));
  });
});
