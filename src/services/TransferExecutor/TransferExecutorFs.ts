import { Mutex } from "async-mutex";
import type { Stats } from "node:fs";
import {
  constants,
  copyFile,
  link,
  mkdir,
  rmdir,
  stat,
  unlink,
  utimes,
} from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type { TransferMode } from "@/types";
import { errorCode, errorMessage, exists, isWithin } from "@/utils/helper";

import type {
  TransferError,
  TransferExecutor,
  TransferReceipt,
} from "./TransferExecutor";

/** 不支援硬連結或跨裝置時，搬移改走複製 */
const linkUnsupported = new Set([
  "EXDEV",
  "EPERM",
  "ENOTSUP",
  "EOPNOTSUPP",
  "EMLINK",
]);

export class TransferExecutorFs implements TransferExecutor {
  private readonly logger: Logger;
  /** 進行中的搬移，依目標資料夾計數 */
  private readonly activeDirs = new Map<string, number>();
  /** 建立資料夾與清除空資料夾互斥，避免刪掉別人正要寫入的資料夾 */
  private readonly dirLock = new Mutex();

  constructor(deps: { logger: Logger }) {
    this.logger = deps.logger.extend("TransferExecutorFs");
  }

  async transfer(
    source: string,
    target: string,
    mode: TransferMode
  ): Promise<Result<TransferReceipt, TransferError>> {
    const failType = mode === "copy" ? "COPY_FAILED" : "MOVE_FAILED";

    let sourceStats: Stats;
    try {
      sourceStats = await stat(source);
    } catch (e) {
      return err({
        type: failType,
        message: `無法讀取來源 ${source}: ${errorMessage(e)}`,
      });
    }

    // 安全防呆：不覆蓋既有檔案
    if (await exists(target)) {
      return err({ type: "TARGET_EXISTS", message: `目標已存在: ${target}` });
    }

    const dir = path.dirname(target);
    const prepared = await this.dirLock.runExclusive(
      async (): Promise<Result<string | undefined, TransferError>> => {
        try {
          const created = await mkdir(dir, { recursive: true });
          this.activeDirs.set(dir, (this.activeDirs.get(dir) ?? 0) + 1);
          return ok(created);
        } catch (e) {
          return err({
            type: failType,
            message: `無法建立目標資料夾 ${dir}: ${errorMessage(e)}`,
          });
        }
      }
    );
    if (!prepared.ok) return prepared;
    const createdDir = prepared.value;

    const result =
      mode === "copy"
        ? await this.copy(source, target, sourceStats)
        : await this.move(source, target, sourceStats);

    await this.dirLock.runExclusive(async () => {
      const remaining = (this.activeDirs.get(dir) ?? 1) - 1;
      if (remaining > 0) this.activeDirs.set(dir, remaining);
      else this.activeDirs.delete(dir);
      if (!result.ok && createdDir) {
        await this.removeEmptyDirs(dir, createdDir);
      }
    });
    if (!result.ok) return result;

    return ok({
      source,
      target,
      mode,
      method: result.value,
      size: sourceStats.size,
    });
  }

  private async copy(
    source: string,
    target: string,
    sourceStats: Stats
  ): Promise<Result<"copy", TransferError>> {
    try {
      await copyFile(source, target, constants.COPYFILE_EXCL);
    } catch (e) {
      if (errorCode(e) === "EEXIST") {
        return err({ type: "TARGET_EXISTS", message: `目標已存在: ${target}` });
      }
      await this.discard(target);
      return err({
        type: "COPY_FAILED",
        message: `複製 ${source} → ${target} 失敗: ${errorMessage(e)}`,
      });
    }

    try {
      await utimes(target, sourceStats.atime, sourceStats.mtime);
    } catch (e) {
      this.logger.warn({
        event: "utimes-failed",
        target,
        error: e,
      })`無法保留 ${target} 的修改時間`;
    }

    const verified = await this.verifySize(target, sourceStats.size);
    if (!verified.ok) {
      await this.discard(target);
      return verified;
    }
    return ok("copy");
  }

  /** 以硬連結搬移，目標已存在時 link 會失敗，不會覆蓋 */
  private async move(
    source: string,
    target: string,
    sourceStats: Stats
  ): Promise<Result<"link" | "copy-then-delete", TransferError>> {
    try {
      await link(source, target);
    } catch (e) {
      const code = errorCode(e);
      if (code === "EEXIST") {
        return err({ type: "TARGET_EXISTS", message: `目標已存在: ${target}` });
      }
      if (code && linkUnsupported.has(code)) {
        return this.moveAcrossDevices(source, target, sourceStats);
      }
      return err({
        type: "MOVE_FAILED",
        message: `搬移 ${source} → ${target} 失敗: ${errorMessage(e)}`,
      });
    }

    try {
      await unlink(source);
    } catch (e) {
      await this.discard(target);
      return err({
        type: "REMOVE_SOURCE_FAILED",
        message: `無法刪除來源 ${source}，已撤回目標: ${errorMessage(e)}`,
      });
    }
    return ok("link");
  }

  /** 先完整複製並驗證，再刪除來源；刪不掉就撤回複本 */
  private async moveAcrossDevices(
    source: string,
    target: string,
    sourceStats: Stats
  ): Promise<Result<"copy-then-delete", TransferError>> {
    const copied = await this.copy(source, target, sourceStats);
    if (!copied.ok) return copied;
    try {
      await unlink(source);
    } catch (e) {
      await this.discard(target);
      return err({
        type: "REMOVE_SOURCE_FAILED",
        message: `已複製但無法刪除來源 ${source}，已撤回複本: ${errorMessage(e)}`,
      });
    }
    return ok("copy-then-delete");
  }

  private async verifySize(
    target: string,
    expected: number
  ): Promise<Result<void, TransferError>> {
    try {
      const written = await stat(target);
      if (written.size === expected) return ok();
      return err({
        type: "VERIFY_FAILED",
        message: `${target} 大小不符：預期 ${expected}，實際 ${written.size}`,
      });
    } catch (e) {
      return err({
        type: "VERIFY_FAILED",
        message: `無法驗證 ${target}: ${errorMessage(e)}`,
      });
    }
  }

  private async discard(target: string) {
    try {
      await unlink(target);
    } catch (e) {
      if (errorCode(e) === "ENOENT") return;
      this.logger.error({
        event: "rollback-failed",
        target,
        error: e,
      })`無法移除不完整的目標檔 ${target}`;
    }
  }

  /**
   * 由 dir 往上移除空資料夾，直到本次建立的最上層為止。
   * 呼叫時須持有 dirLock；仍有搬移進行中的資料夾與其上層不動。
   */
  private async removeEmptyDirs(dir: string, createdTop: string) {
    let current = dir;
    for (;;) {
      if (this.isInUse(current)) return;
      try {
        await rmdir(current);
      } catch (e) {
        const code = errorCode(e);
        if (code !== "ENOTEMPTY" && code !== "EEXIST" && code !== "ENOENT") {
          this.logger.warn({
            event: "cleanup-failed",
            dir: current,
            error: e,
          })`無法清除資料夾 ${current}`;
        }
        return;
      }
      if (path.resolve(current) === path.resolve(createdTop)) return;
      const parent = path.dirname(current);
      if (parent === current) return;
      current = parent;
    }
  }

  private isInUse(dir: string) {
    for (const active of this.activeDirs.keys()) {
      if (isWithin(dir, active)) return true;
    }
    return false;
  }
}
