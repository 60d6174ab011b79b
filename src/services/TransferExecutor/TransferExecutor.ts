import type { Result } from "~shared/utils/Result";

import type { TransferMode } from "@/types";

export type TransferError = {
  type:
    | "TARGET_EXISTS"
    | "COPY_FAILED"
    | "VERIFY_FAILED"
    | "MOVE_FAILED"
    | "REMOVE_SOURCE_FAILED";
  message: string;
};

export type TransferReceipt = {
  source: string;
  target: string;
  mode: TransferMode;
  /** 實際採用的方式；無法建立硬連結（例如跨裝置）時搬移會退回 copy-then-delete */
  method: "copy" | "link" | "copy-then-delete";
  size: number;
};

export interface TransferExecutor {
  /**
   * 複製或搬移單一檔案。
   * 失敗時目標不會留下檔案，來源維持原狀；不會覆蓋既有檔案。
   */
  transfer(
    source: string,
    target: string,
    mode: TransferMode
  ): Promise<Result<TransferReceipt, TransferError>>;
}
