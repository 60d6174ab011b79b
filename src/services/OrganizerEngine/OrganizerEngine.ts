import type { Result } from "~shared/utils/Result";

import type { CaptureTime, TransferMode, TraversalIssue } from "@/types";

import type {
  ConfigError,
  OrganizeInput,
  OrganizeOptions,
} from "./OrganizeOptions";

export type FailureType =
  | "EXTRACTION_FAILED"
  | "COLLISION_EXHAUSTED"
  | "TRANSFER_FAILED"
  | "LOOKUP_FAILED";

/** 單一檔案的處理結果 */
export type FileRecord =
  | {
      status: "transferred";
      source: string;
      target: string;
      mode: TransferMode;
      renamed: boolean;
      captureTime: CaptureTime;
    }
  /** dry run 只規劃不寫入 */
  | {
      status: "planned";
      source: string;
      target: string;
      renamed: boolean;
      captureTime: CaptureTime;
    }
  | {
      status: "skipped";
      reason: "duplicate";
      source: string;
      duplicateOf: string;
    }
  | {
      status: "skipped";
      reason: "already-organized";
      source: string;
      target: string;
    }
  | {
      status: "failed";
      source: string;
      error: { type: FailureType; message: string };
    };

export type RunStatistics = {
  /** 開始處理的媒體檔數 */
  processed: number;
  /** 已複製、搬移（dry run 為已規劃）的檔案數 */
  organized: number;
  duplicatesSkipped: number;
  alreadyOrganized: number;
  /** 因檔名衝突加上後綴的檔案數 */
  renamed: number;
  /** 放進未知日期資料夾的檔案數 */
  unknownDate: number;
  errors: number;
  traversalErrors: number;
  /** 因取消或 fail-fast 而沒有開始的檔案數 */
  unprocessed: number;
};

export type StopReason = "cancelled" | "fail-fast";

export type OrganizeReport = {
  options: OrganizeOptions;
  statistics: RunStatistics;
  /** 依來源路徑排序 */
  records: FileRecord[];
  traversalIssues: TraversalIssue[];
  stopReason?: StopReason;
  dryRun: boolean;
};

export type OrganizeProgress = {
  completed: number;
  total: number;
};

export type OrganizeHooks = {
  signal?: AbortSignal;
  onRecord?(record: FileRecord, progress: OrganizeProgress): void;
};

export interface OrganizerEngine {
  /**
   * 將來源資料夾中的媒體檔依拍攝日期整理到目標資料夾，並略過重複檔。
   * 只有選項錯誤會回傳錯誤；個別檔案的失敗記錄在報告中。
   */
  organize(
    input: OrganizeInput,
    hooks?: OrganizeHooks
  ): Promise<Result<OrganizeReport, ConfigError>>;
}

export function emptyStatistics(): RunStatistics {
  return {
    processed: 0,
    organized: 0,
    duplicatesSkipped: 0,
    alreadyOrganized: 0,
    renamed: 0,
    unknownDate: 0,
    errors: 0,
    traversalErrors: 0,
    unprocessed: 0,
  };
}
