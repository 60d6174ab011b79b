import type { Result } from "~shared/utils/Result";

import type { TraversalIssue } from "@/types";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export type ScanOptions = {
  recursive?: boolean;
  /** 副檔名白名單，不分大小寫；空陣列表示不過濾 */
  allowExts?: readonly string[];
  /** 不進入的目錄（絕對或相對路徑皆可） */
  excludeDirs?: readonly string[];
};

export type ScanResult = {
  /** 依名稱排序的絕對路徑 */
  files: string[];
  /** 無法讀取的子目錄，該子樹略過 */
  issues: TraversalIssue[];
};

export interface FileSystemScanner {
  scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<ScanResult, ScanError>>;
}
