import type { Result } from "~shared/utils/Result";

import type { MediaFile } from "@/types";

export type ExtractError = {
  type: "STAT_FAILED";
  message: string;
};

export interface MetadataExtractor {
  /**
   * 取得檔案大小與拍攝時間。
   * 內嵌資料讀取失敗不算錯誤，會退回修改時間或 unknown；
   * 只有檔案本身無法 stat 時才回傳錯誤。
   */
  extract(filePath: string): Promise<Result<MediaFile, ExtractError>>;
}
