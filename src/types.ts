/** 拍攝時間；未知時不使用任何魔術值 */
export type CaptureTime =
  | {
      kind: "known";
      /** 實際的時間點，用於重複判定 */
      time: Date;
      /** 拍攝地當下的日期時間，以本機時區的欄位表示；資料夾依此產生 */
      wallClock: Date;
      source: "metadata" | "mtime";
    }
  | { kind: "unknown" };

export type MediaFile = {
  /** 絕對路徑，也是檔案的識別 */
  path: string;
  fileName: string;
  /** 小寫、含點，例如 .jpg */
  extension: string;
  size: number;
  captureTime: CaptureTime;
};

export type TransferMode = "copy" | "move";

export type TraversalIssue = {
  path: string;
  message: string;
};
