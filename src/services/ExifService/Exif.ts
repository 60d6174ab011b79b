export type Exif = {
  /** 檔案完整路徑 */
  filePath: string;

  /** 拍攝時間（DateTimeOriginal → CreateDate → MediaCreateDate） */
  captureTime?: Date;

  /** 拍攝地當下的日期時間（本機時區欄位），與 captureTime 同時存在 */
  captureWallClock?: Date;

  /** 讀到時間的標籤名稱 */
  captureTag?: CaptureTag;
};

export const captureTags = [
  "DateTimeOriginal",
  "CreateDate",
  "MediaCreateDate",
] as const;

export type CaptureTag = (typeof captureTags)[number];

export type ReadError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string }
  | { type: "NO_EXIF_DATA"; message: string };
