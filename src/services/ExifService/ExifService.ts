import type { Result } from "~shared/utils/Result";

import type { Exif, ReadError } from "./Exif";

export interface ExifService {
  /**
   * 讀取檔案內嵌的中繼資料。
   * 沒有拍攝時間不算錯誤，captureTime 會是 undefined。
   */
  readExif(filePath: string): Promise<Result<Exif, ReadError>>;
}
