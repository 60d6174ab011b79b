import type { MediaFile } from "@/types";

/**
 * 重複判定鍵：拍攝時間（截斷到整秒）＋檔案大小。
 * 未知時間的鍵永遠不視為重複。
 */
export type DuplicateKey =
  | { kind: "known"; epochSecond: number; size: number }
  | { kind: "unknown"; size: number };

export type IndexEntry = {
  /** 第一個登記此鍵的檔案 */
  path: string;
  /** 來自本次來源，或是目標目錄中既有的檔案 */
  origin: "source" | "destination";
};

export type RegisterResult =
  | { accepted: true }
  | { accepted: false; existing: IndexEntry };

export interface DuplicateIndex {
  /** 原子性的 check-and-set；已存在時回傳第一個登記者 */
  register(key: DuplicateKey, entry: IndexEntry): RegisterResult;
  readonly size: number;
}

export function toDuplicateKey(file: MediaFile): DuplicateKey {
  if (file.captureTime.kind === "unknown") {
    return { kind: "unknown", size: file.size };
  }
  return {
    kind: "known",
    epochSecond: Math.floor(file.captureTime.time.getTime() / 1000),
    size: file.size,
  };
}
