export interface DumpWriter {
  /** 將資料輸出成具名 JSON 報告，回傳檔案路徑 */
  dump(name: string, data: unknown): Promise<string>;
}
