import { format } from "date-fns";

import { type Result, err, ok } from "~shared/utils/Result";

const sampleDate = new Date(2001, 1, 3, 4, 5, 6);

/** 以 date-fns pattern 產生資料夾層級，`/` 分隔 */
export function renderDateSegments(time: Date, dateFormat: string): string[] {
  return format(time, dateFormat)
    .split("/")
    .filter((s) => s.length > 0);
}

/**
 * 檢查 pattern 能否產生安全的相對路徑。
 * 回傳以範例日期產生的層級，方便錯誤訊息或預覽使用。
 */
export function checkDateFormat(dateFormat: string): Result<string[], string> {
  if (dateFormat.trim() === "") return err("日期格式不可為空");
  if (dateFormat.startsWith("/")) return err("日期格式不可為絕對路徑");
  if (dateFormat.includes("\\")) return err("日期格式請以 / 分隔資料夾");

  let segments: string[];
  try {
    segments = renderDateSegments(sampleDate, dateFormat);
  } catch (e) {
    return err(e instanceof Error ? e.message : String(e));
  }
  if (segments.length === 0) return err("日期格式沒有產生任何資料夾");
  const bad = segments.find((s) => s === "." || s === "..");
  if (bad) return err(`日期格式產生了不合法的資料夾名稱: ${bad}`);
  return ok(segments);
}
