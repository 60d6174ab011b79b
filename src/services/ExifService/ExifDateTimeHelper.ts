import { ExifDateTime } from "exiftool-vendored";

const RAW_DATE_PREFIX = /^(\d{4}):(\d{2}):(\d{2})/;
const RAW_BASIC_RE = /^(\d{4}):(\d{2}):(\d{2})\s+(\d{2}):(\d{2}):(\d{2})/;

export type ExifTime = {
  /** 實際的時間點 */
  time: Date;
  /** 拍攝地當下的年月日時分秒，以本機時區的 Date 表示 */
  wallClock: Date;
};

/**
 * 將 exiftool 的時間標籤轉為 JS Date。
 * 1) ExifDateTime 帶 tzoffsetMinutes 時，以 rawValue 的數字減去偏移得到 UTC。
 * 2) 沒有時區時交給 toDate()，視為本地時間。
 * 3) 字串則嘗試 Date 解析；其他型別或無效值回傳 undefined。
 * wallClock 一律取標籤上的數字，不受執行環境的時區影響。
 */
export function getTime(time: unknown): ExifTime | undefined {
  if (typeof time === "string") {
    const parsed = validDate(
      new Date(time.replace(RAW_DATE_PREFIX, "$1-$2-$3"))
    );
    return parsed && { time: parsed, wallClock: parsed };
  }
  if (!(time instanceof ExifDateTime) || !time.isValid) return undefined;

  const wallClock = validDate(
    new Date(
      time.year,
      time.month - 1,
      time.day,
      time.hour,
      time.minute,
      time.second
    )
  );
  if (!wallClock) return undefined;

  const raw = time.rawValue;
  const tz = time.tzoffsetMinutes;
  const m = raw ? RAW_BASIC_RE.exec(raw) : null;

  if (m && typeof tz === "number" && Number.isFinite(tz)) {
    // 例：raw=2025:07:23 18:26:02、tz=+480 → UTC 10:26:02
    const [year, month, day, hour, minute, second] = m.slice(1).map(Number);
    const baseUtcMs = Date.UTC(year, month - 1, day, hour, minute, second, 0);
    const instant = validDate(new Date(baseUtcMs - tz * 60 * 1000));
    return instant && { time: instant, wallClock };
  }

  try {
    const instant = validDate(time.toDate());
    return instant && { time: instant, wallClock };
  } catch {
    return undefined;
  }
}

function validDate(d: Date): Date | undefined {
  const ms = d.getTime();
  // exiftool 對空白時間會給 0000:00:00，轉出來是 1 年前後
  if (Number.isNaN(ms) || d.getFullYear() < 1900) return undefined;
  return d;
}
