import { describe, expect, test } from "vitest";

import { checkDateFormat, renderDateSegments } from "@/services/PathPlanner";

describe("renderDateSegments", () => {
  const time = new Date(2023, 4, 1, 10, 0, 0);

  test("預設格式產生年/月/日三層", () => {
    expect(renderDateSegments(time, "yyyy/MM/dd")).toEqual([
      "2023",
      "05",
      "01",
    ]);
  });

  test("單層格式", () => {
    expect(renderDateSegments(time, "yyyy-MM")).toEqual(["2023-05"]);
  });
});

describe("checkDateFormat", () => {
  test("合法格式回傳範例日期的層級", () => {
    expect(checkDateFormat("yyyy/MM/dd")).toEqual({
      ok: true,
      value: ["2001", "02", "03"],
    });
  });

  test.each(["", "  ", "/yyyy/MM", "yyyy\\MM", "yyyy/foo", "yyyy/'..'"])(
    "拒絕 %j",
    (pattern) => {
      expect(checkDateFormat(pattern).ok).toBe(false);
    }
  );
});
