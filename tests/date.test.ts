import { describe, it, expect } from "vitest";
import {
  comparePublishDate,
  formatPublishDate,
  parseIso8601,
  parsePublishDate,
  parseRfc822,
} from "../src/normalizer/date.js";


describe("parseRfc822", () => {
  it("解析带 +0000 偏移的原生日期", () => {
    const d = parseRfc822("Tue, 02 Jan 2024 10:00:00 +0000");
    expect(d).toEqual({ epochMs: Date.UTC(2024, 0, 2, 10, 0, 0), offsetMinutes: 0 });
    expect(d && formatPublishDate(d)).toBe("2024-01-02T10:00:00+00:00");
  });

  it("保留非零偏移", () => {
    const d = parseRfc822("Tue, 02 Jan 2024 18:30:00 +0830");
    expect(d).toEqual({ epochMs: Date.UTC(2024, 0, 2, 10, 0, 0), offsetMinutes: 510 });
    expect(d && formatPublishDate(d)).toBe("2024-01-02T18:30:00+08:30");
  });

  it("负偏移", () => {
    const d = parseRfc822("Mon, 01 Jan 2024 22:00:00 -0500");
    expect(d).toEqual({ epochMs: Date.UTC(2024, 0, 2, 3, 0, 0), offsetMinutes: -300 });
  });

  it("GMT 视为 +0000，日期可为一位数", () => {
    expect(parseRfc822("Tue, 2 Jan 2024 10:00:00 GMT")).toEqual({ epochMs: Date.UTC(2024, 0, 2, 10), offsetMinutes: 0 });
  });

  it("星期与日期不符时无法解析", () => {
    expect(parseRfc822("Mon, 02 Jan 2024 10:00:00 +0000")).toBeUndefined();
  });

  it("不存在的日期与越界时间无法解析", () => {
    expect(parseRfc822("Fri, 30 Feb 2024 10:00:00 +0000")).toBeUndefined();
    expect(parseRfc822("Tue, 02 Jan 2024 24:00:00 +0000")).toBeUndefined();
  });

  it("其它格式无法解析", () => {
    expect(parseRfc822("2024-01-02T10:00:00+00:00")).toBeUndefined();
    expect(parseRfc822("")).toBeUndefined();
  });
});


describe("parseIso8601", () => {
  it("解析带偏移的时间", () => {
    const d = parseIso8601("2023-05-01T08:00:00+00:00");
    expect(d).toEqual({ epochMs: Date.UTC(2023, 4, 1, 8, 0, 0), offsetMinutes: 0 });
    expect(d && formatPublishDate(d)).toBe("2023-05-01T08:00:00+00:00");
  });

  it("Z 后缀与小数秒", () => {
    expect(parseIso8601("2023-05-01T08:00:00.5Z")).toEqual({ epochMs: Date.UTC(2023, 4, 1, 8, 0, 0, 500), offsetMinutes: 0 });
  });

  it("负偏移与毫秒在格式化时保留", () => {
    const d = parseIso8601("2023-05-01T08:00:00.25-05:00");
    expect(d).toEqual({ epochMs: Date.UTC(2023, 4, 1, 13, 0, 0, 250), offsetMinutes: -300 });
    expect(d && formatPublishDate(d)).toBe("2023-05-01T08:00:00.250-05:00");
  });

  it("缺少偏移时无法解析", () => {
    expect(parseIso8601("2023-05-01T08:00:00")).toBeUndefined();
    expect(parseIso8601("2023-05-01")).toBeUndefined();
  });
});


describe("parsePublishDate", () => {
  it("原生日期优先于 dc:date", () => {
    const d = parsePublishDate("Tue, 02 Jan 2024 10:00:00 +0000", ["2023-05-01T08:00:00+00:00"]);
    expect(d?.epochMs).toBe(Date.UTC(2024, 0, 2, 10));
  });

  it("没有原生日期时取第一个 dc:date", () => {
    const d = parsePublishDate(undefined, ["2023-05-01T08:00:00+00:00", "2020-01-01T00:00:00+00:00"]);
    expect(d).toEqual({ epochMs: Date.UTC(2023, 4, 1, 8), offsetMinutes: 0 });
  });

  it("原生日期无法解析时回退到 dc:date", () => {
    const d = parsePublishDate("yesterday", ["2023-05-01T08:00:00Z"]);
    expect(d?.epochMs).toBe(Date.UTC(2023, 4, 1, 8));
  });

  it("两者都没有时为 undefined", () => {
    expect(parsePublishDate(undefined, [])).toBeUndefined();
    expect(parsePublishDate("yesterday", ["last week"])).toBeUndefined();
  });
});


describe("comparePublishDate", () => {
  const early = { epochMs: 1_000, offsetMinutes: 0 };
  const late = { epochMs: 2_000, offsetMinutes: 480 };

  it("按时间点比较，忽略偏移", () => {
    expect(comparePublishDate(early, late)).toBeLessThan(0);
    expect(comparePublishDate(late, early)).toBeGreaterThan(0);
    expect(comparePublishDate({ epochMs: 1_000, offsetMinutes: 60 }, early)).toBe(0);
  });

  it("undefined 排在最前", () => {
    expect(comparePublishDate(undefined, early)).toBeLessThan(0);
    expect(comparePublishDate(early, undefined)).toBeGreaterThan(0);
    expect(comparePublishDate(undefined, undefined)).toBe(0);
  });
});
