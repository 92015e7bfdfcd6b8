import { describe, it, expect } from "vitest";
import { getConsoleLevel, parseLevel, shouldLogToConsole } from "../src/logger/config.js";
import { errMessage, formatConsole } from "../src/logger/index.js";


describe("logger", () => {
  it("解析 LOG_LEVEL，非法值回退默认", () => {
    expect(parseLevel("WARN", "info")).toBe("warn");
    expect(parseLevel("verbose", "info")).toBe("info");
    expect(parseLevel(undefined, "error")).toBe("error");
  });

  it("LOG_LEVEL 忽略首尾空白，未设置时为 info", () => {
    expect(parseLevel(" Debug ", "info")).toBe("debug");
    expect(getConsoleLevel({ LOG_LEVEL: "warn" })).toBe("warn");
    expect(getConsoleLevel({})).toBe("info");
  });

  it("按级别过滤", () => {
    expect(shouldLogToConsole("warn", "error")).toBe(true);
    expect(shouldLogToConsole("warn", "info")).toBe(false);
  });

  it("控制台格式：时间、分类、消息与 payload", () => {
    const line = formatConsole({
      level: "warn",
      category: "fetcher",
      message: "信源拉取失败",
      payload: { feed_url: "https://example.com/rss" },
      created_at: "2024-01-02T10:00:00.000Z",
    });
    expect(line).toBe('2024-01-02T10:00:00.000Z [fetcher] 信源拉取失败 {"feed_url":"https://example.com/rss"}');
  });

  it("errMessage", () => {
    expect(errMessage(new Error("boom"))).toBe("boom");
    expect(errMessage("plain")).toBe("plain");
  });
});
