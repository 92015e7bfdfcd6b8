import { describe, it, expect, vi } from "vitest";
import { createApp, toNewsItemJson } from "../src/app/router.js";
import { FeedFetchError, StoreIOError } from "../src/errors.js";
import type { CycleReport } from "../src/pipeline/index.js";
import type { NewsService } from "../src/scheduler/index.js";
import type { NewsItem } from "../src/types/newsItem.js";


const DATED: NewsItem = {
  title: "Dated",
  description: "Body",
  rawPubDate: "Tue, 02 Jan 2024 18:30:00 +0830",
  publishDate: { epochMs: Date.UTC(2024, 0, 2, 10), offsetMinutes: 510 },
  imagePath: "/cache/example.com/a.jpg",
  contentDigest: "a".repeat(64),
};

const UNDATED: NewsItem = { title: "Undated", description: "Body", contentDigest: "b".repeat(64) };


const REPORT: CycleReport = {
  items: [DATED, UNDATED],
  added: 1,
  updated: 0,
  feedFailures: [new FeedFetchError("https://down.example.com/rss", "信源拉取失败: timeout")],
  imageFailures: [],
  skippedEntries: 2,
  durationMs: 5,
  completedAt: "2024-01-02T10:00:00.000Z",
};


function fakeService(overrides: Partial<NewsService> = {}): NewsService {
  return {
    refresh: vi.fn(async () => REPORT),
    latest: () => undefined,
    start: () => undefined,
    stop: () => undefined,
    ...overrides,
  };
}


describe("toNewsItemJson", () => {
  it("发布时间输出为带偏移的 ISO-8601，缺失字段为 null", () => {
    expect(toNewsItemJson(DATED)).toEqual({
      title: "Dated",
      description: "Body",
      publishDate: "2024-01-02T18:30:00+08:30",
      imagePath: "/cache/example.com/a.jpg",
      contentDigest: "a".repeat(64),
    });
    expect(toNewsItemJson(UNDATED).publishDate).toBeNull();
    expect(toNewsItemJson(UNDATED).imagePath).toBeNull();
  });
});


describe("GET /api/news", () => {
  it("运行一轮并返回全部条目与失败信息", async () => {
    const service = fakeService();
    const res = await createApp(service).request("/api/news");
    expect(res.status).toBe(200);
    expect(service.refresh).toHaveBeenCalledTimes(1);
    expect(await res.json()).toEqual({
      completedAt: "2024-01-02T10:00:00.000Z",
      added: 1,
      items: [toNewsItemJson(DATED), toNewsItemJson(UNDATED)],
      failures: {
        feeds: [{ url: "https://down.example.com/rss", error: "信源拉取失败: timeout" }],
        images: [],
        skippedEntries: 2,
      },
    });
  });

  it("存储错误返回 500 与错误类型", async () => {
    const service = fakeService({
      refresh: async () => {
        throw new StoreIOError("/cache/news_items.db", "存储文件无法读取: file is not a database");
      },
    });
    const res = await createApp(service).request("/api/news");
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "存储文件无法读取: file is not a database", code: "StoreIOError" });
  });
});


describe("GET /api/news/latest", () => {
  it("首轮完成前返回空列表", async () => {
    const res = await createApp(fakeService()).request("/api/news/latest");
    expect(await res.json()).toEqual({ completedAt: null, items: [] });
  });

  it("返回最近一次结果且不触发拉取", async () => {
    const service = fakeService({ latest: () => REPORT });
    const res = await createApp(service).request("/api/news/latest");
    expect(service.refresh).not.toHaveBeenCalled();
    expect(await res.json()).toEqual({
      completedAt: "2024-01-02T10:00:00.000Z",
      items: [toNewsItemJson(DATED), toNewsItemJson(UNDATED)],
    });
  });
});
