// Router：Hono 实现，只负责 HTTP 层；条目的拉取与存储由 NewsService 完成

import { Hono } from "hono";
import { streamSSE } from "hono/streaming";
import { ConfigurationError, StoreIOError } from "../errors.js";
import { onNewsUpdated } from "../events/index.js";
import { errMessage, logger } from "../logger/index.js";
import { formatPublishDate } from "../normalizer/index.js";
import type { CycleReport } from "../pipeline/index.js";
import type { NewsService } from "../scheduler/index.js";
import type { NewsItem } from "../types/newsItem.js";


/** SSE 心跳间隔 */
export const HEARTBEAT_INTERVAL_MS = 5_000;


/** 对外的条目 JSON：发布时间带原始偏移 */
export interface NewsItemJson {
  title: string | null;
  description: string | null;
  publishDate: string | null;
  imagePath: string | null;
  contentDigest: string;
}


export function toNewsItemJson(item: NewsItem): NewsItemJson {
  return {
    title: item.title ?? null,
    description: item.description ?? null,
    publishDate: item.publishDate ? formatPublishDate(item.publishDate) : null,
    imagePath: item.imagePath ?? null,
    contentDigest: item.contentDigest,
  };
}


function reportJson(report: CycleReport) {
  return {
    completedAt: report.completedAt,
    added: report.added,
    items: report.items.map(toNewsItemJson),
    failures: {
      feeds: report.feedFailures.map((f) => ({ url: f.url, error: f.message })),
      images: report.imageFailures.map((f) => ({ url: f.url, error: f.message })),
      skippedEntries: report.skippedEntries,
    },
  };
}


/** 创建 Hono 应用，service 通过参数注入便于测试 */
export function createApp(service: NewsService) {
  const app = new Hono();
  // API：运行（或加入正在进行的）一轮拉取，返回全部条目，最新在前
  app.get("/api/news", async (c) => {
    try {
      const report = await service.refresh();
      return c.json(reportJson(report));
    } catch (err) {
      const code = err instanceof ConfigurationError || err instanceof StoreIOError ? err.name : "INTERNAL";
      logger.error("app", "拉取失败", { code, err: errMessage(err) });
      return c.json({ error: errMessage(err), code }, 500);
    }
  });
  // API：最近一次成功结果，不触发拉取
  app.get("/api/news/latest", (c) => {
    const report = service.latest();
    if (!report) return c.json({ completedAt: null, items: [] });
    return c.json({ completedAt: report.completedAt, items: report.items.map(toNewsItemJson) });
  });
  // SSE：每轮完成后推送 news:updated，并定时发送 ping
  app.get("/api/news/stream", (c) => {
    return streamSSE(c, async (stream) => {
      const write = (event: string, data: string) => {
        stream.writeSSE({ event, data }).catch((err) => {
          logger.debug("app", "SSE 写入失败", { err: errMessage(err) });
        });
      };
      await stream.writeSSE({ event: "connected", data: JSON.stringify({ type: "connected" }) });
      const off = onNewsUpdated((e) => write("news:updated", JSON.stringify(e)));
      const heartbeat = setInterval(() => write("ping", ""), HEARTBEAT_INTERVAL_MS);
      stream.onAbort(() => {
        off();
        clearInterval(heartbeat);
      });
      await new Promise<void>((resolve) => stream.onAbort(resolve));
    });
  });
  return app;
}
