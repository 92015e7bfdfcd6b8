// Pipeline：一轮 fetch → normalize → 图片缓存 → merge → persist，返回最新在前的完整条目列表

import { cacheImages, createImageDownloader, type ImageDownloader, type ImageRequest } from "../cacher/index.js";
import { ensureCacheRoot } from "../config/paths.js";
import { MissingContentError, type FeedFetchError, type ImageFetchError } from "../errors.js";
import { createFeedLoader, fetchFeeds, type FeedLoader } from "../fetcher/index.js";
import { logger } from "../logger/index.js";
import { imageUrlOf, normalize } from "../normalizer/index.js";
import { NewsStore } from "../store/index.js";
import type { FeedEndpoint, NewsItem, RawEntry } from "../types/newsItem.js";


export interface PipelineConfig {
  /** 缓存根目录：条目存储与图片缓存的共同根 */
  cacheRoot: string;
  feeds: FeedEndpoint[];
  feedConcurrency?: number;
  imageConcurrency?: number;
  feedTimeoutMs?: number;
  imageTimeoutMs?: number;
}


/** 可替换的网络依赖，缺省时走真实网络 */
export interface PipelineDeps {
  loadFeed?: FeedLoader;
  downloadImage?: ImageDownloader;
}


export interface CycleReport {
  /** 全部已知条目，最新在前，无日期者最后 */
  items: NewsItem[];
  added: number;
  updated: number;
  feedFailures: FeedFetchError[];
  imageFailures: ImageFetchError[];
  /** 因缺少 title/description 被丢弃的条目数 */
  skippedEntries: number;
  durationMs: number;
  completedAt: string;
}


export interface NormalizedBatch {
  items: NewsItem[];
  imageRequests: ImageRequest[];
  skipped: number;
}


/** 逐条归一化；缺少内容的条目丢弃并计数 */
export function normalizeEntries(entries: readonly RawEntry[], cacheRoot: string): NormalizedBatch {
  const batch: NormalizedBatch = { items: [], imageRequests: [], skipped: 0 };
  for (const entry of entries) {
    let item: NewsItem;
    try {
      item = normalize(entry, cacheRoot);
    } catch (err) {
      if (!(err instanceof MissingContentError)) throw err;
      batch.skipped++;
      logger.debug("normalizer", "条目缺少内容，已丢弃", { feed_url: entry.feedUrl, field: err.field, title: entry.title });
      continue;
    }
    batch.items.push(item);
    const url = imageUrlOf(entry);
    if (url && item.imagePath) {
      batch.imageRequests.push({ url, path: item.imagePath });
    }
  }
  return batch;
}


/**
 * 执行一轮完整流程。配置错误与存储错误向上抛出，旧存储保持不变；
 * 信源、条目、图片级别的失败只记录在报告中。
 * 同一缓存根目录上不得并发调用（见 createNewsService）。
 */
export async function runNewsCycle(config: PipelineConfig, deps: PipelineDeps = {}): Promise<CycleReport> {
  const startTime = Date.now();
  await ensureCacheRoot(config.cacheRoot);

  const loadFeed = deps.loadFeed ?? createFeedLoader({ timeoutMs: config.feedTimeoutMs });
  const download = deps.downloadImage ?? createImageDownloader({ timeoutMs: config.imageTimeoutMs });

  const fetched = await fetchFeeds(config.feeds, { loadFeed, concurrency: config.feedConcurrency });
  const batch = normalizeEntries(fetched.entries, config.cacheRoot);
  const images = await cacheImages(batch.imageRequests, { download, concurrency: config.imageConcurrency });

  const store = new NewsStore(config.cacheRoot);
  const persisted = await store.mergeAndPersist(batch.items);

  const report: CycleReport = {
    items: persisted.items,
    added: persisted.added,
    updated: persisted.updated,
    feedFailures: fetched.failures,
    imageFailures: images.failures,
    skippedEntries: batch.skipped,
    durationMs: Date.now() - startTime,
    completedAt: new Date().toISOString(),
  };
  logger.info("pipeline", "本轮完成", {
    feeds: config.feeds.length,
    feedFailures: report.feedFailures.length,
    normalized: batch.items.length,
    skipped: report.skippedEntries,
    imageFailures: report.imageFailures.length,
    total: report.items.length,
    added: report.added,
    durationMs: report.durationMs,
  });
  return report;
}
