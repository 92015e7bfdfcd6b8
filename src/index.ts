// 库入口：供嵌入方直接调用一轮拉取或自行调度

export { runNewsCycle, normalizeEntries, type CycleReport, type PipelineConfig, type PipelineDeps } from "./pipeline/index.js";
export { createNewsService, type NewsService } from "./scheduler/index.js";
export { NewsStore, mergeItems, STORE_FILE_NAME } from "./store/index.js";
export { cacheImages, createImageDownloader } from "./cacher/index.js";
export { fetchFeeds, createFeedLoader, entriesFromFeed } from "./fetcher/index.js";
export { normalize, contentDigest, identityKey, imagePathFor, formatPublishDate, parsePublishDate } from "./normalizer/index.js";
export { resolveCacheRoot, ensureCacheRoot } from "./config/paths.js";
export { loadConfig } from "./config/index.js";
export * from "./errors.js";
export type { NewsItem, RawEntry, PublishDate, FeedEndpoint } from "./types/newsItem.js";
