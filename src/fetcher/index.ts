// Fetcher：并发拉取并解析所有信源，单个信源失败只记录，不影响其余信源

import Parser from "rss-parser";
import pLimit from "p-limit";
import { FeedFetchError } from "../errors.js";
import { errMessage, logger } from "../logger/index.js";
import type { FeedEndpoint, RawEntry } from "../types/newsItem.js";


/** rss-parser 自定义字段：原始 description、dc:date 列表、media:thumbnail 列表 */
export interface CustomItemFields {
  description?: unknown;
  dcDates?: unknown;
  mediaThumbnails?: unknown;
}

export type ParsedFeed = Parser.Output<CustomItemFields>;

/** 拉取并解析单个信源；测试中替换为进程内 XML */
export type FeedLoader = (url: FeedEndpoint) => Promise<ParsedFeed>;


export interface FeedLoaderOptions {
  timeoutMs?: number;
}


export interface FetchFeedsOptions {
  loadFeed: FeedLoader;
  /** 同时拉取的信源数，默认 4 */
  concurrency?: number;
}


export interface FetchFeedsResult {
  /** 所有成功信源的原始条目，顺序无意义 */
  entries: RawEntry[];
  failures: FeedFetchError[];
  perFeed: Array<{ url: FeedEndpoint; count: number }>;
}


export function createFeedParser(options: FeedLoaderOptions = {}): Parser<Record<string, unknown>, CustomItemFields> {
  return new Parser<Record<string, unknown>, CustomItemFields>({
    timeout: options.timeoutMs ?? 15_000,
    headers: {
      "User-Agent": "news-cache/0.1",
      "Accept": "application/rss+xml,application/atom+xml,application/xml,text/xml,*/*",
    },
    customFields: {
      item: [
        ["description", "description"],
        ["dc:date", "dcDates", { keepArray: true }],
        ["media:thumbnail", "mediaThumbnails", { keepArray: true }],
      ],
    },
  });
}


/** 基于 rss-parser 的默认 loader，走网络 */
export function createFeedLoader(options: FeedLoaderOptions = {}): FeedLoader {
  const parser = createFeedParser(options);
  return (url) => parser.parseURL(url);
}


function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}


// xml2js 节点：纯文本为 string，带属性的文本为 { _: string, $: {...} }
function textValues(v: unknown): string[] {
  const nodes = Array.isArray(v) ? v : [v];
  return nodes.flatMap((node): string[] => {
    if (typeof node === "string") return [node];
    if (isRecord(node) && typeof node._ === "string") return [node._];
    return [];
  });
}


// 保留每个元素的位置：没有属性的元素也占一项，保证"取第一个"的语义
function attributeMaps(v: unknown): Array<Record<string, string>> {
  if (!Array.isArray(v)) return [];
  return v.map((node) => {
    const attrs = isRecord(node) && isRecord(node.$) ? node.$ : {};
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(attrs)) {
      if (typeof value === "string") out[key] = value;
    }
    return out;
  });
}


/** 将解析后的 feed 文档转换为 RawEntry 列表 */
export function entriesFromFeed(feedUrl: FeedEndpoint, feed: ParsedFeed): RawEntry[] {
  return (feed.items ?? []).map((item) => {
    const description = typeof item.description === "string" ? item.description : item.content ?? item.summary;
    return {
      feedUrl,
      title: item.title,
      description,
      // Atom 的 <published> 也会落到 pubDate（ISO 格式），按 RFC-822 解析不出；
      // 这类条目只有带 dc:date 时才有发布时间，否则排在最早
      pubDate: item.pubDate,
      dcDates: item.dcDates === undefined ? [] : textValues(item.dcDates),
      thumbnails: attributeMaps(item.mediaThumbnails),
    } satisfies RawEntry;
  });
}


/** 并发拉取所有信源；失败的信源贡献 0 条并记入 failures */
export async function fetchFeeds(endpoints: readonly FeedEndpoint[], options: FetchFeedsOptions): Promise<FetchFeedsResult> {
  const limit = pLimit(options.concurrency ?? 4);
  const settled = await Promise.allSettled(
    endpoints.map((url) => limit(async () => entriesFromFeed(url, await options.loadFeed(url))))
  );
  const entries: RawEntry[] = [];
  const failures: FeedFetchError[] = [];
  const perFeed: FetchFeedsResult["perFeed"] = [];
  for (let i = 0; i < settled.length; i++) {
    const result = settled[i];
    const url = endpoints[i];
    if (result.status === "fulfilled") {
      entries.push(...result.value);
      perFeed.push({ url, count: result.value.length });
      logger.debug("fetcher", "信源拉取完成", { feed_url: url, count: result.value.length });
    } else {
      const err = new FeedFetchError(url, `信源拉取失败: ${errMessage(result.reason)}`, { cause: result.reason });
      failures.push(err);
      perFeed.push({ url, count: 0 });
      logger.warn("fetcher", "信源拉取失败", { feed_url: url, err: errMessage(result.reason) });
    }
  }
  logger.info("fetcher", "信源拉取结束", { feeds: endpoints.length, failed: failures.length, entries: entries.length });
  return { entries, failures, perFeed };
}
