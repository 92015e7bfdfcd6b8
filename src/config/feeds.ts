// 信源列表：读取 feeds.json（{ "feeds": [...] }），文件不存在时使用内置默认列表

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import { logger } from "../logger/index.js";
import type { FeedEndpoint } from "../types/newsItem.js";


export const DEFAULT_FEEDS: readonly FeedEndpoint[] = [
  "http://feeds.arstechnica.com/arstechnica/index",
  "https://boingboing.net/feed",
  "http://rss.slashdot.org/Slashdot/slashdotMain",
  "https://hackaday.com/blog/feed/",
  "https://www.phoronix.com/rss.php",
  "https://www.newyorker.com/feed/everything",
];


const feedsFileSchema = z.object({
  feeds: z.array(z.string().url().regex(/^https?:\/\//i, "仅支持 http/https 信源")).min(1),
});


function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}


/** 去重后的信源列表，保持文件中的顺序 */
export async function loadFeeds(path: string): Promise<FeedEndpoint[]> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      logger.info("config", "未找到信源配置，使用默认列表", { path, feeds: DEFAULT_FEEDS.length });
      return [...DEFAULT_FEEDS];
    }
    throw new ConfigurationError(`信源配置无法读取: ${path}`, { cause: err });
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`信源配置不是合法 JSON: ${path}`, { cause: err });
  }
  const parsed = feedsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`信源配置格式错误: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  return [...new Set(parsed.data.feeds)];
}
