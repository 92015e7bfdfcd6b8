// Normalizer：RawEntry → NewsItem 的纯函数，附带身份判定与内容摘要两套独立规则

import { createHash } from "node:crypto";
import { isAbsolute, join, relative, sep } from "node:path";
import { isStoreEntryName } from "../config/paths.js";
import { MissingContentError } from "../errors.js";
import type { NewsItem, RawEntry } from "../types/newsItem.js";
import { comparePublishDate, parsePublishDate } from "./date.js";

export { parsePublishDate, parseRfc822, parseIso8601, formatPublishDate, comparePublishDate } from "./date.js";


/** 取第一个 media:thumbnail 的 url 属性；任一层缺失则无图 */
export function imageUrlOf(entry: RawEntry): string | undefined {
  const url = entry.thumbnails[0]?.url;
  return url ? url : undefined;
}


/**
 * 图片 URL → 缓存路径：去掉 https:// 或 http:// 前缀后拼接到缓存根目录。
 * 同一 URL 总是得到同一路径；拼接结果逃出缓存根目录（含 ..），
 * 或落在条目存储文件及其 SQLite 附属文件上时，视为无图。
 */
export function imagePathFor(cacheRoot: string, imageUrl: string): string | undefined {
  const rest = imageUrl.replace(/^https?:\/\//, "");
  if (!rest) return undefined;
  const path = join(cacheRoot, rest);
  const rel = relative(cacheRoot, path);
  if (!rel || rel.startsWith("..") || isAbsolute(rel)) return undefined;
  if (isStoreEntryName(rel.split(sep)[0])) return undefined;
  return path;
}


/** sha256(title 字节 + description 字节)；拼接顺序属于存储格式的一部分 */
export function contentDigest(title: string | undefined, description: string | undefined): string {
  if (title === undefined) throw new MissingContentError("title");
  if (description === undefined) throw new MissingContentError("description");
  return createHash("sha256").update(title, "utf8").update(description, "utf8").digest("hex");
}


/** 将一条原始条目归一化；缺少 title/description 时抛出 MissingContentError */
export function normalize(entry: RawEntry, cacheRoot: string): NewsItem {
  const digest = contentDigest(entry.title, entry.description);
  const imageUrl = imageUrlOf(entry);
  return {
    title: entry.title,
    description: entry.description,
    rawPubDate: entry.pubDate,
    publishDate: parsePublishDate(entry.pubDate, entry.dcDates),
    imagePath: imageUrl ? imagePathFor(cacheRoot, imageUrl) : undefined,
    contentDigest: digest,
  };
}


/** 身份键：title、description、原始发布时间字符串三者决定是否为同一条目（与摘要无关） */
export function identityKey(item: NewsItem): string {
  return JSON.stringify([item.title ?? null, item.description ?? null, item.rawPubDate ?? null]);
}


/** 展示顺序：仅按发布时间，无日期者最早 */
export function compareByPublishDate(a: NewsItem, b: NewsItem): number {
  return comparePublishDate(a.publishDate, b.publishDate);
}
