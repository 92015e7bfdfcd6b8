// 合并去重：旧条目与新条目拼接后按身份键折叠，再按发布时间稳定排序

import { compareByPublishDate, identityKey } from "../normalizer/index.js";
import type { NewsItem } from "../types/newsItem.js";


export interface MergeResult {
  /** 去重后按发布时间升序（无日期者在前）；同一时间按首次插入顺序 */
  items: NewsItem[];
  /** 本次新增（身份上此前不存在）的条目数 */
  added: number;
  /** 被新数据覆盖、且摘要或图片路径发生变化的条目数 */
  updated: number;
}


/**
 * 重复条目取最后插入者的字段值（新抓取覆盖旧存储），
 * 但保留首次插入的位置，不在同一时间的条目间移动。
 */
export function mergeItems(existing: readonly NewsItem[], fresh: readonly NewsItem[]): MergeResult {
  const byIdentity = new Map<string, NewsItem>();
  for (const item of existing) byIdentity.set(identityKey(item), item);
  const before = byIdentity.size;
  let updated = 0;
  for (const item of fresh) {
    const key = identityKey(item);
    const prev = byIdentity.get(key);
    if (prev && (prev.contentDigest !== item.contentDigest || prev.imagePath !== item.imagePath)) updated++;
    byIdentity.set(key, item);
  }
  const items = [...byIdentity.values()].sort(compareByPublishDate);
  return { items, added: byIdentity.size - before, updated };
}


/** 展示顺序：持久化顺序的逆序，最新在前、无日期者最后 */
export function newestFirst(items: readonly NewsItem[]): NewsItem[] {
  return [...items].reverse();
}
