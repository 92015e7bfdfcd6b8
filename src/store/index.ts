// 持久化存储：缓存根目录下单个 SQLite 文件，每轮整体重写；读失败或写失败均为致命错误

import { access } from "node:fs/promises";
import { join } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import { STORE_FILE_NAME } from "../config/paths.js";
import { StoreIOError } from "../errors.js";
import { errMessage, logger } from "../logger/index.js";
import type { NewsItem } from "../types/newsItem.js";
import { mergeItems, newestFirst } from "./merge.js";

export { mergeItems, newestFirst, type MergeResult } from "./merge.js";
export { STORE_FILE_NAME } from "../config/paths.js";


export interface PersistResult {
  /** 合并后的全部条目，最新在前 */
  items: NewsItem[];
  added: number;
  updated: number;
}


const SCHEMA = `
  CREATE TABLE IF NOT EXISTS news_items (
    position        INTEGER PRIMARY KEY,
    title           TEXT,
    description     TEXT,
    raw_pub_date    TEXT,
    pub_epoch_ms    INTEGER,
    pub_offset_min  INTEGER,
    image_path      TEXT,
    content_digest  TEXT NOT NULL CHECK (length(content_digest) = 64)
  );
`;


const rowSchema = z
  .object({
    position: z.number().int(),
    title: z.string().nullable(),
    description: z.string().nullable(),
    raw_pub_date: z.string().nullable(),
    pub_epoch_ms: z.number().int().nullable(),
    pub_offset_min: z.number().int().nullable(),
    image_path: z.string().nullable(),
    content_digest: z.string().regex(/^[0-9a-f]{64}$/),
  })
  .refine((r) => (r.pub_epoch_ms === null) === (r.pub_offset_min === null), {
    message: "pub_epoch_ms 与 pub_offset_min 必须同时存在",
  });

type StoreRow = z.infer<typeof rowSchema>;


function toRow(item: NewsItem, position: number): StoreRow {
  return {
    position,
    title: item.title ?? null,
    description: item.description ?? null,
    raw_pub_date: item.rawPubDate ?? null,
    pub_epoch_ms: item.publishDate?.epochMs ?? null,
    pub_offset_min: item.publishDate?.offsetMinutes ?? null,
    image_path: item.imagePath ?? null,
    content_digest: item.contentDigest,
  };
}


function fromRow(row: StoreRow): NewsItem {
  return {
    title: row.title ?? undefined,
    description: row.description ?? undefined,
    rawPubDate: row.raw_pub_date ?? undefined,
    publishDate:
      row.pub_epoch_ms !== null && row.pub_offset_min !== null
        ? { epochMs: row.pub_epoch_ms, offsetMinutes: row.pub_offset_min }
        : undefined,
    imagePath: row.image_path ?? undefined,
    contentDigest: row.content_digest,
  };
}


async function pathExists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}


export class NewsStore {
  readonly path: string;

  constructor(cacheRoot: string, fileName = STORE_FILE_NAME) {
    this.path = join(cacheRoot, fileName);
  }

  /** 读取全部条目（持久化顺序）；文件不存在返回空列表，损坏则抛出 StoreIOError */
  async load(): Promise<NewsItem[]> {
    if (!(await pathExists(this.path))) {
      logger.debug("store", "存储文件不存在，从空集合开始", { path: this.path });
      return [];
    }
    let db: Database.Database | undefined;
    try {
      db = new Database(this.path, { readonly: true, fileMustExist: true });
      const rows: unknown[] = db.prepare("SELECT * FROM news_items ORDER BY position").all();
      return rows.map((row) => fromRow(rowSchema.parse(row)));
    } catch (err) {
      throw new StoreIOError(this.path, `存储文件无法读取: ${errMessage(err)}`, { cause: err });
    } finally {
      db?.close();
    }
  }

  /** 整体重写：单个事务内先清空再写入，失败时回滚，原内容保持不变 */
  async save(items: readonly NewsItem[]): Promise<void> {
    let db: Database.Database | undefined;
    try {
      db = new Database(this.path);
      db.exec(SCHEMA);
      const clear = db.prepare("DELETE FROM news_items");
      const insert = db.prepare(`
        INSERT INTO news_items (position, title, description, raw_pub_date, pub_epoch_ms, pub_offset_min, image_path, content_digest)
        VALUES (@position, @title, @description, @raw_pub_date, @pub_epoch_ms, @pub_offset_min, @image_path, @content_digest)
      `);
      const rewrite = db.transaction((rows: StoreRow[]) => {
        clear.run();
        for (const row of rows) insert.run(row);
      });
      rewrite(items.map(toRow));
    } catch (err) {
      throw new StoreIOError(this.path, `存储文件无法写入: ${errMessage(err)}`, { cause: err });
    } finally {
      db?.close();
    }
  }

  async mergeAndPersist(fresh: readonly NewsItem[]): Promise<PersistResult> {
    const existing = await this.load();
    const merged = mergeItems(existing, fresh);
    await this.save(merged.items);
    logger.info("store", "合并写入完成", {
      existing: existing.length,
      fresh: fresh.length,
      total: merged.items.length,
      added: merged.added,
      updated: merged.updated,
    });
    return { items: newestFirst(merged.items), added: merged.added, updated: merged.updated };
  }
}
