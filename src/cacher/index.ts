// 图片缓存：按 URL 派生路径只写一次；已存在的文件不再校验、不再下载

import { access, mkdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname, extname } from "node:path";
import pLimit from "p-limit";
import sharp from "sharp";
import { ImageFetchError } from "../errors.js";
import { errMessage, logger } from "../logger/index.js";


/** 一次缓存请求：源 URL + 由 imagePathFor 派生的目标路径 */
export interface ImageRequest {
  url: string;
  path: string;
}

export type ImageDownloader = (url: string) => Promise<Uint8Array>;


export interface CacheImagesOptions {
  download: ImageDownloader;
  /** 同时处理的图片数，默认 8 */
  concurrency?: number;
}


export interface CacheImagesResult {
  written: string[];
  skipped: string[];
  failures: ImageFetchError[];
}


const EXT_FORMATS: Record<string, keyof sharp.FormatEnum> = {
  ".jpg": "jpeg",
  ".jpeg": "jpeg",
  ".png": "png",
  ".webp": "webp",
  ".gif": "gif",
  ".avif": "avif",
  ".tif": "tiff",
  ".tiff": "tiff",
};


/** 基于全局 fetch 的下载器；非 2xx 视为失败 */
export function createImageDownloader(options: { timeoutMs?: number } = {}): ImageDownloader {
  const timeoutMs = options.timeoutMs ?? 20_000;
  return async (url) => {
    const res = await fetch(url, {
      signal: AbortSignal.timeout(timeoutMs),
      headers: { "User-Agent": "news-cache/0.1" },
    });
    if (!res.ok) throw new Error(`HTTP ${res.status} ${res.statusText}`);
    return new Uint8Array(await res.arrayBuffer());
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


/** 输出格式：优先按目标扩展名，否则沿用源图格式 */
export function formatForPath(path: string): keyof sharp.FormatEnum | undefined {
  return EXT_FORMATS[extname(path).toLowerCase()];
}


// 解码 → 重新编码 → 先写临时文件再 rename，避免半截文件被当成已缓存
async function storeImage(req: ImageRequest, bytes: Uint8Array): Promise<void> {
  const image = sharp(bytes);
  const meta = await image.metadata();
  const format = formatForPath(req.path) ?? meta.format;
  if (!format) throw new Error("无法识别的图片格式");
  const encoded = await image.toFormat(format).toBuffer();
  await mkdir(dirname(req.path), { recursive: true });
  const tmp = `${req.path}.${process.pid}.tmp`;
  try {
    await writeFile(tmp, encoded);
    await rename(tmp, req.path);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}


async function cacheOne(req: ImageRequest, download: ImageDownloader): Promise<"written" | "skipped"> {
  if (await pathExists(req.path)) return "skipped";
  const bytes = await download(req.url);
  await storeImage(req, bytes);
  return "written";
}


/** 并发缓存一批图片；同一路径只处理一次，单张失败只记录 */
export async function cacheImages(requests: readonly ImageRequest[], options: CacheImagesOptions): Promise<CacheImagesResult> {
  const byPath = new Map<string, ImageRequest>();
  for (const req of requests) {
    if (!byPath.has(req.path)) byPath.set(req.path, req);
  }
  const unique = [...byPath.values()];
  const limit = pLimit(options.concurrency ?? 8);
  const settled = await Promise.allSettled(unique.map((req) => limit(() => cacheOne(req, options.download))));
  const result: CacheImagesResult = { written: [], skipped: [], failures: [] };
  for (let i = 0; i < settled.length; i++) {
    const outcome = settled[i];
    const req = unique[i];
    if (outcome.status === "fulfilled") {
      result[outcome.value].push(req.path);
    } else {
      result.failures.push(new ImageFetchError(req.url, req.path, `图片缓存失败: ${errMessage(outcome.reason)}`, { cause: outcome.reason }));
      logger.warn("images", "图片缓存失败", { image_url: req.url, path: req.path, err: errMessage(outcome.reason) });
    }
  }
  logger.info("images", "图片缓存结束", {
    written: result.written.length,
    skipped: result.skipped.length,
    failed: result.failures.length,
  });
  return result;
}
