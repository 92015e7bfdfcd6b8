// 路径配置：解析平台相关的缓存根目录；条目存储与图片缓存都位于其下

import { mkdir } from "node:fs/promises";
import { homedir } from "node:os";
import { posix, resolve, win32 } from "node:path";
import { ConfigurationError } from "../errors.js";
import { errMessage, logger } from "../logger/index.js";


/** 缓存目录名 */
export const APP_DIR_NAME = "news-cache";


/** 条目存储文件名，位于缓存根目录 */
export const STORE_FILE_NAME = "news_items.db";


// SQLite 会在存储文件旁边创建这些文件，图片不得占用
const STORE_SIDE_SUFFIXES = ["", "-journal", "-wal", "-shm"];


/** 缓存根目录下的一级名称是否被条目存储占用（大小写不敏感的文件系统上同样冲突） */
export function isStoreEntryName(name: string): boolean {
  const lower = name.toLowerCase();
  return STORE_SIDE_SUFFIXES.some((suffix) => lower === `${STORE_FILE_NAME}${suffix}`);
}


export interface CacheRootOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  home?: string;
}


/**
 * 缓存根目录：NEWS_CACHE_DIR 优先；否则
 * Linux 用 $XDG_CACHE_HOME/news-cache（默认 ~/.cache），
 * macOS 用 ~/Library/Caches/news-cache，Windows 用 %LOCALAPPDATA%\news-cache\cache。
 */
export function resolveCacheRoot(options: CacheRootOptions = {}): string {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  if (env.NEWS_CACHE_DIR) return resolve(env.NEWS_CACHE_DIR);
  const home = options.home ?? homedir();
  if (platform === "win32") {
    const base = env.LOCALAPPDATA || (home ? win32.join(home, "AppData", "Local") : "");
    if (!base) throw new ConfigurationError("无法确定缓存目录：LOCALAPPDATA 与用户目录均不可用");
    return win32.join(base, APP_DIR_NAME, "cache");
  }
  if (platform === "darwin") {
    if (!home) throw new ConfigurationError("无法确定缓存目录：用户目录不可用");
    return posix.join(home, "Library", "Caches", APP_DIR_NAME);
  }
  // XDG 规范要求绝对路径，相对路径忽略
  const xdg = env.XDG_CACHE_HOME;
  if (xdg && posix.isAbsolute(xdg)) return posix.join(xdg, APP_DIR_NAME);
  if (!home) throw new ConfigurationError("无法确定缓存目录：用户目录不可用");
  return posix.join(home, ".cache", APP_DIR_NAME);
}


/** 创建缓存根目录（幂等）；失败即配置错误，本轮不发起任何网络请求 */
export async function ensureCacheRoot(cacheRoot: string): Promise<void> {
  try {
    await mkdir(cacheRoot, { recursive: true });
  } catch (err) {
    logger.error("config", "缓存目录创建失败", { path: cacheRoot, err: errMessage(err) });
    throw new ConfigurationError(`缓存目录无法创建: ${cacheRoot}`, { cause: err });
  }
}
