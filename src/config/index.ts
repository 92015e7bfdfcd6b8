// 运行配置：从环境变量读取并校验，显式传入 pipeline，不依赖进程级全局状态

import { join } from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import type { PipelineConfig } from "../pipeline/index.js";
import { VALID_INTERVALS, type RefreshInterval } from "../utils/refreshInterval.js";
import { loadFeeds } from "./feeds.js";
import { resolveCacheRoot } from "./paths.js";


export interface AppConfig {
  pipeline: PipelineConfig;
  refreshInterval: RefreshInterval;
  port: number;
}


const envSchema = z.object({
  FEEDS_CONFIG_PATH: z.string().min(1).optional(),
  NEWS_REFRESH: z.enum(VALID_INTERVALS).default("30min"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3752),
  FEED_CONCURRENCY: z.coerce.number().int().positive().default(4),
  IMAGE_CONCURRENCY: z.coerce.number().int().positive().default(8),
  FEED_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  IMAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
});


export async function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): Promise<AppConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigurationError(`环境变量配置错误: ${detail}`);
  }
  const e = parsed.data;
  const feeds = await loadFeeds(e.FEEDS_CONFIG_PATH ?? join(cwd, "feeds.json"));
  return {
    pipeline: {
      cacheRoot: resolveCacheRoot({ env }),
      feeds,
      feedConcurrency: e.FEED_CONCURRENCY,
      imageConcurrency: e.IMAGE_CONCURRENCY,
      feedTimeoutMs: e.FEED_TIMEOUT_MS,
      imageTimeoutMs: e.IMAGE_TIMEOUT_MS,
    },
    refreshInterval: e.NEWS_REFRESH,
    port: e.PORT,
  };
}
