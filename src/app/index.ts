// App 入口：加载配置，启动定时拉取与 HTTP 服务

import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "./router.js";
import { loadConfig } from "../config/index.js";
import { createNewsService } from "../scheduler/index.js";
import { errMessage, logger } from "../logger/index.js";


async function main() {
  const config = await loadConfig();
  logger.info("app", "缓存目录", { path: config.pipeline.cacheRoot, feeds: config.pipeline.feeds.length });
  const service = createNewsService(config.pipeline);
  service.start(config.refreshInterval);
  const app = createApp(service);
  serve({ fetch: app.fetch, port: config.port });
  logger.info("app", `news-cache: http://127.0.0.1:${config.port}/api/news`);
}


main().catch((err) => {
  logger.error("app", "启动失败", { err: errMessage(err) });
  process.exit(1);
});
