// 调度器：按刷新间隔定时触发一轮 pipeline；同一时刻至多一轮在跑，HTTP 请求与定时器共享同一轮结果

import { emitNewsUpdated } from "../events/index.js";
import { errMessage, logger } from "../logger/index.js";
import { runNewsCycle, type CycleReport, type PipelineConfig, type PipelineDeps } from "../pipeline/index.js";
import { refreshIntervalToMs, type RefreshInterval } from "../utils/refreshInterval.js";


export interface NewsService {
  /** 运行一轮；已有一轮在跑时返回该轮的 Promise */
  refresh(): Promise<CycleReport>;
  /** 最近一次成功的结果，首轮完成前为 undefined */
  latest(): CycleReport | undefined;
  /** 立即跑一轮，之后按间隔定时运行；定时运行的失败只记日志 */
  start(interval: RefreshInterval): void;
  stop(): void;
}


export type CycleRunner = (config: PipelineConfig, deps: PipelineDeps) => Promise<CycleReport>;


export function createNewsService(config: PipelineConfig, deps: PipelineDeps = {}, runCycle: CycleRunner = runNewsCycle): NewsService {
  let inFlight: Promise<CycleReport> | undefined;
  let last: CycleReport | undefined;
  let timer: NodeJS.Timeout | undefined;

  function refresh(): Promise<CycleReport> {
    if (inFlight) return inFlight;
    const run = runCycle(config, deps)
      .then((report) => {
        last = report;
        emitNewsUpdated({ total: report.items.length, added: report.added, completedAt: report.completedAt });
        return report;
      })
      .finally(() => {
        inFlight = undefined;
      });
    inFlight = run;
    return run;
  }

  function pull(): void {
    refresh().catch((err) => {
      logger.error("scheduler", "定时拉取失败", { err: errMessage(err) });
    });
  }

  return {
    refresh,
    latest: () => last,
    start(interval) {
      if (timer) clearInterval(timer);
      pull();
      timer = setInterval(pull, refreshIntervalToMs(interval));
      logger.info("scheduler", "已调度", { interval, feeds: config.feeds.length });
    },
    stop() {
      if (timer) clearInterval(timer);
      timer = undefined;
    },
  };
}
