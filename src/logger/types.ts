// 日志类型与结构化条目
// 控制台由 LOG_LEVEL 过滤（默认 info），单条失败（信源/图片）记 warn，整轮失败记 error。

/** 日志级别（debug < info < warn < error） */
export type LogLevel = "error" | "warn" | "info" | "debug";

/** 日志分类：按模块筛选 */
export type LogCategory =
  | "fetcher"    // 信源拉取与解析
  | "normalizer" // 条目归一化
  | "images"     // 图片缓存
  | "store"      // 持久化存储
  | "pipeline"   // 单轮 fetch → merge → persist
  | "scheduler"  // 定时拉取
  | "app"        // HTTP 服务、启动
  | "config";    // 配置与缓存目录

/** payload 常用字段约定（非强制） */
export interface LogPayloadConvention {
  /** 错误对象 message，避免序列化整个 Error */
  err?: string;
  /** 信源 URL */
  feed_url?: string;
  /** 图片 URL */
  image_url?: string;
  [k: string]: unknown;
}

/** 单条日志的结构化数据 */
export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  payload?: Record<string, unknown>;
  created_at: string;
}
