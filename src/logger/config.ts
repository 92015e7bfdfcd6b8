// 日志级别：只认 LOG_LEVEL 一个变量，不经过 loadConfig，配置加载失败时也能输出

import type { LogLevel } from "./types.js";

// 从低到高；下标即级别大小
const LEVEL_ORDER: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/** 未设置 LOG_LEVEL 时的控制台级别；测试里由 vitest.config.ts 设为 error */
export const DEFAULT_CONSOLE_LEVEL: LogLevel = "info";

export function parseLevel(s: string | undefined, fallback: LogLevel): LogLevel {
  const v = s?.trim().toLowerCase();
  if (!v) return fallback;
  return LEVEL_ORDER.find((l) => l === v) ?? fallback;
}

export function getConsoleLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  return parseLevel(env.LOG_LEVEL, DEFAULT_CONSOLE_LEVEL);
}

export function shouldLogToConsole(consoleLevel: LogLevel, entryLevel: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(entryLevel) >= LEVEL_ORDER.indexOf(consoleLevel);
}
