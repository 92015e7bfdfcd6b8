// 统一日志：按级别输出到控制台，单条失败只记录不中断

import { getConsoleLevel, shouldLogToConsole } from "./config.js";
import type { LogCategory, LogEntry, LogLevel, LogPayloadConvention } from "./types.js";

export type { LogCategory, LogLevel } from "./types.js";

function now(): string {
  return new Date().toISOString();
}

export function formatConsole(entry: LogEntry): string {
  const payloadStr =
    entry.payload != null && Object.keys(entry.payload).length > 0
      ? " " + JSON.stringify(entry.payload)
      : "";
  return `${entry.created_at} [${entry.category}] ${entry.message}${payloadStr}`;
}

function writeConsole(entry: LogEntry): void {
  const line = formatConsole(entry);
  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function emit(level: LogLevel, category: LogCategory, message: string, meta?: LogPayloadConvention): void {
  if (!shouldLogToConsole(getConsoleLevel(), level)) return;
  writeConsole({
    level,
    category,
    message,
    payload: meta && Object.keys(meta).length > 0 ? { ...meta } : undefined,
    created_at: now(),
  });
}

/** 错误转为可记录的 message */
export function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** 统一 logger：控制台由 LOG_LEVEL 过滤 */
export const logger = {
  error(category: LogCategory, message: string, meta?: LogPayloadConvention) {
    emit("error", category, message, meta);
  },
  warn(category: LogCategory, message: string, meta?: LogPayloadConvention) {
    emit("warn", category, message, meta);
  },
  info(category: LogCategory, message: string, meta?: LogPayloadConvention) {
    emit("info", category, message, meta);
  },
  debug(category: LogCategory, message: string, meta?: LogPayloadConvention) {
    emit("debug", category, message, meta);
  },
};
