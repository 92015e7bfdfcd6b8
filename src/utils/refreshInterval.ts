// RefreshInterval：类型定义 + interval → ms 转换，供配置与调度共用


/** 合法的刷新间隔值列表（用于运行时校验） */
export const VALID_INTERVALS = ["10min", "30min", "1h", "6h", "12h", "1day"] as const;


/** 刷新间隔类型 */
export type RefreshInterval = (typeof VALID_INTERVALS)[number];


/** 将 RefreshInterval 转换为对应的毫秒数 */
export function refreshIntervalToMs(interval: RefreshInterval): number {
  const map: Record<RefreshInterval, number> = {
    "10min": 10 * 60 * 1000,
    "30min": 30 * 60 * 1000,
    "1h": 60 * 60 * 1000,
    "6h": 6 * 60 * 60 * 1000,
    "12h": 12 * 60 * 60 * 1000,
    "1day": 24 * 60 * 60 * 1000,
  };
  return map[interval];
}
