// 发布时间解析：RFC-822 原生日期优先，失败回退到 dc:date（ISO-8601），保留原始时区偏移

import type { PublishDate } from "../types/newsItem.js";


const WEEKDAYS = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"];
const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

// "Tue, 02 Jan 2024 10:00:00 +0000"
const RFC822_RE = /^([a-z]{3}), (\d{1,2}) ([a-z]{3}) (\d{4}) (\d{2}):(\d{2}):(\d{2}) ([+-]\d{4}|gmt|ut|utc|z)$/i;

// "2023-05-01T08:00:00+00:00"、"2023-05-01T08:00:00.250Z"
const ISO8601_RE = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:?\d{2})$/i;


interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millis: number;
}


// 墙上时间 + 偏移 → PublishDate；字段越界（如 2 月 30 日）返回 undefined
function fromWallClock(wc: WallClock, offsetMinutes: number): { date: PublishDate; weekday: number } | undefined {
  if (wc.month < 1 || wc.month > 12 || wc.day < 1) return undefined;
  if (wc.hour > 23 || wc.minute > 59 || wc.second > 59) return undefined;
  const local = new Date(0);
  local.setUTCFullYear(wc.year, wc.month - 1, wc.day);
  local.setUTCHours(wc.hour, wc.minute, wc.second, wc.millis);
  if (local.getUTCMonth() !== wc.month - 1 || local.getUTCDate() !== wc.day) return undefined;
  return {
    date: { epochMs: local.getTime() - offsetMinutes * 60_000, offsetMinutes },
    weekday: local.getUTCDay(),
  };
}


// "+0530" / "-08:00" → 分钟
function parseOffset(s: string): number | undefined {
  const m = /^([+-])(\d{2}):?(\d{2})$/.exec(s);
  if (!m) return undefined;
  const minutes = Number(m[3]);
  if (minutes > 59) return undefined;
  const total = Number(m[2]) * 60 + minutes;
  return m[1] === "-" ? -total : total;
}


/** 按 "<weekday>, <day> <month> <year> <hh>:<mm>:<ss> <offset>" 解析；星期必须与日期一致 */
export function parseRfc822(raw: string): PublishDate | undefined {
  const m = RFC822_RE.exec(raw.trim());
  if (!m) return undefined;
  const month = MONTHS.indexOf(m[3].toLowerCase()) + 1;
  const weekday = WEEKDAYS.indexOf(m[1].toLowerCase());
  if (month === 0 || weekday === -1) return undefined;
  const zone = m[8].toLowerCase();
  const offset = /^[+-]/.test(zone) ? parseOffset(zone) : 0;
  if (offset === undefined) return undefined;
  const parsed = fromWallClock(
    { year: Number(m[4]), month, day: Number(m[2]), hour: Number(m[5]), minute: Number(m[6]), second: Number(m[7]), millis: 0 },
    offset
  );
  if (!parsed || parsed.weekday !== weekday) return undefined;
  return parsed.date;
}


/** 解析带偏移的 ISO-8601 时间；无偏移视为无法解析 */
export function parseIso8601(raw: string): PublishDate | undefined {
  const m = ISO8601_RE.exec(raw.trim());
  if (!m) return undefined;
  const offset = m[8].toUpperCase() === "Z" ? 0 : parseOffset(m[8]);
  if (offset === undefined) return undefined;
  const millis = m[7] ? Number(m[7].slice(0, 3).padEnd(3, "0")) : 0;
  const parsed = fromWallClock(
    { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]), hour: Number(m[4]), minute: Number(m[5]), second: Number(m[6]), millis },
    offset
  );
  return parsed?.date;
}


/** 原生日期优先；缺失或无法解析时取第一个 dc:date */
export function parsePublishDate(pubDate: string | undefined, dcDates: readonly string[]): PublishDate | undefined {
  if (pubDate !== undefined) {
    const native = parseRfc822(pubDate);
    if (native) return native;
  }
  const first = dcDates[0];
  return first !== undefined ? parseIso8601(first) : undefined;
}


function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}


/** 输出为带原始偏移的 ISO-8601，如 2024-01-02T10:00:00+00:00 */
export function formatPublishDate(date: PublishDate): string {
  const local = new Date(date.epochMs + date.offsetMinutes * 60_000);
  const ms = local.getUTCMilliseconds();
  const sign = date.offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(date.offsetMinutes);
  return (
    `${pad(local.getUTCFullYear(), 4)}-${pad(local.getUTCMonth() + 1)}-${pad(local.getUTCDate())}` +
    `T${pad(local.getUTCHours())}:${pad(local.getUTCMinutes())}:${pad(local.getUTCSeconds())}` +
    (ms > 0 ? `.${pad(ms, 3)}` : "") +
    `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`
  );
}


/** 按时间点排序；undefined 排在所有有值日期之前 */
export function comparePublishDate(a: PublishDate | undefined, b: PublishDate | undefined): number {
  if (a === undefined) return b === undefined ? 0 : -1;
  if (b === undefined) return 1;
  return a.epochMs - b.epochMs;
}
