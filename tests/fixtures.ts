import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import sharp from "sharp";
import { createFeedParser, type FeedLoader } from "../src/fetcher/index.js";


export interface ItemFixture {
  title?: string;
  description?: string;
  pubDate?: string;
  dcDates?: string[];
  thumbnails?: Array<Record<string, string>>;
}


export function rssItem(f: ItemFixture): string {
  const parts: string[] = [];
  if (f.title !== undefined) parts.push(`<title>${f.title}</title>`);
  if (f.description !== undefined) parts.push(`<description>${f.description}</description>`);
  if (f.pubDate !== undefined) parts.push(`<pubDate>${f.pubDate}</pubDate>`);
  for (const d of f.dcDates ?? []) parts.push(`<dc:date>${d}</dc:date>`);
  for (const t of f.thumbnails ?? []) {
    const attrs = Object.entries(t).map(([k, v]) => ` ${k}="${v}"`).join("");
    parts.push(`<media:thumbnail${attrs}/>`);
  }
  return `<item>${parts.join("")}</item>`;
}


export function rssDocument(items: ItemFixture[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:media="http://search.yahoo.com/mrss/" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel>
    <title>Fixture</title>
    <link>https://example.com/</link>
    <description>Fixture feed</description>
    ${items.map(rssItem).join("\n    ")}
  </channel>
</rss>`;
}


/** 进程内 loader：按 URL 返回固定 XML，未登记的 URL 视为网络错误 */
export function fakeLoader(docs: Record<string, string>): FeedLoader {
  const parser = createFeedParser();
  return async (url) => {
    const xml = docs[url];
    if (xml === undefined) throw new Error(`connect ECONNREFUSED ${url}`);
    return parser.parseString(xml);
  };
}


export function tinyPng(): Promise<Buffer> {
  return sharp({ create: { width: 2, height: 2, channels: 3, background: { r: 255, g: 0, b: 0 } } }).png().toBuffer();
}


export function tempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "news-cache-test-"));
}
