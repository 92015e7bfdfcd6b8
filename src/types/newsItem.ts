/**
 * 系统内部统一的条目定义
 * Fetcher → Normalizer → Image Cache / Store
 */


/** 信源地址，启动时配置后不再变化 */
export type FeedEndpoint = string;


/** 从信源文档中解析出的原始条目，归一化后即丢弃 */
export interface RawEntry {
  /** 所属信源 */
  feedUrl: FeedEndpoint;
  title?: string;
  description?: string;
  /** 原生发布时间字符串（RSS pubDate / Atom published），未解析 */
  pubDate?: string;
  /** Dublin Core dc:date 列表，按文档顺序 */
  dcDates: string[];
  /** media:thumbnail 元素的属性表，按文档顺序 */
  thumbnails: Array<Record<string, string>>;
}


/** 带固定时区偏移的时间点 */
export interface PublishDate {
  /** UTC 毫秒时间戳，用于排序 */
  epochMs: number;
  /** 相对 UTC 的偏移（分钟），如 +08:00 为 480 */
  offsetMinutes: number;
}


export interface NewsItem {
  title?: string;
  description?: string;
  /** 原生发布时间字符串，参与身份判定 */
  rawPubDate?: string;
  /** 解析后的发布时间；两种来源都无法解析时为 undefined */
  publishDate?: PublishDate;
  /** 图片缓存路径；仅表示应在的位置，文件不一定已存在 */
  imagePath?: string;
  /** sha256(title + description) 的十六进制 */
  contentDigest: string;
}
