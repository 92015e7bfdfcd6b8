// 错误分类：配置与存储错误向上抛出终止本轮；信源、条目、图片错误就地记录不传播


export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}


/** 单个信源不可达或文档无法解析 */
export class FeedFetchError extends Error {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FeedFetchError";
    this.url = url;
  }
}


/** 条目缺少计算摘要所需的 title 或 description */
export class MissingContentError extends Error {
  readonly field: "title" | "description";

  constructor(field: "title" | "description") {
    super(`条目缺少 ${field}，无法计算内容摘要`);
    this.name = "MissingContentError";
    this.field = field;
  }
}


/** 单张图片下载、解码或写入失败 */
export class ImageFetchError extends Error {
  readonly url: string;
  readonly path: string;

  constructor(url: string, path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ImageFetchError";
    this.url = url;
    this.path = path;
  }
}


/** 持久化存储不可读（损坏）或不可写 */
export class StoreIOError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreIOError";
    this.path = path;
  }
}
