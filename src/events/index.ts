// 事件总线：进程内单例 EventEmitter，供新闻服务 emit、HTTP 层 subscribe

import { EventEmitter } from "node:events";


/** news:updated 事件的载荷 */
export interface NewsUpdatedEvent {
  total: number;
  added: number;
  completedAt: string;
}


/** 全局单例事件总线，setMaxListeners 避免 SSE 多连接时的警告 */
export const eventBus = new EventEmitter();
eventBus.setMaxListeners(200);


export function emitNewsUpdated(payload: NewsUpdatedEvent): void {
  eventBus.emit("news:updated", payload);
}


/** 订阅 news:updated 事件，返回取消订阅函数 */
export function onNewsUpdated(fn: (e: NewsUpdatedEvent) => void): () => void {
  eventBus.on("news:updated", fn);
  return () => eventBus.off("news:updated", fn);
}
