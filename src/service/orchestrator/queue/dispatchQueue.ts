import pLimit, { type LimitFunction } from "p-limit";

import { createLoggerFacade, type LoggerFacade } from "../../../shared/logging/logger.js";

export interface DispatchQueue {
  enqueue(executionId: string, delayMs?: number): void;
  close(): Promise<void>;
}

export interface InProcessDispatchQueueOptions {
  readonly worker: (executionId: string) => Promise<void>;
  readonly concurrency: number;
  readonly logger?: LoggerFacade;
}

/**
 * 进程内派发队列：延迟用定时器实现，并发由 p-limit 限制。
 * 至少一次语义，重复派发由执行记录的 CAS 去重。
 */
export class InProcessDispatchQueue implements DispatchQueue {
  private readonly worker: (executionId: string) => Promise<void>;

  private readonly limit: LimitFunction;

  private readonly logger: LoggerFacade;

  private readonly timers = new Set<NodeJS.Timeout>();

  private readonly inflight = new Set<Promise<void>>();

  private closed = false;

  constructor(options: InProcessDispatchQueueOptions) {
    this.worker = options.worker;
    this.limit = pLimit(Math.max(1, options.concurrency));
    this.logger = options.logger ?? createLoggerFacade("dispatch-queue");
  }

  enqueue(executionId: string, delayMs = 0): void {
    if (this.closed) {
      this.logger.warn("队列已关闭，忽略派发", { executionId });
      return;
    }
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.dispatch(executionId);
    }, Math.max(0, delayMs));
    this.timers.add(timer);
  }

  get size(): number {
    return this.timers.size + this.inflight.size;
  }

  /**
   * 等待当前已到期的任务全部结束
   */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    await this.drain();
  }

  private dispatch(executionId: string): void {
    const task = this.limit(() => this.worker(executionId))
      .catch((error: unknown) => {
        this.logger.error("执行派发失败", error, { executionId });
      })
      .finally(() => {
        this.inflight.delete(task);
      });
    this.inflight.add(task);
  }
}
