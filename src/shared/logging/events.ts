export type LogLevel = "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 };

/**
 * 发布给服务内订阅者的日志条目；component 为 createLoggerFacade 的组件名
 */
export interface LogEntry {
  readonly time: string;
  readonly level: LogLevel;
  readonly component: string;
  readonly message: string;
  readonly context: Record<string, unknown>;
}

export interface RecentLogQuery {
  /** 最低级别 */
  readonly level?: LogLevel;
  readonly component?: string;
  readonly executionId?: string;
  readonly limit?: number;
}

/**
 * 最近日志的环形缓冲，/logs/recent 从这里读取
 */
export class RecentLogBuffer {
  private readonly entries: LogEntry[] = [];

  constructor(private readonly capacity = 500) {}

  readonly push = (entry: LogEntry): void => {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  };

  /**
   * 新条目在前
   */
  list(query: RecentLogQuery = {}): LogEntry[] {
    const minimum = LEVEL_ORDER[query.level ?? "info"];
    const matched = this.entries.filter(
      (entry) =>
        LEVEL_ORDER[entry.level] >= minimum &&
        (query.component === undefined || entry.component === query.component) &&
        (query.executionId === undefined || entry.context.executionId === query.executionId)
    );
    return matched.reverse().slice(0, query.limit ?? 100);
  }

  get size(): number {
    return this.entries.length;
  }
}
