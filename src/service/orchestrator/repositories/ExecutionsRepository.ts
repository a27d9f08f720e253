import pLimit, { type LimitFunction } from "p-limit";

import { JsonFileStore } from "../../../shared/persistence/JsonFileStore.js";
import { joinStatePath } from "../../../shared/environment/pathResolver.js";
import {
  isTerminal,
  WorkflowExecutionSchema,
  type ExecutionStatus,
  type WorkflowExecution
} from "../../../shared/schemas/execution.js";

export interface ExecutionsRepositoryOptions {
  /**
   * 存储目录，默认为 state/executions
   */
  directory?: string;
  now?: () => Date;
}

export interface ExecutionQuery {
  limit: number;
  offset: number;
  status?: ExecutionStatus;
  workflowId?: string;
  sortOrder?: "asc" | "desc";
}

export interface ExecutionStats {
  total: number;
  byStatus: Record<ExecutionStatus, number>;
  retryExhausted: number;
  avgDurationMs?: number;
}

const EMPTY_COUNTS: Record<ExecutionStatus, number> = {
  pending: 0,
  running: 0,
  pending_approval: 0,
  completed: 0,
  failed: 0,
  timeout: 0,
  retrying: 0,
  cancelled: 0
};

/**
 * 执行记录仓库。
 *
 * 状态迁移统一走 compareAndSet：同一 id 的读-判-写在进程内串行执行，
 * 期望状态不匹配时不写入。
 */
export class ExecutionsRepository extends JsonFileStore<WorkflowExecution> {
  private readonly locks = new Map<string, LimitFunction>();

  private readonly now: () => Date;

  constructor(options: ExecutionsRepositoryOptions = {}) {
    super({
      directory: options.directory ?? joinStatePath("executions"),
      schema: WorkflowExecutionSchema,
      idField: "id",
      logComponent: "ExecutionsRepository"
    });
    this.now = options.now ?? (() => new Date());
  }

  async compareAndSet(
    id: string,
    expected: readonly ExecutionStatus[],
    mutate: (current: WorkflowExecution) => WorkflowExecution,
    when?: (current: WorkflowExecution) => boolean
  ): Promise<WorkflowExecution | null> {
    return this.withLock(id, async () => {
      const current = await this.read(id);
      if (!current) {
        return null;
      }
      if (!expected.includes(current.status) || (when && !when(current))) {
        this.logger.info("CAS 跳过：状态不匹配", {
          executionId: id,
          expected: expected.join(","),
          actual: current.status
        });
        return null;
      }
      const next: WorkflowExecution = { ...mutate(current), id, updatedAt: this.now().toISOString() };
      return this.update(id, next);
    });
  }

  async findByStatus(statuses: ExecutionStatus | readonly ExecutionStatus[]): Promise<WorkflowExecution[]> {
    const wanted: readonly ExecutionStatus[] = typeof statuses === "string" ? [statuses] : statuses;
    const all = await this.list();
    return all.filter((execution) => wanted.includes(execution.status));
  }

  async findByWorkflowId(workflowId: string): Promise<WorkflowExecution[]> {
    const all = await this.list();
    return all.filter((execution) => execution.workflowId === workflowId);
  }

  async findByApprovalId(approvalId: string): Promise<WorkflowExecution[]> {
    const all = await this.list();
    return all.filter((execution) => execution.approvalId === approvalId);
  }

  async paginate(query: ExecutionQuery): Promise<{ executions: WorkflowExecution[]; total: number }> {
    let all = await this.list();
    if (query.status) {
      all = all.filter((execution) => execution.status === query.status);
    }
    if (query.workflowId) {
      all = all.filter((execution) => execution.workflowId === query.workflowId);
    }
    const order = query.sortOrder ?? "desc";
    all.sort((a, b) => {
      const comparison = a.startedAt.localeCompare(b.startedAt);
      return order === "asc" ? comparison : -comparison;
    });
    return {
      total: all.length,
      executions: all.slice(query.offset, query.offset + query.limit)
    };
  }

  /**
   * 只清理终态记录
   */
  async cleanupOld(daysToKeep: number): Promise<number> {
    const cutoff = new Date(this.now().getTime() - daysToKeep * 86_400_000).toISOString();
    const all = await this.list();
    const expired = all.filter((execution) => isTerminal(execution) && execution.updatedAt < cutoff);

    let deleted = 0;
    for (const execution of expired) {
      try {
        await this.delete(execution.id);
        deleted++;
      } catch (error) {
        this.logger.warn("Failed to delete old execution", {
          executionId: execution.id,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }
    return deleted;
  }

  async getStats(): Promise<ExecutionStats> {
    const all = await this.list();
    const byStatus = { ...EMPTY_COUNTS };
    let retryExhausted = 0;
    let totalDurationMs = 0;
    let finished = 0;

    for (const execution of all) {
      byStatus[execution.status]++;
      if (execution.retryExhausted) {
        retryExhausted++;
      }
      if (execution.completedAt) {
        const duration = Date.parse(execution.completedAt) - Date.parse(execution.startedAt);
        if (duration > 0) {
          totalDurationMs += duration;
          finished++;
        }
      }
    }

    const stats: ExecutionStats = { total: all.length, byStatus, retryExhausted };
    if (finished > 0) {
      stats.avgDurationMs = totalDurationMs / finished;
    }
    return stats;
  }

  private async withLock<T>(id: string, task: () => Promise<T>): Promise<T> {
    let limit = this.locks.get(id);
    if (!limit) {
      limit = pLimit(1);
      this.locks.set(id, limit);
    }
    const current = limit;
    try {
      return await current(task);
    } finally {
      if (current.activeCount === 0 && current.pendingCount === 0) {
        this.locks.delete(id);
      }
    }
  }
}
