import { Cron } from "croner";

import { ExecutionTimeoutError, RetryExhaustedError } from "../../shared/errors.js";
import { createLoggerFacade, type LoggerFacade } from "../../shared/logging/logger.js";
import { computeBackoff } from "../../shared/retry/retryWithBackoff.js";
import type { ExecutionStatus, WorkflowExecution } from "../../shared/schemas/execution.js";

/**
 * 监督器只依赖执行存储的这几个操作
 */
export interface SupervisedExecutionStore {
  findByStatus(statuses: ExecutionStatus | readonly ExecutionStatus[]): Promise<WorkflowExecution[]>;
  compareAndSet(
    id: string,
    expected: readonly ExecutionStatus[],
    mutate: (current: WorkflowExecution) => WorkflowExecution,
    when?: (current: WorkflowExecution) => boolean
  ): Promise<WorkflowExecution | null>;
}

export interface ExecutionDispatcher {
  enqueue(executionId: string, delayMs?: number): void;
}

/**
 * 审批已决定但记录仍停在 pending_approval 时由它推进
 */
export interface ApprovalReconciler {
  reconcileApproval(execution: WorkflowExecution): Promise<boolean>;
}

export interface ExecutionSupervisorOptions {
  readonly executions: SupervisedExecutionStore;
  readonly dispatcher: ExecutionDispatcher;
  readonly approvals?: ApprovalReconciler;
  readonly runningTimeoutMs: number;
  readonly startupGraceMs: number;
  readonly baseBackoffMs: number;
  readonly schedule: string;
  readonly logger?: LoggerFacade;
  readonly now?: () => Date;
}

export interface RetryScheduled {
  readonly executionId: string;
  readonly attempt: number;
  readonly delayMs: number;
}

export interface SweepReport {
  readonly sweptAt: string;
  readonly timedOut: string[];
  readonly resubmitted: string[];
  readonly retried: RetryScheduled[];
  readonly exhausted: string[];
  readonly resumed: string[];
}

const olderThan = (timestamp: string | undefined, cutoffMs: number): boolean =>
  timestamp !== undefined && Date.parse(timestamp) < cutoffMs;

/**
 * 执行监督器：超时、重新派发卡住的记录、按指数退避重试失败的执行。
 * 所有状态变更都经 CAS，与执行中的 worker 竞争时以先写入者为准。
 */
export class ExecutionSupervisor {
  private readonly options: ExecutionSupervisorOptions;

  private readonly logger: LoggerFacade;

  private readonly now: () => Date;

  private job: Cron | null = null;

  private last: SweepReport | null = null;

  constructor(options: ExecutionSupervisorOptions) {
    this.options = options;
    this.logger = options.logger ?? createLoggerFacade("supervisor");
    this.now = options.now ?? (() => new Date());
  }

  get lastReport(): SweepReport | null {
    return this.last;
  }

  get running(): boolean {
    return this.job !== null;
  }

  start(): void {
    if (this.job) {
      return;
    }
    this.job = new Cron(this.options.schedule, { protect: true }, async () => {
      try {
        await this.sweep();
      } catch (error) {
        this.logger.error("监督扫描失败", error);
      }
    });
    this.logger.info(`监督器已启动 (${this.options.schedule})`);
  }

  stop(): void {
    this.job?.stop();
    this.job = null;
  }

  async sweep(at: Date = this.now()): Promise<SweepReport> {
    const nowMs = at.getTime();
    const report: SweepReport = {
      sweptAt: at.toISOString(),
      timedOut: await this.timeOutStuck(nowMs),
      resubmitted: await this.resubmitStale(nowMs),
      retried: [],
      exhausted: [],
      resumed: await this.resumeDecided()
    };

    const failed = await this.options.executions.findByStatus("failed");
    for (const execution of failed) {
      if (execution.retryCount < execution.maxRetries) {
        const scheduled = await this.scheduleRetry(execution, nowMs);
        if (scheduled) {
          report.retried.push(scheduled);
        }
      } else if (!execution.retryExhausted && (await this.markExhausted(execution))) {
        report.exhausted.push(execution.id);
      }
    }

    this.last = report;
    const touched =
      report.timedOut.length + report.resubmitted.length + report.retried.length + report.exhausted.length + report.resumed.length;
    if (touched > 0) {
      this.logger.info("监督扫描完成", {
        timedOut: report.timedOut.length,
        resubmitted: report.resubmitted.length,
        retried: report.retried.length,
        exhausted: report.exhausted.length,
        resumed: report.resumed.length
      });
    }
    return report;
  }

  private async timeOutStuck(nowMs: number): Promise<string[]> {
    const { runningTimeoutMs } = this.options;
    const cutoff = nowMs - runningTimeoutMs;
    const timedOut: string[] = [];
    const running = await this.options.executions.findByStatus("running");

    for (const execution of running) {
      if (!olderThan(execution.updatedAt, cutoff)) {
        continue;
      }
      const error = new ExecutionTimeoutError(execution.id, runningTimeoutMs);
      const updated = await this.options.executions.compareAndSet(
        execution.id,
        ["running"],
        (current) => ({
          ...current,
          status: "timeout",
          error: error.message,
          completedAt: new Date(nowMs).toISOString()
        }),
        // 期间有进度写入则不再算卡住
        (current) => olderThan(current.updatedAt, cutoff)
      );
      if (updated) {
        this.logger.warn(error.message, { executionId: execution.id, workflowId: execution.workflowId });
        timedOut.push(execution.id);
      }
    }
    return timedOut;
  }

  private async resubmitStale(nowMs: number): Promise<string[]> {
    const cutoff = nowMs - this.options.startupGraceMs;
    const candidates = await this.options.executions.findByStatus(["pending", "retrying"]);
    const resubmitted: string[] = [];

    for (const execution of candidates) {
      const reference = execution.status === "pending" ? execution.startedAt : execution.nextAttemptAt;
      if (!olderThan(reference, cutoff)) {
        continue;
      }
      this.options.dispatcher.enqueue(execution.id, 0);
      this.logger.info(`重新派发停滞的执行 ${execution.id}`, { executionId: execution.id, status: execution.status });
      resubmitted.push(execution.id);
    }
    return resubmitted;
  }

  private async resumeDecided(): Promise<string[]> {
    const { approvals } = this.options;
    if (!approvals) {
      return [];
    }
    const resumed: string[] = [];
    for (const execution of await this.options.executions.findByStatus("pending_approval")) {
      if (await approvals.reconcileApproval(execution)) {
        this.logger.warn(`执行 ${execution.id} 的审批已决定但仍在等待，已补做恢复`, {
          executionId: execution.id,
          approvalId: execution.approvalId
        });
        resumed.push(execution.id);
      }
    }
    return resumed;
  }

  private async scheduleRetry(execution: WorkflowExecution, nowMs: number): Promise<RetryScheduled | null> {
    const delayMs = computeBackoff(this.options.baseBackoffMs, execution.retryCount);
    const updated = await this.options.executions.compareAndSet(
      execution.id,
      ["failed"],
      (current) => ({
        ...current,
        status: "retrying",
        retryCount: current.retryCount + 1,
        nextAttemptAt: new Date(nowMs + delayMs).toISOString()
      }),
      (current) => current.retryCount === execution.retryCount
    );
    if (!updated) {
      return null;
    }
    this.options.dispatcher.enqueue(execution.id, delayMs);
    this.logger.info(`执行 ${execution.id} 第 ${updated.retryCount} 次重试，延迟 ${delayMs}ms`, {
      executionId: execution.id,
      previousError: execution.error
    });
    return { executionId: execution.id, attempt: updated.retryCount, delayMs };
  }

  private async markExhausted(execution: WorkflowExecution): Promise<boolean> {
    const updated = await this.options.executions.compareAndSet(
      execution.id,
      ["failed"],
      (current) => ({ ...current, retryExhausted: true }),
      (current) => current.retryExhausted !== true
    );
    if (!updated) {
      return false;
    }
    this.logger.error("RetryExhausted", new RetryExhaustedError(execution.id, execution.retryCount), {
      executionId: execution.id,
      workflowId: execution.workflowId
    });
    return true;
  }
}
