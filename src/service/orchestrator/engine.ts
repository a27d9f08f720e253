import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";

import type { GraphExecutor } from "../../orchestrator/executor/executor.js";
import type { ExecutionOutcome } from "../../orchestrator/executor/types.js";
import { buildWorkflowGraph, parseWorkflow } from "../../orchestrator/workflow/loader.js";
import type { ApprovalManager } from "../../shared/approvals/manager.js";
import type { ApprovalRequest } from "../../shared/approvals/types.js";
import { ExecutionNotFoundError, ValidationError, WorkflowNotFoundError } from "../../shared/errors.js";
import { createLoggerFacade, type LoggerFacade } from "../../shared/logging/logger.js";
import {
  isTerminal,
  type ExecutionStatus,
  type StepRecord,
  type WorkflowExecution
} from "../../shared/schemas/execution.js";
import type { WorkflowDefinition } from "../../shared/schemas/workflow.js";
import { InProcessDispatchQueue, type DispatchQueue } from "./queue/dispatchQueue.js";
import type { ExecutionQuery, ExecutionsRepository } from "./repositories/ExecutionsRepository.js";
import type { WorkflowsRepository } from "./repositories/WorkflowsRepository.js";

export interface TriggerOptions {
  /** 关联的审批请求；仍待审批时执行以 pending_approval 创建 */
  readonly approvalId?: string;
}

export interface WorkflowEngineOptions {
  readonly workflows: WorkflowsRepository;
  readonly executions: ExecutionsRepository;
  readonly executor: GraphExecutor;
  readonly approvals?: ApprovalManager;
  readonly maxRetries: number;
  readonly maxConcurrency: number;
  /** 不传则用进程内队列，worker 为 processExecution */
  readonly queue?: DispatchQueue;
  readonly logger?: LoggerFacade;
  readonly now?: () => Date;
  readonly idFactory?: () => string;
}

export interface WorkflowEngineEvents {
  "execution.updated": [WorkflowExecution];
}

const isApproved = (request: ApprovalRequest): boolean =>
  request.status === "approved" || request.status === "auto_approved";

const CANCELLABLE: readonly ExecutionStatus[] = ["pending", "running", "pending_approval", "retrying", "failed"];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function mergeSteps(existing: readonly StepRecord[], updates: readonly StepRecord[]): StepRecord[] {
  const merged = [...existing];
  for (const record of updates) {
    const index = merged.findIndex((item) => item.stepId === record.stepId && item.startedAt === record.startedAt);
    if (index >= 0) {
      merged[index] = record;
    } else {
      merged.push(record);
    }
  }
  return merged;
}

function applyOutcome(current: WorkflowExecution, outcome: ExecutionOutcome): WorkflowExecution {
  const { resume: _resume, approvalId: _approvalId, error: _error, completedAt: _completedAt, ...rest } = current;
  return {
    ...rest,
    status: outcome.status,
    steps: mergeSteps(current.steps, outcome.steps),
    ...(outcome.result ? { result: outcome.result } : {}),
    ...(outcome.error ? { error: outcome.error } : {}),
    ...(outcome.completedAt ? { completedAt: outcome.completedAt } : {}),
    ...(outcome.approvalId ? { approvalId: outcome.approvalId } : current.approvalId ? { approvalId: current.approvalId } : {}),
    ...(outcome.resume ? { resume: outcome.resume } : {})
  };
}

/**
 * 工作流引擎：登记定义、创建执行、通过派发队列驱动执行器，并把审批决定接回执行。
 */
export class WorkflowEngine extends EventEmitter<WorkflowEngineEvents> {
  private readonly workflows: WorkflowsRepository;

  private readonly executions: ExecutionsRepository;

  private readonly executor: GraphExecutor;

  private readonly approvals?: ApprovalManager;

  private readonly maxRetries: number;

  private readonly queue: DispatchQueue;

  private readonly logger: LoggerFacade;

  private readonly now: () => Date;

  private readonly idFactory: () => string;

  private readonly unsubscribe?: () => void;

  constructor(options: WorkflowEngineOptions) {
    super();
    this.workflows = options.workflows;
    this.executions = options.executions;
    this.executor = options.executor;
    this.approvals = options.approvals;
    this.maxRetries = options.maxRetries;
    this.logger = options.logger ?? createLoggerFacade("workflow-engine");
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? (() => `exec-${randomUUID()}`);

    this.queue =
      options.queue ??
      new InProcessDispatchQueue({
        worker: (executionId) => this.processExecution(executionId),
        concurrency: options.maxConcurrency
      });

    this.unsubscribe = this.approvals?.onDecision(async (request) => {
      await this.resumeAfterApproval(request.id, isApproved(request), request.responseReason);
    });
  }

  /**
   * 已存在的 id 会生成下一个版本
   */
  async registerWorkflow(raw: unknown): Promise<WorkflowDefinition> {
    const parsed = parseWorkflow(raw);
    const latest = await this.workflows.get(parsed.id);
    const definition = buildWorkflowGraph({
      ...parsed,
      version: latest ? latest.version + 1 : parsed.version,
      createdAt: this.now().toISOString()
    }).definition;
    const saved = await this.workflows.save(definition);
    this.logger.info(`工作流 ${saved.id} 已登记 v${saved.version}`, { workflowId: saved.id });
    return saved;
  }

  async getWorkflow(id: string, version?: number): Promise<WorkflowDefinition | null> {
    return this.workflows.get(id, version);
  }

  async listWorkflows(): Promise<WorkflowDefinition[]> {
    return this.workflows.listLatest();
  }

  async trigger(workflowId: string, payload: unknown, options: TriggerOptions = {}): Promise<WorkflowExecution> {
    if (!isPlainObject(payload)) {
      throw new ValidationError("triggerPayload must be an object", [{ path: "triggerPayload", message: "expected object" }]);
    }
    const definition = await this.workflows.get(workflowId);
    if (!definition) {
      throw new WorkflowNotFoundError(workflowId);
    }
    if (!definition.enabled) {
      throw new ValidationError(`Workflow ${workflowId} is disabled`, [{ path: "workflowId", message: "workflow disabled" }]);
    }

    let status: ExecutionStatus = "pending";
    if (options.approvalId && this.approvals) {
      const approval = await this.approvals.getRequest(options.approvalId);
      if (approval?.status === "pending") {
        status = "pending_approval";
      } else if (approval?.status === "rejected") {
        status = "cancelled";
      }
    }

    const timestamp = this.now().toISOString();
    const execution = await this.executions.create({
      id: this.idFactory(),
      workflowId,
      workflowVersion: definition.version,
      status,
      triggerPayload: payload,
      startedAt: timestamp,
      updatedAt: timestamp,
      retryCount: 0,
      maxRetries: this.maxRetries,
      steps: [],
      ...(options.approvalId ? { approvalId: options.approvalId } : {}),
      ...(status === "cancelled" ? { error: "Approval rejected", completedAt: timestamp } : {})
    });

    this.logger.info(`执行 ${execution.id} 已创建 (${status})`, { workflowId, executionId: execution.id });
    this.emit("execution.updated", execution);
    if (status === "pending") {
      this.enqueue(execution.id);
    } else if (status === "pending_approval") {
      // 读取审批与创建记录之间审批可能已经决定
      await this.reconcileApproval(execution);
    }
    return execution;
  }

  enqueue(executionId: string, delayMs = 0): void {
    this.queue.enqueue(executionId, delayMs);
  }

  /**
   * 领取并运行一次执行；记录不处于 pending/retrying 时什么也不做
   */
  async processExecution(executionId: string): Promise<void> {
    const claimed = await this.executions.compareAndSet(executionId, ["pending", "retrying"], (current) => {
      const { nextAttemptAt: _next, error: _error, completedAt: _completed, ...rest } = current;
      return { ...rest, status: "running" };
    });
    if (!claimed) {
      return;
    }
    this.emit("execution.updated", claimed);

    const definition = await this.workflows.get(claimed.workflowId, claimed.workflowVersion);
    if (!definition) {
      await this.finish(executionId, {
        status: "failed",
        steps: [],
        error: new WorkflowNotFoundError(claimed.workflowId).message,
        completedAt: this.now().toISOString()
      });
      return;
    }

    const outcome = await this.executor.run(buildWorkflowGraph(definition), claimed, {
      now: this.now,
      isCancelled: async () => (await this.executions.read(executionId))?.status === "cancelled",
      onStepRecorded: async (record) => {
        await this.executions.compareAndSet(executionId, ["running"], (current) => ({
          ...current,
          steps: mergeSteps(current.steps, [record])
        }));
      }
    });
    await this.finish(executionId, outcome);
  }

  /**
   * 审批通过：pending_approval 转回 pending 并带上恢复点重新派发；驳回则取消
   */
  async resumeAfterApproval(approvalId: string, approved: boolean, reason?: string): Promise<string[]> {
    const moved: string[] = [];
    const waiting = (await this.executions.findByApprovalId(approvalId)).filter(
      (execution) => execution.status === "pending_approval"
    );

    for (const execution of waiting) {
      const updated = await this.executions.compareAndSet(execution.id, ["pending_approval"], (current) => {
        if (!approved) {
          const { resume: _resume, ...rest } = current;
          return {
            ...rest,
            status: "cancelled",
            error: `Approval rejected: ${reason && reason.length > 0 ? reason : "no reason given"}`,
            completedAt: this.now().toISOString()
          };
        }
        const { resume, ...rest } = current;
        const decidedAt = this.now().toISOString();
        return {
          ...rest,
          status: "pending",
          steps: current.steps.map((record) =>
            resume && record.stepId === resume.afterStepId && record.status === "pending"
              ? { ...record, status: "completed", completedAt: decidedAt, result: { approvalId, status: "approved" } }
              : record
          ),
          ...(resume
            ? {
                resume: {
                  afterStepId: resume.afterStepId,
                  context: {
                    ...resume.context,
                    [resume.afterStepId]: { approvalId, status: "approved" }
                  }
                }
              }
            : {})
        };
      });
      if (!updated) {
        continue;
      }
      moved.push(updated.id);
      this.emit("execution.updated", updated);
      this.logger.info(`执行 ${updated.id} 审批${approved ? "通过" : "驳回"}`, { executionId: updated.id, approvalId });
      if (updated.status === "pending") {
        this.enqueue(updated.id);
      }
    }
    return moved;
  }

  /**
   * 停在 pending_approval 而审批已有结果时补做恢复，返回记录是否被推进
   */
  async reconcileApproval(execution: WorkflowExecution): Promise<boolean> {
    if (execution.status !== "pending_approval" || !execution.approvalId || !this.approvals) {
      return false;
    }
    const request = await this.approvals.getRequest(execution.approvalId);
    if (!request || (!isApproved(request) && request.status !== "rejected")) {
      return false;
    }
    const moved = await this.resumeAfterApproval(request.id, isApproved(request), request.responseReason);
    return moved.includes(execution.id);
  }

  async cancel(executionId: string): Promise<boolean> {
    const existing = await this.executions.read(executionId);
    if (!existing) {
      throw new ExecutionNotFoundError(executionId);
    }
    if (isTerminal(existing)) {
      return false;
    }
    const cancelled = await this.executions.compareAndSet(
      executionId,
      CANCELLABLE,
      (current) => ({ ...current, status: "cancelled", completedAt: this.now().toISOString() }),
      (current) => !isTerminal(current)
    );
    if (cancelled) {
      this.logger.info(`执行 ${executionId} 已取消`, { executionId });
      this.emit("execution.updated", cancelled);
    }
    return cancelled !== null;
  }

  async getExecution(executionId: string): Promise<WorkflowExecution | null> {
    return this.executions.read(executionId);
  }

  async listExecutions(query: ExecutionQuery): Promise<{ executions: WorkflowExecution[]; total: number }> {
    return this.executions.paginate(query);
  }

  async close(): Promise<void> {
    this.unsubscribe?.();
    await this.queue.close();
  }

  private async finish(executionId: string, outcome: ExecutionOutcome): Promise<void> {
    const updated = await this.executions.compareAndSet(executionId, ["running"], (current) => applyOutcome(current, outcome));
    if (!updated) {
      // 监督器超时或人工取消已经改写了状态，以存储为准
      this.logger.warn(`执行 ${executionId} 状态已被改写，丢弃结果 ${outcome.status}`, { executionId });
      return;
    }
    this.emit("execution.updated", updated);
    if (updated.status === "pending_approval") {
      // 审批在门控步骤挂起之前就可能已经决定，监听器当时找不到等待中的记录
      await this.reconcileApproval(updated);
    }
  }
}
