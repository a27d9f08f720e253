import { randomUUID } from "node:crypto";

import { createLoggerFacade, type LoggerFacade } from "../logging/logger.js";
import { ApproverMismatchError } from "../errors.js";
import type { Action } from "../schemas/action.js";
import type { ApproverPolicy } from "./policy.js";
import { buildReasoning, scoreConfidence } from "./scoring.js";
import type { ApprovalStore } from "./store.js";
import type {
  ApprovalCallback,
  ApprovalNotifier,
  ApprovalRequest,
  DecisionListener,
  DecisionOutcome
} from "./types.js";

export const AUTO_APPROVED_REASON = "Auto-approved based on high confidence score";
export const DEFAULT_APPROVE_REASON = "Approved by approver";

export interface ApprovalManagerOptions {
  readonly store: ApprovalStore;
  readonly policy: ApproverPolicy;
  readonly autoApprovalThreshold: number;
  readonly notifier?: ApprovalNotifier;
  readonly logger?: LoggerFacade;
  readonly now?: () => Date;
  readonly idFactory?: () => string;
}

export class ApprovalManager {
  private readonly store: ApprovalStore;

  private readonly policy: ApproverPolicy;

  private readonly autoApprovalThreshold: number;

  private readonly notifier?: ApprovalNotifier;

  private readonly logger: LoggerFacade;

  private readonly now: () => Date;

  private readonly idFactory: () => string;

  private readonly listeners = new Set<DecisionListener>();

  constructor(options: ApprovalManagerOptions) {
    this.store = options.store;
    this.policy = options.policy;
    this.autoApprovalThreshold = options.autoApprovalThreshold;
    this.notifier = options.notifier;
    this.logger = options.logger ?? createLoggerFacade("approvals");
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? (() => `APP-${randomUUID()}`);
  }

  /**
   * 注册决定监听器，返回取消函数
   */
  onDecision(listener: DecisionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async requestApproval(action: Action, requesterId: string): Promise<ApprovalRequest> {
    const confidenceScore = scoreConfidence(action);
    const threshold = this.autoApprovalThreshold;
    const autoApprove = confidenceScore >= threshold && !action.requiresApproval;
    const createdAt = this.now().toISOString();

    const request: ApprovalRequest = {
      id: this.idFactory(),
      actionId: action.id,
      actionKind: action.kind,
      requesterId,
      approverId: this.policy.resolveApprover(action, requesterId),
      description: action.description,
      priority: action.priority,
      payload: { ...action.payload },
      confidenceScore,
      reasoning: buildReasoning(action),
      status: autoApprove ? "auto_approved" : "pending",
      createdAt,
      ...(autoApprove ? { respondedAt: createdAt, responseReason: AUTO_APPROVED_REASON } : {})
    };

    await this.store.save(request);
    this.logger.info(`approval ${request.id} -> ${request.status}`, {
      actionId: action.id,
      actionKind: action.kind,
      confidenceScore,
      threshold
    });

    if (request.status === "pending") {
      await this.notify(request);
    }
    return request;
  }

  async approve(id: string, approverId: string, reason?: string): Promise<boolean> {
    const outcome = await this.store.resolvePending(id, approverId, (request) => ({
      ...request,
      status: "approved",
      respondedAt: this.now().toISOString(),
      responseReason: reason && reason.length > 0 ? reason : DEFAULT_APPROVE_REASON
    }));
    return this.finishDecision(id, approverId, outcome);
  }

  async reject(id: string, approverId: string, reason: string): Promise<boolean> {
    const outcome = await this.store.resolvePending(id, approverId, (request) => ({
      ...request,
      status: "rejected",
      respondedAt: this.now().toISOString(),
      responseReason: reason
    }));
    return this.finishDecision(id, approverId, outcome);
  }

  /**
   * 审批渠道回调入口
   */
  async handleCallback(callback: ApprovalCallback): Promise<boolean> {
    if (callback.decision === "approve") {
      return this.approve(callback.approvalId, callback.approverId, callback.reason);
    }
    return this.reject(callback.approvalId, callback.approverId, callback.reason ?? "");
  }

  async getRequest(id: string): Promise<ApprovalRequest | undefined> {
    return this.store.get(id);
  }

  async listPending(approverId?: string): Promise<ApprovalRequest[]> {
    const pending = await this.store.listPending();
    return approverId ? pending.filter((request) => request.approverId === approverId) : pending;
  }

  async history(userId: string): Promise<ApprovalRequest[]> {
    const all = await this.store.listHistory();
    return all.filter((request) => request.requesterId === userId || request.approverId === userId);
  }

  private async finishDecision(id: string, approverId: string, outcome: DecisionOutcome): Promise<boolean> {
    if (!outcome.applied) {
      if (outcome.reason === "approver_mismatch") {
        const request = await this.store.get(id);
        this.logger.warn("ApproverMismatch", {
          approvalId: id,
          error: new ApproverMismatchError(id, request?.approverId ?? "unknown", approverId).message
        });
      } else {
        this.logger.warn(`approval ${id} is not pending`, { approvalId: id, approverId });
      }
      return false;
    }

    const { request } = outcome;
    this.logger.info(`approval ${id} -> ${request.status}`, {
      approverId,
      reason: request.responseReason
    });
    for (const listener of this.listeners) {
      try {
        await listener(request);
      } catch (error) {
        // 决定已落盘，监听器失败不回滚
        this.logger.error("Decision listener failed", error, { approvalId: id });
      }
    }
    return true;
  }

  private async notify(request: ApprovalRequest): Promise<void> {
    if (!this.notifier) {
      return;
    }
    try {
      await this.notifier.notify({
        approvalId: request.id,
        approverId: request.approverId,
        title: `Approval needed: ${request.description}`,
        description: `${request.reasoning} (confidence ${request.confidenceScore.toFixed(2)}, priority ${request.priority})`,
        actions: [
          { id: "approve", label: "Approve" },
          { id: "reject", label: "Reject" }
        ]
      });
    } catch (error) {
      // 请求已保存为 pending，可通过查询接口处理
      this.logger.error("Approval notification failed", error, { approvalId: request.id });
    }
  }
}
