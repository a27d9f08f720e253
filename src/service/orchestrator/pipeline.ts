import { randomUUID } from "node:crypto";

import type { ApprovalManager } from "../../shared/approvals/manager.js";
import type { ApprovalRequest } from "../../shared/approvals/types.js";
import { ValidationError, toValidationIssues } from "../../shared/errors.js";
import { createLoggerFacade, type LoggerFacade } from "../../shared/logging/logger.js";
import type { Action } from "../../shared/schemas/action.js";
import { InboundEventSchema, type InboundEvent } from "../../shared/schemas/event.js";
import type { WorkflowExecution } from "../../shared/schemas/execution.js";
import { triage } from "../../triage/classifier.js";
import { compileAction } from "../../triage/compilers/index.js";
import type { TriageDecision } from "../../triage/types.js";
import type { WorkflowEngine } from "./engine.js";

export interface PipelineOutcome {
  readonly decision: TriageDecision;
  readonly triageAction: Action;
  readonly action: Action;
  readonly approval: ApprovalRequest;
  readonly executions: WorkflowExecution[];
}

export interface AutomationPipelineOptions {
  readonly engine: WorkflowEngine;
  readonly approvals: ApprovalManager;
  readonly escalationTarget: string;
  readonly logger?: LoggerFacade;
  readonly now?: () => Date;
  readonly idFactory?: () => string;
}

/**
 * 入站事件流水线：校验 → 分诊 → 编译领域动作 → 申请审批 → 触发匹配的工作流
 */
export class AutomationPipeline {
  private readonly engine: WorkflowEngine;

  private readonly approvals: ApprovalManager;

  private readonly escalationTarget: string;

  private readonly logger: LoggerFacade;

  private readonly now: () => Date;

  private readonly idFactory: () => string;

  constructor(options: AutomationPipelineOptions) {
    this.engine = options.engine;
    this.approvals = options.approvals;
    this.escalationTarget = options.escalationTarget;
    this.logger = options.logger ?? createLoggerFacade("pipeline");
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? (() => `act-${randomUUID()}`);
  }

  async handleEvent(raw: unknown): Promise<PipelineOutcome> {
    const parsed = InboundEventSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError("Invalid inbound event", toValidationIssues(parsed.error.issues));
    }
    const now = this.now();
    const event: InboundEvent = { ...parsed.data, receivedAt: parsed.data.receivedAt ?? now.toISOString() };

    const { decision, action: triageAction } = triage(event, now, this.idFactory());
    const action = compileAction({
      decision,
      event,
      now,
      id: this.idFactory(),
      defaults: { escalationTarget: this.escalationTarget }
    });
    this.logger.info(`事件已分诊：${decision.classification.category} → ${decision.assignedHandler}`, {
      source: event.source,
      priority: action.priority,
      actionId: action.id
    });

    const approval = await this.approvals.requestApproval(action, event.userId);

    const payload = { event, action, classification: decision.classification };
    const candidates = (await this.engine.listWorkflows()).filter(
      (workflow) => workflow.enabled && workflow.trigger.type === event.source
    );
    const executions: WorkflowExecution[] = [];
    for (const workflow of candidates) {
      const execution = await this.engine.trigger(
        workflow.id,
        payload,
        approval.status === "pending" ? { approvalId: approval.id } : {}
      );
      executions.push(execution);
    }

    return { decision, triageAction, action, approval, executions };
  }
}
