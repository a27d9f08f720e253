import type { ApprovalRequest } from "../../shared/approvals/types.js";
import type { LoggerFacade } from "../../shared/logging/logger.js";
import type { Action } from "../../shared/schemas/action.js";
import type { StepRecord, WorkflowExecution } from "../../shared/schemas/execution.js";
import type { Step, StepType, WorkflowDefinition } from "../../shared/schemas/workflow.js";
import type { Connectors } from "../connectors/types.js";

export type ExecutionContext = Record<string, unknown>;

export type StepErrorCode = "invalid_config" | "connector_failed" | "http_error" | "approval_unavailable" | "handler_threw";

export type StepResult =
  | { readonly kind: "ok"; readonly output: unknown; readonly patch?: Readonly<Record<string, unknown>> }
  | { readonly kind: "err"; readonly code: StepErrorCode; readonly message: string }
  | { readonly kind: "suspend"; readonly approvalId: string; readonly output: unknown };

export const ok = (output: unknown, patch?: Readonly<Record<string, unknown>>): StepResult =>
  patch ? { kind: "ok", output, patch } : { kind: "ok", output };

export const err = (code: StepErrorCode, message: string): StepResult => ({ kind: "err", code, message });

/**
 * approval_gate 只依赖审批请求入口
 */
export interface ApprovalGateway {
  requestApproval(action: Action, requesterId: string): Promise<ApprovalRequest>;
}

export interface HandlerContext {
  readonly workflow: WorkflowDefinition;
  readonly executionId: string;
  readonly context: Readonly<ExecutionContext>;
  readonly connectors: Connectors;
  readonly approvals?: ApprovalGateway;
  readonly logger: LoggerFacade;
  readonly sleep: (ms: number) => Promise<void>;
  readonly now: () => Date;
}

export type StepHandler = (
  step: Step,
  config: Readonly<Record<string, unknown>>,
  ctx: HandlerContext
) => Promise<StepResult>;

export type StepHandlerRegistry = { readonly [K in StepType]: StepHandler };

export interface RunOptions {
  /** 每次派发步骤前检查 */
  readonly isCancelled?: () => Promise<boolean> | boolean;
  readonly onStepRecorded?: (record: StepRecord) => Promise<void> | void;
  readonly now?: () => Date;
}

export type ExecutionOutcome = Pick<
  WorkflowExecution,
  "status" | "error" | "result" | "steps" | "approvalId" | "resume" | "completedAt"
>;
