export type DomainErrorCode =
  | "validation_failed"
  | "workflow_not_found"
  | "execution_not_found"
  | "step_failed"
  | "execution_timeout"
  | "retry_exhausted"
  | "approver_mismatch"
  | "config_invalid";

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: DomainErrorCode,
    public override readonly cause?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends DomainError {
  constructor(
    message: string,
    public readonly issues: readonly ValidationIssue[] = []
  ) {
    super(message, "validation_failed");
  }
}

export class WorkflowNotFoundError extends DomainError {
  constructor(public readonly workflowId: string) {
    super(`Workflow ${workflowId} not found`, "workflow_not_found");
  }
}

export class ExecutionNotFoundError extends DomainError {
  constructor(public readonly executionId: string) {
    super(`Execution ${executionId} not found`, "execution_not_found");
  }
}

export class StepExecutionError extends DomainError {
  constructor(
    message: string,
    public readonly stepId: string,
    cause?: unknown
  ) {
    super(message, "step_failed", cause);
  }
}

export class ExecutionTimeoutError extends DomainError {
  constructor(
    public readonly executionId: string,
    public readonly timeoutMs: number
  ) {
    super(`Execution timed out after ${Math.round(timeoutMs / 1000)}s`, "execution_timeout");
  }
}

export class RetryExhaustedError extends DomainError {
  constructor(
    public readonly executionId: string,
    public readonly attempts: number
  ) {
    super(`Execution ${executionId} exhausted ${attempts} retries`, "retry_exhausted");
  }
}

export class ApproverMismatchError extends DomainError {
  constructor(
    public readonly approvalId: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`Approval ${approvalId} is assigned to ${expected}, not ${actual}`, "approver_mismatch");
  }
}

/**
 * zod 错误转为扁平的 issue 列表
 */
export function toValidationIssues(issues: readonly { path: readonly (string | number)[]; message: string }[]): ValidationIssue[] {
  return issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message
  }));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
