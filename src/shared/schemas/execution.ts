import { z } from "zod";

export const ExecutionStatusSchema = z.enum([
  "pending",
  "running",
  "pending_approval",
  "completed",
  "failed",
  "timeout",
  "retrying",
  "cancelled"
]);

export const StepStatusSchema = z.enum(["pending", "running", "completed", "failed", "skipped"]);

export const StepRecordSchema = z.object({
  stepId: z.string().min(1),
  executionId: z.string().min(1),
  status: StepStatusSchema,
  startedAt: z.string(),
  completedAt: z.string().optional(),
  result: z.unknown().optional(),
  error: z.string().optional()
});

export const ResumePointSchema = z.object({
  // 从该步骤之后继续遍历
  afterStepId: z.string().min(1),
  context: z.record(z.unknown())
});

export const WorkflowExecutionSchema = z.object({
  id: z.string().min(1),
  workflowId: z.string().min(1),
  workflowVersion: z.number().int().min(1),
  status: ExecutionStatusSchema,
  triggerPayload: z.record(z.unknown()),
  startedAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().optional(),
  retryCount: z.number().int().min(0),
  maxRetries: z.number().int().min(0),
  nextAttemptAt: z.string().optional(),
  retryExhausted: z.boolean().optional(),
  error: z.string().optional(),
  result: z
    .object({
      context: z.record(z.unknown()),
      executedSteps: z.array(z.string())
    })
    .optional(),
  steps: z.array(StepRecordSchema),
  approvalId: z.string().optional(),
  resume: ResumePointSchema.optional()
});

export type ExecutionStatus = z.infer<typeof ExecutionStatusSchema>;
export type StepStatus = z.infer<typeof StepStatusSchema>;
export type StepRecord = z.infer<typeof StepRecordSchema>;
export type ResumePoint = z.infer<typeof ResumePointSchema>;
export type WorkflowExecution = z.infer<typeof WorkflowExecutionSchema>;

export const TERMINAL_STATUSES: readonly ExecutionStatus[] = ["completed", "cancelled", "timeout"];

export function isTerminal(execution: Pick<WorkflowExecution, "status" | "retryExhausted">): boolean {
  if (TERMINAL_STATUSES.includes(execution.status)) {
    return true;
  }
  return execution.status === "failed" && execution.retryExhausted === true;
}
