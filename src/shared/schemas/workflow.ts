import { z } from "zod";

import { EventSourceSchema } from "./event.js";

export const CONDITION_OPERATORS = [
  "equals",
  "not_equals",
  "contains",
  "not_contains",
  "gt",
  "lt",
  "gte",
  "lte",
  "is_empty",
  "is_not_empty"
] as const;

export type ConditionOperator = (typeof CONDITION_OPERATORS)[number];

// operator 保持开放字符串：未知运算符在求值时视为 false
export const ConditionSchema = z.object({
  field: z.string().min(1),
  operator: z.string().min(1),
  value: z.unknown().optional()
});

export const StepTypeSchema = z.enum([
  "send_notification",
  "create_task",
  "send_message",
  "schedule_event",
  "webhook_call",
  "delay",
  "set_variable",
  "approval_gate"
]);

export const TriggerSchema = z.object({
  id: z.string().min(1),
  type: EventSourceSchema,
  name: z.string().optional(),
  config: z.record(z.unknown()).default({})
});

export const StepSchema = z.object({
  id: z.string().min(1),
  type: StepTypeSchema,
  name: z.string().optional(),
  config: z.record(z.unknown()).default({}),
  conditions: z.array(ConditionSchema).default([]),
  continueOnFailure: z.boolean().default(false)
});

export const ConnectionSchema = z.object({
  id: z.string().min(1),
  fromId: z.string().min(1),
  toId: z.string().min(1),
  guard: ConditionSchema.optional()
});

const WORKFLOW_ID_PATTERN = /^[A-Za-z0-9_-]{1,100}$/;

export function isValidWorkflowId(id: string): boolean {
  return WORKFLOW_ID_PATTERN.test(id);
}

export const WorkflowDefinitionSchema = z.object({
  // 工作流 id 直接用作存储文件名
  id: z.string().regex(WORKFLOW_ID_PATTERN, "workflow id must be 1-100 letters, digits, '_' or '-'"),
  name: z.string().min(1),
  description: z.string().optional(),
  version: z.number().int().min(1).default(1),
  trigger: TriggerSchema,
  steps: z.array(StepSchema),
  connections: z.array(ConnectionSchema).default([]),
  variables: z.record(z.unknown()).default({}),
  enabled: z.boolean().default(true),
  createdAt: z.string().default(() => new Date().toISOString())
});

export type Condition = z.infer<typeof ConditionSchema>;
export type StepType = z.infer<typeof StepTypeSchema>;
export type Trigger = z.infer<typeof TriggerSchema>;
export type Step = z.infer<typeof StepSchema>;
export type Connection = z.infer<typeof ConnectionSchema>;
export type WorkflowDefinition = z.infer<typeof WorkflowDefinitionSchema>;
export type WorkflowDefinitionInput = z.input<typeof WorkflowDefinitionSchema>;
