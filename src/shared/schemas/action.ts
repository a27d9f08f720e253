import { z } from "zod";

export const ActionKindSchema = z.enum([
  "triage",
  "scheduling",
  "follow_up",
  "escalation",
  "decision",
  "research"
]);

export const PrioritySchema = z.enum(["low", "medium", "high", "critical"]);

export const ActionStatusSchema = z.enum(["pending", "approved", "rejected", "completed", "failed"]);

export type ActionKind = z.infer<typeof ActionKindSchema>;
export type Priority = z.infer<typeof PrioritySchema>;
export type ActionStatus = z.infer<typeof ActionStatusSchema>;

export const ActionSchema = z.object({
  id: z.string().min(1),
  kind: ActionKindSchema,
  operation: z.string().min(1),
  description: z.string(),
  priority: PrioritySchema,
  payload: z.record(z.unknown()),
  requiresApproval: z.boolean(),
  approvalConfidenceThreshold: z.number().min(0).max(1),
  maxRetries: z.number().int().min(0),
  timeoutSeconds: z.number().int().positive(),
  createdAt: z.string(),
  status: ActionStatusSchema
});

/**
 * 编译后的领域动作；除 status 外创建后不可变
 */
export interface Action {
  readonly id: string;
  readonly kind: ActionKind;
  readonly operation: string;
  readonly description: string;
  readonly priority: Priority;
  readonly payload: Readonly<Record<string, unknown>>;
  readonly requiresApproval: boolean;
  readonly approvalConfidenceThreshold: number;
  readonly maxRetries: number;
  readonly timeoutSeconds: number;
  readonly createdAt: string;
  status: ActionStatus;
}
