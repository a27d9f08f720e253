import { z } from "zod";

import { ActionKindSchema, PrioritySchema } from "../schemas/action.js";

export const ApprovalStatusSchema = z.enum(["pending", "approved", "rejected", "auto_approved", "escalated"]);

export const ApprovalRequestSchema = z.object({
  id: z.string().min(1),
  actionId: z.string().min(1),
  actionKind: ActionKindSchema,
  requesterId: z.string().min(1),
  approverId: z.string().min(1),
  description: z.string(),
  priority: PrioritySchema,
  payload: z.record(z.unknown()),
  confidenceScore: z.number().min(0).max(1),
  reasoning: z.string(),
  status: ApprovalStatusSchema,
  createdAt: z.string(),
  respondedAt: z.string().optional(),
  responseReason: z.string().optional()
});

export type ApprovalStatus = z.infer<typeof ApprovalStatusSchema>;
export type ApprovalRequest = z.infer<typeof ApprovalRequestSchema>;

export type ApprovalDecision = "approve" | "reject";

export interface ApprovalCallback {
  readonly approvalId: string;
  readonly approverId: string;
  readonly decision: ApprovalDecision;
  readonly reason?: string;
}

/**
 * 审批渠道出站消息
 */
export interface ApprovalMessage {
  readonly approvalId: string;
  readonly approverId: string;
  readonly title: string;
  readonly description: string;
  readonly actions: readonly { readonly id: ApprovalDecision; readonly label: string }[];
}

export interface ApprovalNotifier {
  notify(message: ApprovalMessage): Promise<void>;
}

export type DecisionListener = (request: ApprovalRequest) => Promise<void> | void;

export type DecisionOutcome =
  | { readonly applied: true; readonly request: ApprovalRequest }
  | { readonly applied: false; readonly reason: "not_pending" | "approver_mismatch" };
