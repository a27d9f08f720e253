import type { Action, ActionKind, Priority } from "../../shared/schemas/action.js";
import type { CompileInput } from "../types.js";

export const HOUR_MS = 3_600_000;

export const DEFAULT_ESCALATION_TARGET = "on-call";

interface ActionFields {
  readonly kind: ActionKind;
  readonly operation: string;
  readonly description: string;
  readonly priority: Priority;
  readonly requiresApproval: boolean;
  readonly payload: Record<string, unknown>;
  readonly approvalConfidenceThreshold?: number;
}

export function buildAction(input: CompileInput, fields: ActionFields): Action {
  return {
    id: input.id,
    kind: fields.kind,
    operation: fields.operation,
    description: fields.description,
    priority: fields.priority,
    payload: fields.payload,
    requiresApproval: fields.requiresApproval,
    approvalConfidenceThreshold: fields.approvalConfidenceThreshold ?? 0.8,
    maxRetries: 3,
    timeoutSeconds: 300,
    createdAt: input.now.toISOString(),
    status: "pending"
  };
}

export function addHours(now: Date, hours: number): Date {
  return new Date(now.getTime() + hours * HOUR_MS);
}

export function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === "string");
}

export function stringField(metadata: Record<string, unknown>, key: string): string | undefined {
  const value = metadata[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}
