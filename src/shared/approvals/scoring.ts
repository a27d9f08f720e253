import type { Action, ActionKind, Priority } from "../schemas/action.js";

const BASE_CONFIDENCE = 0.7;

const KIND_BONUS: Partial<Record<ActionKind, number>> = {
  triage: 0.1,
  scheduling: 0.15,
  follow_up: 0.05
};

const PRIORITY_ADJUSTMENT: Partial<Record<Priority, number>> = {
  low: 0.1,
  critical: -0.1
};

export function scoreConfidence(action: Pick<Action, "kind" | "priority">): number {
  const raw = BASE_CONFIDENCE + (KIND_BONUS[action.kind] ?? 0) + (PRIORITY_ADJUSTMENT[action.priority] ?? 0);
  const clamped = Math.min(Math.max(raw, 0), 1);
  return Math.round(clamped * 100) / 100;
}

function countOf(value: unknown): number {
  return Array.isArray(value) ? value.length : 0;
}

function nested(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) {
    return undefined;
  }
  return Reflect.get(value, key);
}

export function buildReasoning(action: Action): string {
  switch (action.kind) {
    case "triage":
      return `This input has been classified as ${action.priority} priority and requires ${action.operation}.`;
    case "scheduling":
      return `A meeting has been scheduled based on the request with ${countOf(action.payload.participants)} participants.`;
    case "follow_up": {
      const context = typeof action.payload.followUpType === "string" ? action.payload.followUpType : "general";
      const recipients = countOf(nested(action.payload.content, "recipients"));
      return `A follow-up has been created for ${context} with ${recipients} recipients.`;
    }
    case "escalation": {
      const target = typeof action.payload.target === "string" ? action.payload.target : "the escalation target";
      return `Escalation to ${target} was raised at ${action.priority} priority.`;
    }
    case "research":
    case "decision":
      return "Autonomous action requires approval.";
    default: {
      const unreachable: never = action.kind;
      return unreachable;
    }
  }
}
