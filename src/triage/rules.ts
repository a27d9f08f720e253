import type { Priority } from "../shared/schemas/action.js";
import type { TriageCategory } from "./types.js";

export interface TriageRule {
  readonly category: TriageCategory;
  readonly keywords: readonly string[];
  /** 命中关键词时额外增加的紧急度 */
  readonly bonus: number;
  readonly requiresApproval: boolean;
  readonly escalationMinutes: number;
  readonly nextSteps: readonly string[];
}

// 顺序即类别优先级
export const TRIAGE_RULES: readonly TriageRule[] = [
  {
    category: "urgent",
    keywords: ["urgent", "asap", "emergency", "critical"],
    bonus: 3,
    requiresApproval: true,
    escalationMinutes: 5,
    nextSteps: ["immediate_notification", "escalation_to_manager", "priority_handling"]
  },
  {
    category: "high_priority",
    keywords: ["important", "priority", "deadline"],
    bonus: 2,
    requiresApproval: true,
    escalationMinutes: 30,
    nextSteps: ["quick_response", "dedicated_handling"]
  },
  {
    category: "routine",
    keywords: ["follow up", "update", "check"],
    bonus: 0,
    requiresApproval: false,
    escalationMinutes: 120,
    nextSteps: ["standard_processing", "queue_for_handling"]
  },
  {
    category: "low_priority",
    keywords: ["general", "info", "question"],
    bonus: 0,
    requiresApproval: false,
    escalationMinutes: 480,
    nextSteps: ["general_processing"]
  }
];

export const COMPLEXITY_INDICATORS = ["complex", "detailed", "analysis", "research", "investigation"] as const;

export const POSITIVE_WORDS = ["good", "great", "excellent", "positive", "success"] as const;

export const NEGATIVE_WORDS = ["bad", "terrible", "problem", "issue", "failure"] as const;

export const SCHEDULING_WORDS = ["schedule", "meeting", "calendar", "invite"] as const;

export const FOLLOW_UP_WORDS = ["follow up", "check in", "remind"] as const;

export const PRIORITY_BY_SCORE: readonly { readonly min: number; readonly priority: Priority }[] = [
  { min: 5, priority: "critical" },
  { min: 3, priority: "high" },
  { min: 1, priority: "medium" }
];
