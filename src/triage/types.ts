import type { Action, Priority } from "../shared/schemas/action.js";
import type { InboundEvent } from "../shared/schemas/event.js";

export type TriageCategory = "urgent" | "high_priority" | "routine" | "low_priority";

export type Sentiment = "positive" | "negative" | "neutral";

export type AssignedHandler = "escalation" | "scheduling" | "follow_up" | "research" | "decision";

export interface Classification {
  readonly category: TriageCategory;
  readonly urgencyScore: number;
  readonly complexityScore: number;
  readonly sentiment: Sentiment;
  readonly matchedKeywords: readonly string[];
}

export interface TriageDecision {
  readonly classification: Classification;
  readonly priority: Priority;
  readonly requiresApproval: boolean;
  readonly escalationMinutes: number;
  readonly nextSteps: readonly string[];
  readonly assignedHandler: AssignedHandler;
}

export interface TriageOutcome {
  readonly decision: TriageDecision;
  /** triage 自身的路由动作 */
  readonly action: Action;
}

/**
 * 编译器输入；now 与 id 由调用方注入，编译过程不读时钟
 */
export interface CompileInput {
  readonly decision: TriageDecision;
  readonly event: InboundEvent;
  readonly now: Date;
  readonly id: string;
  readonly defaults?: CompilerDefaults;
}

export interface CompilerDefaults {
  readonly escalationTarget: string;
}

export type ActionCompiler = (input: CompileInput) => Action;
