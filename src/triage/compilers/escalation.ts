import type { Action } from "../../shared/schemas/action.js";
import type { CompileInput } from "../types.js";
import { buildAction, DEFAULT_ESCALATION_TARGET, stringField } from "./base.js";

export function compileEscalation(input: CompileInput): Action {
  const { classification, escalationMinutes } = input.decision;
  const target =
    stringField(input.event.metadata, "escalateTo") ??
    input.defaults?.escalationTarget ??
    DEFAULT_ESCALATION_TARGET;

  return buildAction(input, {
    kind: "escalation",
    operation: "escalate",
    description: `Escalate ${classification.category} ${input.event.source} event to ${target}`,
    priority: classification.category === "urgent" ? "critical" : "high",
    // 升级需要立即生效，默认不等人工审批
    requiresApproval: false,
    payload: {
      target,
      reason: input.event.content,
      matchedKeywords: classification.matchedKeywords,
      acknowledgeBy: new Date(input.now.getTime() + escalationMinutes * 60_000).toISOString()
    }
  });
}
