import type { Action } from "../../shared/schemas/action.js";
import type { CompileInput } from "../types.js";
import { buildAction } from "./base.js";

/**
 * 兜底编译器：无法归类的事件总是交给人工决定
 */
export function compileDecision(input: CompileInput): Action {
  return buildAction(input, {
    kind: "decision",
    operation: "review_decision",
    description: `Review ${input.decision.classification.category} ${input.event.source} event`,
    priority: input.decision.priority,
    requiresApproval: true,
    approvalConfidenceThreshold: 0.9,
    payload: {
      content: input.event.content,
      sentiment: input.decision.classification.sentiment,
      nextSteps: input.decision.nextSteps
    }
  });
}
