import type { Action } from "../../shared/schemas/action.js";
import type { CompileInput } from "../types.js";
import { buildAction } from "./base.js";

export function compileResearch(input: CompileInput): Action {
  const { classification } = input.decision;
  return buildAction(input, {
    kind: "research",
    operation: "research_topic",
    description: `Research request from ${input.event.source}`,
    priority: input.decision.priority,
    requiresApproval: false,
    payload: {
      topic: input.event.content,
      depth: classification.complexityScore >= 4 ? "deep" : "standard",
      complexityScore: classification.complexityScore
    }
  });
}
