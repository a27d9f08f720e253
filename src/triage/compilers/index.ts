import type { Action } from "../../shared/schemas/action.js";
import type { ActionCompiler, AssignedHandler, CompileInput } from "../types.js";
import { compileDecision } from "./decision.js";
import { compileEscalation } from "./escalation.js";
import { compileFollowUp } from "./followUp.js";
import { compileResearch } from "./research.js";
import { compileScheduling } from "./scheduling.js";

export function compilerFor(handler: AssignedHandler): ActionCompiler {
  switch (handler) {
    case "escalation":
      return compileEscalation;
    case "scheduling":
      return compileScheduling;
    case "follow_up":
      return compileFollowUp;
    case "research":
      return compileResearch;
    case "decision":
      return compileDecision;
    default: {
      const unreachable: never = handler;
      return unreachable;
    }
  }
}

export function compileAction(input: CompileInput): Action {
  return compilerFor(input.decision.assignedHandler)(input);
}

export { compileDecision, compileEscalation, compileFollowUp, compileResearch, compileScheduling };
