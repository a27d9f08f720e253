import type { Action, Priority } from "../../shared/schemas/action.js";
import type { CompileInput } from "../types.js";
import { addHours, buildAction, stringField, stringList } from "./base.js";

export type FollowUpType = "meeting" | "task" | "general";

export type FollowUpUrgency = "urgent" | "high" | "medium" | "low" | "critical";

interface MessageTemplate {
  readonly subject: string;
  readonly body: string;
}

export const FOLLOW_UP_TEMPLATES: Record<FollowUpType, MessageTemplate> = {
  meeting: {
    subject: "Follow-up: {{meeting_title}}",
    body:
      "Hi {{recipient}},\n\nFollowing up on our meeting about {{topic}}. Here are the key points and action items:\n\n" +
      "{{action_items}}\n\nNext steps:\n{{next_steps}}\n\nLet me know if you need any clarification.\n\nBest regards,\n{{sender}}"
  },
  task: {
    subject: "Task Update: {{task_name}}",
    body:
      "Hi {{recipient}},\n\nI wanted to check in on the task: {{task_name}}\n\nCurrent status: {{status}}\n\n" +
      "Any blockers or updates?\n\nThanks,\n{{sender}}"
  },
  general: {
    subject: "Follow-up: {{topic}}",
    body: "Hi {{recipient}},\n\nFollowing up on {{topic}}.\n\n{{message}}\n\nBest regards,\n{{sender}}"
  }
};

const TIMING: Record<Exclude<FollowUpUrgency, "critical">, { delayHours: number; reminderHours: number }> = {
  urgent: { delayHours: 2, reminderHours: 24 },
  high: { delayHours: 24, reminderHours: 72 },
  medium: { delayHours: 72, reminderHours: 168 },
  low: { delayHours: 168, reminderHours: 336 }
};

function parseType(value: string | undefined): FollowUpType {
  return value === "meeting" || value === "task" ? value : "general";
}

function parseUrgency(input: CompileInput): FollowUpUrgency {
  const declared = stringField(input.event.metadata, "urgency");
  switch (declared) {
    case "urgent":
    case "high":
    case "medium":
    case "low":
    case "critical":
      return declared;
    default:
      break;
  }
  const category = input.decision.classification.category;
  if (category === "urgent") {
    return "urgent";
  }
  return category === "high_priority" ? "high" : "medium";
}

export function followUpTiming(urgency: FollowUpUrgency, now: Date) {
  // critical 没有单独的时间表，回落到 medium
  const rule = TIMING[urgency === "critical" ? "medium" : urgency];
  return {
    delayHours: rule.delayHours,
    reminderHours: rule.reminderHours,
    scheduledAt: addHours(now, rule.delayHours).toISOString()
  };
}

export function compileFollowUp(input: CompileInput): Action {
  const type = parseType(stringField(input.event.metadata, "type"));
  const urgency = parseUrgency(input);

  let priority: Priority = "medium";
  let requiresApproval = false;
  if (urgency === "urgent") {
    priority = "high";
  } else if (urgency === "critical") {
    priority = "critical";
    requiresApproval = true;
  }

  const template = FOLLOW_UP_TEMPLATES[type];
  return buildAction(input, {
    kind: "follow_up",
    operation: "create_follow_up",
    description: `Follow up on ${type}`,
    priority,
    requiresApproval,
    payload: {
      followUpType: type,
      urgency,
      content: {
        subject: template.subject,
        body: template.body,
        recipients: stringList(input.event.metadata.participants)
      },
      timing: followUpTiming(urgency, input.now),
      nextSteps: ["schedule_follow_up", "send_reminder", "track_response"]
    }
  });
}
