import type { Action, Priority } from "../../shared/schemas/action.js";
import type { CompileInput } from "../types.js";
import { addHours, buildAction, HOUR_MS, stringList } from "./base.js";

export type MeetingType = "general" | "interview" | "presentation" | "brainstorming";

export type SchedulingConstraint = "morning_only" | "afternoon_only" | "this_week";

export interface CandidateSlot {
  readonly start: string;
  readonly end: string;
  readonly score: number;
}

const MEETING_RULES: readonly { keywords: readonly string[]; type?: MeetingType; minutes: number }[] = [
  { keywords: ["interview"], type: "interview", minutes: 60 },
  { keywords: ["presentation"], type: "presentation", minutes: 45 },
  { keywords: ["brainstorm"], type: "brainstorming", minutes: 60 },
  { keywords: ["quick", "brief"], minutes: 15 },
  { keywords: ["detailed"], minutes: 90 }
];

const CONSTRAINT_RULES: readonly { keyword: string; constraint: SchedulingConstraint }[] = [
  { keyword: "morning", constraint: "morning_only" },
  { keyword: "afternoon", constraint: "afternoon_only" },
  { keyword: "this week", constraint: "this_week" }
];

/** 各优先级允许的最长等待（小时） */
export const MAX_WAIT_HOURS: Record<Priority, number> = {
  critical: 2,
  high: 24,
  medium: 72,
  low: 168
};

const SLOT_COUNT = 5;
const SLOT_SPACING_HOURS = 2;

export function meetingShape(text: string): { type: MeetingType; durationMinutes: number } {
  const rule = MEETING_RULES.find((candidate) => candidate.keywords.some((keyword) => text.includes(keyword)));
  return {
    type: rule?.type ?? "general",
    durationMinutes: rule?.minutes ?? 30
  };
}

export function candidateSlots(now: Date, durationMinutes: number): CandidateSlot[] {
  const slots: CandidateSlot[] = [];
  for (let index = 0; index < SLOT_COUNT; index++) {
    const start = addHours(now, 1 + index * SLOT_SPACING_HOURS);
    slots.push({
      start: start.toISOString(),
      end: new Date(start.getTime() + durationMinutes * 60_000).toISOString(),
      score: 100 - index * 10
    });
  }
  return slots;
}

/**
 * critical 取最早可用时段，其余取得分最高者（同分取更早）
 */
export function selectSlot(slots: readonly CandidateSlot[], priority: Priority, now: Date): CandidateSlot | null {
  const deadline = now.getTime() + MAX_WAIT_HOURS[priority] * HOUR_MS;
  const eligible = slots.filter((slot) => Date.parse(slot.start) <= deadline);
  if (eligible.length === 0) {
    return null;
  }
  if (priority === "critical") {
    return eligible.reduce((earliest, slot) => (slot.start < earliest.start ? slot : earliest));
  }
  return eligible.reduce((best, slot) => {
    if (slot.score > best.score || (slot.score === best.score && slot.start < best.start)) {
      return slot;
    }
    return best;
  });
}

export function compileScheduling(input: CompileInput): Action {
  const text = input.event.content.toLowerCase();
  const { type, durationMinutes } = meetingShape(text);

  let priority: Priority = "medium";
  if (text.includes("urgent") || text.includes("asap")) {
    priority = "critical";
  } else if (text.includes("important")) {
    priority = "high";
  } else if (input.decision.classification.category === "low_priority") {
    priority = "low";
  }

  const constraints = CONSTRAINT_RULES.filter((rule) => text.includes(rule.keyword)).map((rule) => rule.constraint);
  const slots = candidateSlots(input.now, durationMinutes);

  return buildAction(input, {
    kind: "scheduling",
    operation: "schedule_meeting",
    description: `Schedule ${type} meeting`,
    priority,
    requiresApproval: false,
    payload: {
      meetingType: type,
      durationMinutes,
      participants: stringList(input.event.metadata.participants),
      constraints,
      maxWaitHours: MAX_WAIT_HOURS[priority],
      candidateSlots: slots,
      selectedSlot: selectSlot(slots, priority, input.now),
      nextSteps: ["send_invites", "update_calendar", "send_confirmation"]
    }
  });
}
