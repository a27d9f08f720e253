import { describe, expect, it } from "vitest";

import { decide } from "../../../src/triage/classifier.js";
import {
  compileAction,
  compileDecision,
  compileEscalation,
  compileFollowUp,
  compileResearch,
  compileScheduling
} from "../../../src/triage/compilers/index.js";
import { candidateSlots, selectSlot } from "../../../src/triage/compilers/scheduling.js";
import type { InboundEvent } from "../../../src/shared/schemas/event.js";
import type { CompileInput } from "../../../src/triage/types.js";

const NOW = new Date("2026-03-02T09:00:00.000Z");

function input(content: string, metadata: Record<string, unknown> = {}, extra: Partial<CompileInput> = {}): CompileInput {
  const event: InboundEvent = { content, source: "email", userId: "user-1", metadata };
  return { decision: decide(event), event, now: NOW, id: "act-1", ...extra };
}

describe("compileAction", () => {
  it("urgent 内容编译为不需审批的 critical 升级动作", () => {
    const action = compileAction(input("URGENT: server down"));
    expect(action.kind).toBe("escalation");
    expect(action.operation).toBe("escalate");
    expect(action.priority).toBe("critical");
    expect(action.requiresApproval).toBe(false);
    expect(action.payload).toEqual({
      target: "on-call",
      reason: "URGENT: server down",
      matchedKeywords: ["urgent"],
      acknowledgeBy: "2026-03-02T09:05:00.000Z"
    });
  });

  it("按 assignedHandler 分派", () => {
    expect(compileAction(input("Please schedule a meeting")).kind).toBe("scheduling");
    expect(compileAction(input("Remind me about the contract")).kind).toBe("follow_up");
    expect(compileAction(input("detailed analysis and research investigation needed")).kind).toBe("research");
    expect(compileAction(input("hello there")).kind).toBe("decision");
  });
});

describe("compileEscalation", () => {
  it("事件元数据指定的目标优先于默认目标", () => {
    const fromMetadata = compileEscalation(input("critical outage", { escalateTo: "ops-lead" }, { defaults: { escalationTarget: "platform" } }));
    expect(fromMetadata.payload.target).toBe("ops-lead");

    const fromDefaults = compileEscalation(input("critical outage", {}, { defaults: { escalationTarget: "platform" } }));
    expect(fromDefaults.payload.target).toBe("platform");
    expect(fromDefaults.description).toBe("Escalate urgent email event to platform");
  });

  it("非 urgent 类别升级为 high", () => {
    expect(compileEscalation(input("important deadline")).priority).toBe("high");
  });
});

describe("compileScheduling", () => {
  it("默认 general 会议，选得分最高的时段", () => {
    const action = compileScheduling(input("Please schedule a meeting"));
    expect(action.description).toBe("Schedule general meeting");
    expect(action.priority).toBe("medium");
    expect(action.requiresApproval).toBe(false);
    expect(action.payload.durationMinutes).toBe(30);
    expect(action.payload.maxWaitHours).toBe(72);
    expect(action.payload.selectedSlot).toEqual({
      start: "2026-03-02T10:00:00.000Z",
      end: "2026-03-02T10:30:00.000Z",
      score: 100
    });
  });

  it("urgent/asap 为 critical，会议类型决定时长", () => {
    const action = compileScheduling(input("urgent interview asap", { participants: ["a@example.com", 42] }));
    expect(action.priority).toBe("critical");
    expect(action.requiresApproval).toBe(false);
    expect(action.payload.meetingType).toBe("interview");
    expect(action.payload.durationMinutes).toBe(60);
    expect(action.payload.participants).toEqual(["a@example.com"]);
  });

  it("important 为 high，low_priority 类别为 low", () => {
    expect(compileScheduling(input("important presentation")).priority).toBe("high");
    const low = compileScheduling(input("general question: schedule a call"));
    expect(low.priority).toBe("low");
    expect(low.payload.maxWaitHours).toBe(168);
  });

  it("从内容中提取时间约束", () => {
    const action = compileScheduling(input("brief sync this week, morning preferred"));
    expect(action.payload.constraints).toEqual(["morning_only", "this_week"]);
    expect(action.payload.durationMinutes).toBe(15);
  });
});

describe("selectSlot", () => {
  const slots = candidateSlots(NOW, 30);

  it("候选时段从一小时后开始，每两小时一个", () => {
    expect(slots.map((slot) => slot.start)).toEqual([
      "2026-03-02T10:00:00.000Z",
      "2026-03-02T12:00:00.000Z",
      "2026-03-02T14:00:00.000Z",
      "2026-03-02T16:00:00.000Z",
      "2026-03-02T18:00:00.000Z"
    ]);
    expect(slots.map((slot) => slot.score)).toEqual([100, 90, 80, 70, 60]);
  });

  it("critical 只考虑两小时内的时段", () => {
    expect(selectSlot(slots, "critical", NOW)?.start).toBe("2026-03-02T10:00:00.000Z");
    expect(selectSlot(slots.slice(1), "critical", NOW)).toBeNull();
  });

  it("同分时取更早的时段", () => {
    const tied = [
      { start: "2026-03-02T15:00:00.000Z", end: "2026-03-02T15:30:00.000Z", score: 80 },
      { start: "2026-03-02T11:00:00.000Z", end: "2026-03-02T11:30:00.000Z", score: 80 }
    ];
    expect(selectSlot(tied, "medium", NOW)?.start).toBe("2026-03-02T11:00:00.000Z");
  });
});

describe("compileFollowUp", () => {
  it("按类别推断紧急度并套用模板", () => {
    const action = compileFollowUp(input("Remind me about the contract", { type: "task", participants: ["pm@example.com"] }));
    expect(action.description).toBe("Follow up on task");
    expect(action.priority).toBe("medium");
    expect(action.payload.urgency).toBe("medium");
    expect(action.payload.content).toMatchObject({
      subject: "Task Update: {{task_name}}",
      recipients: ["pm@example.com"]
    });
    expect(action.payload.timing).toEqual({
      delayHours: 72,
      reminderHours: 168,
      scheduledAt: "2026-03-05T09:00:00.000Z"
    });
  });

  it("urgent 类别提升为 high", () => {
    const action = compileFollowUp(input("urgent: follow up with vendor"));
    expect(action.payload.urgency).toBe("urgent");
    expect(action.priority).toBe("high");
    expect(action.payload.timing).toMatchObject({ delayHours: 2, reminderHours: 24 });
  });

  it("critical 需要审批，时间表回落到 medium", () => {
    const action = compileFollowUp(input("follow up", { urgency: "critical" }));
    expect(action.priority).toBe("critical");
    expect(action.requiresApproval).toBe(true);
    expect(action.payload.timing).toMatchObject({ delayHours: 72, reminderHours: 168 });
  });
});

describe("compileResearch / compileDecision", () => {
  it("复杂度不低于 4 时做深度研究", () => {
    expect(compileResearch(input("detailed analysis and research investigation needed")).payload.depth).toBe("deep");
    expect(compileResearch(input("research the market")).payload.depth).toBe("standard");
  });

  it("decision 总是需要审批且阈值更高", () => {
    const action = compileDecision(input("hello there"));
    expect(action.operation).toBe("review_decision");
    expect(action.requiresApproval).toBe(true);
    expect(action.approvalConfidenceThreshold).toBe(0.9);
    expect(action.payload.sentiment).toBe("neutral");
  });
});
