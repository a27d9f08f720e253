import { describe, expect, it } from "vitest";

import { classify, decide, priorityFromScore, triage } from "../../src/triage/classifier.js";
import { TRIAGE_RULES } from "../../src/triage/rules.js";
import type { InboundEvent } from "../../src/shared/schemas/event.js";

const NOW = new Date("2026-03-02T09:00:00.000Z");

function event(content: string, overrides: Partial<InboundEvent> = {}): InboundEvent {
  return { content, source: "chat", userId: "user-1", metadata: {}, ...overrides };
}

describe("classify", () => {
  it("按关键词累计紧急度并取最高级别类别", () => {
    expect(classify(event("URGENT: server down"))).toEqual({
      category: "urgent",
      urgencyScore: 4,
      complexityScore: 0,
      sentiment: "neutral",
      matchedKeywords: ["urgent"]
    });
  });

  it("多个级别命中时取排在前面的类别", () => {
    const result = classify(event("general question about the update"));
    expect(result.category).toBe("routine");
    expect(result.urgencyScore).toBe(3);
    expect(result.matchedKeywords).toEqual(["update", "general", "question"]);
  });

  it("没有命中时归为 routine", () => {
    const result = classify(event("hello there"));
    expect(result.category).toBe("routine");
    expect(result.urgencyScore).toBe(0);
    expect(result.matchedKeywords).toEqual([]);
  });

  it("追加命中关键词时紧急度不下降", () => {
    const keywords = TRIAGE_RULES.flatMap((rule) => rule.keywords);
    let content = "status";
    let previous = classify(event(content)).urgencyScore;
    for (const keyword of [...keywords].reverse()) {
      content = `${content} ${keyword}`;
      const score = classify(event(content)).urgencyScore;
      expect(score).toBeGreaterThanOrEqual(previous);
      previous = score;
    }
    // 每条规则的每个关键词都计入：4×(1+3) + 3×(1+2) + 3×1 + 3×1
    expect(previous).toBe(31);
  });

  it("只命中低优先级关键词时归为 low_priority", () => {
    expect(classify(event("a general question")).category).toBe("low_priority");
  });

  it("情绪按多数决定，平局为 neutral", () => {
    expect(classify(event("great success but one problem")).sentiment).toBe("positive");
    expect(classify(event("a terrible failure, good effort")).sentiment).toBe("negative");
    expect(classify(event("good but bad")).sentiment).toBe("neutral");
  });

  it("统计复杂度指示词", () => {
    expect(classify(event("detailed analysis and research investigation needed")).complexityScore).toBe(4);
  });

  it("相同输入得到相同结果", () => {
    const content = "Important deadline: please check the research";
    expect(classify(event(content))).toEqual(classify(event(content)));
  });
});

describe("priorityFromScore", () => {
  it.each([
    [0, "low"],
    [1, "medium"],
    [2, "medium"],
    [3, "high"],
    [4, "high"],
    [5, "critical"],
    [9, "critical"]
  ] as const)("score %i -> %s", (score, priority) => {
    expect(priorityFromScore(score)).toBe(priority);
  });
});

describe("decide", () => {
  it("urgent 内容需要审批并交给升级处理", () => {
    const decision = decide(event("URGENT: server down"));
    expect(decision.priority).toBe("high");
    expect(decision.requiresApproval).toBe(true);
    expect(decision.escalationMinutes).toBe(5);
    expect(decision.nextSteps).toEqual(["immediate_notification", "escalation_to_manager", "priority_handling"]);
    expect(decision.assignedHandler).toBe("escalation");
  });

  it("日程关键词优先于跟进关键词", () => {
    expect(decide(event("Please schedule a meeting and remind the team")).assignedHandler).toBe("scheduling");
  });

  it("跟进关键词交给 follow_up", () => {
    const decision = decide(event("Remind me about the contract"));
    expect(decision.assignedHandler).toBe("follow_up");
    expect(decision.requiresApproval).toBe(false);
    expect(decision.escalationMinutes).toBe(120);
  });

  it("复杂度大于 2 交给 research", () => {
    expect(decide(event("detailed analysis and research investigation needed")).assignedHandler).toBe("research");
  });

  it("其余情况交给 decision", () => {
    const decision = decide(event("hello there"));
    expect(decision.assignedHandler).toBe("decision");
    expect(decision.priority).toBe("low");
  });
});

describe("triage", () => {
  it("生成路由动作", () => {
    const { action, decision } = triage(event("URGENT: server down"), NOW, "act-1");
    expect(action).toMatchObject({
      id: "act-1",
      kind: "triage",
      operation: "triage_and_route",
      description: "Triage chat input: urgent",
      priority: "high",
      requiresApproval: true,
      approvalConfidenceThreshold: 0.8,
      maxRetries: 3,
      timeoutSeconds: 300,
      createdAt: "2026-03-02T09:00:00.000Z",
      status: "pending"
    });
    expect(action.payload.assignedHandler).toBe("escalation");
    expect(action.payload.classification).toEqual(decision.classification);
  });
});
