import type { Action, Priority } from "../shared/schemas/action.js";
import type { InboundEvent } from "../shared/schemas/event.js";
import {
  COMPLEXITY_INDICATORS,
  FOLLOW_UP_WORDS,
  NEGATIVE_WORDS,
  POSITIVE_WORDS,
  PRIORITY_BY_SCORE,
  SCHEDULING_WORDS,
  TRIAGE_RULES,
  type TriageRule
} from "./rules.js";
import type {
  AssignedHandler,
  Classification,
  Sentiment,
  TriageCategory,
  TriageDecision,
  TriageOutcome
} from "./types.js";

function countHits(text: string, words: readonly string[]): number {
  return words.filter((word) => text.includes(word)).length;
}

function ruleFor(category: TriageCategory): TriageRule {
  const rule = TRIAGE_RULES.find((candidate) => candidate.category === category);
  if (!rule) {
    throw new Error(`Missing triage rule for ${category}`);
  }
  return rule;
}

/**
 * 关键词分类：纯函数，同一输入总是得到同一结果
 */
export function classify(event: Pick<InboundEvent, "content">): Classification {
  const text = event.content.toLowerCase();
  const matchedKeywords: string[] = [];
  let urgencyScore = 0;
  let category: TriageCategory | null = null;

  for (const rule of TRIAGE_RULES) {
    for (const keyword of rule.keywords) {
      if (!text.includes(keyword)) {
        continue;
      }
      matchedKeywords.push(keyword);
      urgencyScore += 1 + rule.bonus;
      // 规则按优先级排列，首个命中的类别即最高级别
      category ??= rule.category;
    }
  }

  const complexityScore = countHits(text, COMPLEXITY_INDICATORS);
  const positive = countHits(text, POSITIVE_WORDS);
  const negative = countHits(text, NEGATIVE_WORDS);
  let sentiment: Sentiment = "neutral";
  if (positive > negative) {
    sentiment = "positive";
  } else if (negative > positive) {
    sentiment = "negative";
  }

  return {
    category: category ?? "routine",
    urgencyScore,
    complexityScore,
    sentiment,
    matchedKeywords
  };
}

export function priorityFromScore(urgencyScore: number): Priority {
  return PRIORITY_BY_SCORE.find((entry) => urgencyScore >= entry.min)?.priority ?? "low";
}

export function assignHandler(classification: Classification, content: string): AssignedHandler {
  const text = content.toLowerCase();
  if (classification.category === "urgent") {
    return "escalation";
  }
  if (countHits(text, SCHEDULING_WORDS) > 0) {
    return "scheduling";
  }
  if (countHits(text, FOLLOW_UP_WORDS) > 0) {
    return "follow_up";
  }
  if (classification.complexityScore > 2) {
    return "research";
  }
  return "decision";
}

export function decide(event: Pick<InboundEvent, "content">): TriageDecision {
  const classification = classify(event);
  const rule = ruleFor(classification.category);
  return {
    classification,
    priority: priorityFromScore(classification.urgencyScore),
    requiresApproval: rule.requiresApproval,
    escalationMinutes: rule.escalationMinutes,
    nextSteps: rule.nextSteps,
    assignedHandler: assignHandler(classification, event.content)
  };
}

/**
 * 分类并生成 triage 路由动作
 */
export function triage(event: InboundEvent, now: Date, id: string): TriageOutcome {
  const decision = decide(event);
  const action: Action = {
    id,
    kind: "triage",
    operation: "triage_and_route",
    description: `Triage ${event.source} input: ${decision.classification.category}`,
    priority: decision.priority,
    payload: {
      event,
      classification: decision.classification,
      assignedHandler: decision.assignedHandler,
      nextSteps: decision.nextSteps
    },
    requiresApproval: decision.requiresApproval,
    approvalConfidenceThreshold: 0.8,
    maxRetries: 3,
    timeoutSeconds: 300,
    createdAt: now.toISOString(),
    status: "pending"
  };
  return { decision, action };
}
