import jsonLogic, { type RulesLogic } from "json-logic-js";

import type { LoggerFacade } from "../../shared/logging/logger.js";
import type { Condition } from "../../shared/schemas/workflow.js";

const ACTUAL = { var: "actual" };
const EXPECTED = { var: "expected" };

// 字段为空时比较类运算一律为 false
const guarded = (rule: RulesLogic): RulesLogic => ({ and: [{ "!!": ACTUAL }, rule] });

const OPERATOR_RULES: Record<string, RulesLogic> = {
  equals: { "===": [ACTUAL, EXPECTED] },
  not_equals: { "!==": [ACTUAL, EXPECTED] },
  contains: guarded({ in: [EXPECTED, ACTUAL] }),
  not_contains: { or: [{ "!": ACTUAL }, { "!": { in: [EXPECTED, ACTUAL] } }] },
  gt: guarded({ ">": [ACTUAL, EXPECTED] }),
  lt: guarded({ "<": [ACTUAL, EXPECTED] }),
  gte: guarded({ ">=": [ACTUAL, EXPECTED] }),
  lte: guarded({ "<=": [ACTUAL, EXPECTED] }),
  is_empty: { "!": ACTUAL },
  is_not_empty: { "!!": ACTUAL }
};

const OPERATOR_ALIASES: Record<string, string> = {
  greater_than: "gt",
  less_than: "lt",
  greater_than_equals: "gte",
  less_than_equals: "lte"
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * 点路径取值；任一段缺失返回 null
 */
export function readPath(context: Readonly<Record<string, unknown>>, path: string): unknown {
  let current: unknown = context;
  for (const key of path.split(".")) {
    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, key)) {
      return null;
    }
    current = current[key];
  }
  return current === undefined ? null : current;
}

export function normalizeOperator(operator: string): string {
  return OPERATOR_ALIASES[operator] ?? operator;
}

export function isKnownOperator(operator: string): boolean {
  return normalizeOperator(operator) in OPERATOR_RULES;
}

/**
 * 求值单个条件；未知运算符或求值异常都视为 false
 */
export function evaluateCondition(
  condition: Condition,
  context: Readonly<Record<string, unknown>>,
  logger?: LoggerFacade
): boolean {
  const operator = normalizeOperator(condition.operator);
  const rule = OPERATOR_RULES[operator];
  if (!rule) {
    logger?.warn(`未知的条件运算符 ${condition.operator}`, { field: condition.field });
    return false;
  }
  const actual = readPath(context, condition.field);
  const data = {
    // 数字字段按字符串做包含判断
    actual: typeof actual === "number" && operator.endsWith("contains") ? String(actual) : actual,
    expected: condition.value ?? null
  };
  try {
    const value: unknown = jsonLogic.apply(rule, data);
    return Boolean(value);
  } catch (error) {
    logger?.warn("条件求值失败", {
      field: condition.field,
      operator: condition.operator,
      error: error instanceof Error ? error.message : String(error)
    });
    return false;
  }
}

export function evaluateAll(
  conditions: readonly Condition[],
  context: Readonly<Record<string, unknown>>,
  logger?: LoggerFacade
): boolean {
  return conditions.every((condition) => evaluateCondition(condition, context, logger));
}
