import { readFile } from "node:fs/promises";

import { toValidationIssues, ValidationError, type ValidationIssue } from "../../shared/errors.js";
import {
  WorkflowDefinitionSchema,
  type Connection,
  type Step,
  type WorkflowDefinition
} from "../../shared/schemas/workflow.js";

export interface WorkflowGraph {
  readonly definition: WorkflowDefinition;
  readonly steps: ReadonlyMap<string, Step>;
  /** 出边按声明顺序排列 */
  readonly outgoing: ReadonlyMap<string, readonly Connection[]>;
}

function collectIdIssues(definition: WorkflowDefinition): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const stepIds = new Set<string>();
  definition.steps.forEach((step, index) => {
    if (step.id === definition.trigger.id) {
      issues.push({ path: `steps.${index}.id`, message: `步骤 ID ${step.id} 与触发器 ID 冲突` });
    }
    if (stepIds.has(step.id)) {
      issues.push({ path: `steps.${index}.id`, message: `重复的步骤 ID: ${step.id}` });
    }
    stepIds.add(step.id);
  });

  const connectionIds = new Set<string>();
  definition.connections.forEach((connection, index) => {
    if (connectionIds.has(connection.id)) {
      issues.push({ path: `connections.${index}.id`, message: `重复的连接 ID: ${connection.id}` });
    }
    connectionIds.add(connection.id);
    if (connection.fromId !== definition.trigger.id && !stepIds.has(connection.fromId)) {
      issues.push({ path: `connections.${index}.fromId`, message: `连接 ${connection.id} 引用了不存在的起点: ${connection.fromId}` });
    }
    if (connection.toId === definition.trigger.id) {
      issues.push({ path: `connections.${index}.toId`, message: `连接 ${connection.id} 不能指向触发器` });
    } else if (!stepIds.has(connection.toId)) {
      issues.push({ path: `connections.${index}.toId`, message: `连接 ${connection.id} 引用了不存在的终点: ${connection.toId}` });
    }
  });
  return issues;
}

/**
 * 仅由无 guard 连接组成的环会无限执行，需要拒绝
 */
function findUnguardedCycle(outgoing: ReadonlyMap<string, readonly Connection[]>): string[] | null {
  const visiting = new Set<string>();
  const done = new Set<string>();
  const path: string[] = [];

  const visit = (nodeId: string): string[] | null => {
    if (done.has(nodeId)) {
      return null;
    }
    if (visiting.has(nodeId)) {
      return [...path.slice(path.indexOf(nodeId)), nodeId];
    }
    visiting.add(nodeId);
    path.push(nodeId);
    for (const connection of outgoing.get(nodeId) ?? []) {
      if (connection.guard) {
        continue;
      }
      const cycle = visit(connection.toId);
      if (cycle) {
        return cycle;
      }
    }
    path.pop();
    visiting.delete(nodeId);
    done.add(nodeId);
    return null;
  };

  for (const nodeId of outgoing.keys()) {
    const cycle = visit(nodeId);
    if (cycle) {
      return cycle;
    }
  }
  return null;
}

export function buildWorkflowGraph(definition: WorkflowDefinition): WorkflowGraph {
  const issues = collectIdIssues(definition);
  if (issues.length > 0) {
    throw new ValidationError(`Workflow ${definition.id} is invalid`, issues);
  }

  const steps = new Map(definition.steps.map((step) => [step.id, step] as const));
  const outgoing = new Map<string, Connection[]>();
  for (const connection of definition.connections) {
    const list = outgoing.get(connection.fromId) ?? [];
    list.push(connection);
    outgoing.set(connection.fromId, list);
  }

  const cycle = findUnguardedCycle(outgoing);
  if (cycle) {
    throw new ValidationError(`Workflow ${definition.id} is invalid`, [
      { path: "connections", message: `存在无条件循环: ${cycle.join(" -> ")}` }
    ]);
  }

  return { definition, steps, outgoing };
}

export function parseWorkflow(raw: unknown): WorkflowDefinition {
  const parsed = WorkflowDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError("Workflow definition failed schema validation", toValidationIssues(parsed.error.issues));
  }
  return parsed.data;
}

/**
 * 校验原始定义并构建遍历用的图结构
 */
export function loadWorkflow(raw: unknown): WorkflowGraph {
  return buildWorkflowGraph(parseWorkflow(raw));
}

export async function loadWorkflowFromFile(filePath: string): Promise<WorkflowGraph> {
  const content = await readFile(filePath, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`Workflow file ${filePath} is not valid JSON`, [
      { path: "(root)", message: error instanceof Error ? error.message : String(error) }
    ]);
  }
  return loadWorkflow(raw);
}

/**
 * 定义不可变：编辑即生成新版本
 */
export function nextVersion(current: WorkflowDefinition, changes: Partial<Omit<WorkflowDefinition, "id" | "version">>, now: Date): WorkflowDefinition {
  return buildWorkflowGraph({
    ...current,
    ...changes,
    id: current.id,
    version: current.version + 1,
    createdAt: now.toISOString()
  }).definition;
}
