import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, expect, it } from "vitest";

import { loadWorkflow, loadWorkflowFromFile, nextVersion, parseWorkflow } from "../../../src/orchestrator/workflow/loader.js";
import { ValidationError } from "../../../src/shared/errors.js";

const trigger = { id: "t", type: "manual" as const };

function definition(overrides: Record<string, unknown> = {}) {
  return {
    id: "wf-1",
    name: "Sample",
    trigger,
    steps: [
      { id: "a", type: "set_variable", config: { variable: "x", value: 1 } },
      { id: "b", type: "set_variable", config: { variable: "y", value: 2 } }
    ],
    connections: [
      { id: "c1", fromId: "t", toId: "a" },
      { id: "c2", fromId: "a", toId: "b" }
    ],
    createdAt: "2026-03-02T09:00:00.000Z",
    ...overrides
  };
}

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.issues.map((issue) => issue.path);
    }
    throw error;
  }
  return [];
}

describe("parseWorkflow", () => {
  it("填充默认字段", () => {
    const parsed = parseWorkflow(definition());
    expect(parsed.version).toBe(1);
    expect(parsed.enabled).toBe(true);
    expect(parsed.variables).toEqual({});
    expect(parsed.steps[0]?.conditions).toEqual([]);
    expect(parsed.steps[0]?.continueOnFailure).toBe(false);
  });

  it("工作流 id 含其他字符时报 schema 错误", () => {
    expect(issuesOf(() => parseWorkflow(definition({ id: "a.b" })))).toEqual(["id"]);
    expect(issuesOf(() => parseWorkflow(definition({ id: "x".repeat(101) })))).toEqual(["id"]);
    expect(parseWorkflow(definition({ id: "Team_A-1" })).id).toBe("Team_A-1");
  });

  it("未知步骤类型报 schema 错误", () => {
    expect(issuesOf(() => parseWorkflow(definition({ steps: [{ id: "a", type: "teleport" }] })))).toEqual(["steps.0.type"]);
  });
});

describe("loadWorkflow", () => {
  it("按起点索引出边并保持声明顺序", () => {
    const graph = loadWorkflow(
      definition({
        connections: [
          { id: "c1", fromId: "t", toId: "b", guard: { field: "go", operator: "equals", value: "b" } },
          { id: "c2", fromId: "t", toId: "a" }
        ]
      })
    );
    expect(graph.outgoing.get("t")?.map((connection) => connection.id)).toEqual(["c1", "c2"]);
    expect([...graph.steps.keys()]).toEqual(["a", "b"]);
  });

  it("拒绝重复 ID 与悬空连接", () => {
    const paths = issuesOf(() =>
      loadWorkflow(
        definition({
          steps: [
            { id: "a", type: "delay" },
            { id: "a", type: "delay" },
            { id: "t", type: "delay" }
          ],
          connections: [
            { id: "c1", fromId: "ghost", toId: "a" },
            { id: "c1", fromId: "a", toId: "t" },
            { id: "c3", fromId: "a", toId: "nowhere" }
          ]
        })
      )
    );
    expect(paths).toEqual([
      "steps.1.id",
      "steps.2.id",
      "connections.0.fromId",
      "connections.1.id",
      "connections.1.toId",
      "connections.2.toId"
    ]);
  });

  it("拒绝无条件环，允许带 guard 的环", () => {
    const loop = [
      { id: "c1", fromId: "t", toId: "a" },
      { id: "c2", fromId: "a", toId: "b" },
      { id: "c3", fromId: "b", toId: "a" }
    ];
    expect(issuesOf(() => loadWorkflow(definition({ connections: loop })))).toEqual(["connections"]);

    const guarded = loop.map((connection) =>
      connection.id === "c3" ? { ...connection, guard: { field: "again", operator: "equals", value: true } } : connection
    );
    expect(() => loadWorkflow(definition({ connections: guarded }))).not.toThrow();
  });
});

describe("loadWorkflowFromFile", () => {
  it("读取 JSON 文件并构建图，非法 JSON 报校验错误", async () => {
    const directory = await mkdtemp(join(tmpdir(), "flowgate-workflow-"));
    try {
      const valid = join(directory, "valid.json");
      await writeFile(valid, JSON.stringify(definition()), "utf-8");
      const graph = await loadWorkflowFromFile(valid);
      expect(graph.definition.id).toBe("wf-1");
      expect(graph.outgoing.get("a")?.map((connection) => connection.toId)).toEqual(["b"]);

      const broken = join(directory, "broken.json");
      await writeFile(broken, "{ not json", "utf-8");
      await expect(loadWorkflowFromFile(broken)).rejects.toBeInstanceOf(ValidationError);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});

describe("nextVersion", () => {
  it("生成新版本而不修改原定义", () => {
    const current = parseWorkflow(definition());
    const next = nextVersion(current, { name: "Renamed" }, new Date("2026-03-03T00:00:00.000Z"));

    expect(next).toMatchObject({ id: "wf-1", version: 2, name: "Renamed", createdAt: "2026-03-03T00:00:00.000Z" });
    expect(current.version).toBe(1);
    expect(current.name).toBe("Sample");
  });
});
