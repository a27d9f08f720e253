import { afterEach, describe, expect, it } from "vitest";

import { createMockConnectors, type MockConnectors } from "../../../src/orchestrator/connectors/mock.js";
import { GraphExecutor } from "../../../src/orchestrator/executor/executor.js";
import type { ApprovalGateway } from "../../../src/orchestrator/executor/types.js";
import { loadWorkflow } from "../../../src/orchestrator/workflow/loader.js";
import type { LogEntry } from "../../../src/shared/logging/events.js";
import { createLoggerFacade, setLogEventPublisher } from "../../../src/shared/logging/logger.js";
import type { StepRecord } from "../../../src/shared/schemas/execution.js";

const NOW = new Date("2026-03-02T09:00:00.000Z");
const now = () => NOW;

function graphOf(steps: unknown[], connections: unknown[]) {
  return loadWorkflow({
    id: "wf-exec",
    name: "Executor",
    trigger: { id: "t", type: "manual" },
    steps,
    connections,
    createdAt: NOW.toISOString()
  });
}

function failingWebhooks(): MockConnectors {
  return {
    ...createMockConnectors(),
    webhooks: {
      async call() {
        return { statusCode: 500, body: "boom" };
      }
    }
  };
}

const gateway: ApprovalGateway = {
  async requestApproval(action, requesterId) {
    return {
      id: "APP-1",
      actionId: action.id,
      actionKind: action.kind,
      requesterId,
      approverId: "approver@example.com",
      description: action.description,
      priority: action.priority,
      payload: { ...action.payload },
      confidenceScore: 0.7,
      reasoning: "Autonomous action requires approval.",
      status: "pending",
      createdAt: NOW.toISOString()
    };
  }
};

describe("GraphExecutor", () => {
  describe("连接 guard 路由", () => {
    const graph = graphOf(
      [
        { id: "notify", type: "send_notification", config: { message: "Urgent: {{subject}}" } },
        { id: "task", type: "create_task", config: { name: "{{subject}}", project: "Inbox" } }
      ],
      [
        { id: "c1", fromId: "t", toId: "notify", guard: { field: "priority", operator: "equals", value: "urgent" } },
        { id: "c2", fromId: "t", toId: "task" }
      ]
    );

    it("选择第一条 guard 成立的出边", async () => {
      const connectors = createMockConnectors();
      const executor = new GraphExecutor({ connectors });
      const outcome = await executor.run(graph, { id: "exec-1", triggerPayload: { priority: "urgent", subject: "db down" } }, { now });

      expect(outcome.status).toBe("completed");
      expect(outcome.completedAt).toBe(NOW.toISOString());
      expect(outcome.result?.executedSteps).toEqual(["notify"]);
      expect(connectors.calls.notifications.map((call) => call.message)).toEqual(["Urgent: db down"]);
      expect(connectors.calls.tasks).toEqual([]);
    });

    it("guard 不成立时落到无 guard 的出边", async () => {
      const connectors = createMockConnectors();
      const outcome = await new GraphExecutor({ connectors }).run(
        graph,
        { id: "exec-2", triggerPayload: { priority: "low", subject: "typo" } },
        { now }
      );

      expect(outcome.result?.executedSteps).toEqual(["task"]);
      expect(connectors.calls.tasks).toEqual([{ name: "typo", project: "Inbox" }]);
    });
  });

  describe("步骤失败", () => {
    const steps = (continueOnFailure: boolean) => [
      { id: "hook", type: "webhook_call", config: { url: "https://hooks.example.com/x" }, continueOnFailure },
      { id: "after", type: "set_variable", config: { variable: "done", value: true } }
    ];
    const connections = [
      { id: "c1", fromId: "t", toId: "hook" },
      { id: "c2", fromId: "hook", toId: "after" }
    ];

    it("continueOnFailure 时记录错误并继续", async () => {
      const outcome = await new GraphExecutor({ connectors: failingWebhooks() }).run(
        graphOf(steps(true), connections),
        { id: "exec-3", triggerPayload: {} },
        { now }
      );

      expect(outcome.status).toBe("completed");
      expect(outcome.steps.map((record) => record.status)).toEqual(["failed", "completed"]);
      expect(outcome.steps[0]?.error).toBe("http_error: webhook https://hooks.example.com/x responded with 500");
      expect(outcome.result?.executedSteps).toEqual(["after"]);
      expect(outcome.result?.context).toEqual({
        hook: { error: "webhook https://hooks.example.com/x responded with 500", code: "http_error" },
        done: true,
        after: { done: true }
      });
    });

    it("否则执行失败并停止", async () => {
      const outcome = await new GraphExecutor({ connectors: failingWebhooks() }).run(
        graphOf(steps(false), connections),
        { id: "exec-4", triggerPayload: {} },
        { now }
      );

      expect(outcome.status).toBe("failed");
      expect(outcome.error).toBe("Step hook failed: webhook https://hooks.example.com/x responded with 500");
      expect(outcome.result?.executedSteps).toEqual([]);
    });

    describe("注入的 logger", () => {
      afterEach(() => {
        setLogEventPublisher(null);
      });

      it("按执行绑定工作流与执行 id", async () => {
        const entries: LogEntry[] = [];
        setLogEventPublisher((entry) => entries.push(entry));

        await new GraphExecutor({ connectors: failingWebhooks(), logger: createLoggerFacade("executor-custom") }).run(
          graphOf(steps(false), connections),
          { id: "exec-5", triggerPayload: {} },
          { now }
        );

        const failure = entries.find((entry) => entry.level === "error");
        expect(failure?.component).toBe("executor-custom");
        expect(failure?.message).toBe("步骤 hook 执行失败");
        expect(failure?.context).toMatchObject({ workflowId: "wf-exec", executionId: "exec-5", code: "http_error" });
        expect(entries.every((entry) => entry.component === "executor-custom")).toBe(true);
      });
    });

    it("处理器抛错被转换为步骤失败", async () => {
      const executor = new GraphExecutor({
        connectors: createMockConnectors(),
        handlers: {
          set_variable: async () => {
            throw new Error("kaboom");
          }
        }
      });
      const outcome = await executor.run(
        graphOf([{ id: "a", type: "set_variable", config: { variable: "x" } }], [{ id: "c1", fromId: "t", toId: "a" }]),
        { id: "exec-5", triggerPayload: {} },
        { now }
      );

      expect(outcome.status).toBe("failed");
      expect(outcome.error).toBe("Step a failed: kaboom");
      expect(outcome.steps[0]?.error).toBe("handler_threw: kaboom");
    });
  });

  it("条件不满足的步骤被跳过，遍历继续", async () => {
    const outcome = await new GraphExecutor({ connectors: createMockConnectors() }).run(
      graphOf(
        [
          { id: "a", type: "set_variable", config: { variable: "x", value: 1 }, conditions: [{ field: "vip", operator: "equals", value: true }] },
          { id: "b", type: "set_variable", config: { variable: "y", value: 2 } }
        ],
        [
          { id: "c1", fromId: "t", toId: "a" },
          { id: "c2", fromId: "a", toId: "b" }
        ]
      ),
      { id: "exec-6", triggerPayload: { vip: false } },
      { now }
    );

    expect(outcome.status).toBe("completed");
    expect(outcome.steps.map((record) => `${record.stepId}:${record.status}`)).toEqual(["a:skipped", "b:completed"]);
    expect(outcome.result?.executedSteps).toEqual(["b"]);
  });

  it("回调依次收到 running 与最终记录", async () => {
    const recorded: StepRecord[] = [];
    await new GraphExecutor({ connectors: createMockConnectors() }).run(
      graphOf([{ id: "a", type: "set_variable", config: { variable: "x", value: 1 } }], [{ id: "c1", fromId: "t", toId: "a" }]),
      { id: "exec-7", triggerPayload: {} },
      { now, onStepRecorded: (record) => void recorded.push(record) }
    );

    expect(recorded.map((record) => record.status)).toEqual(["running", "completed"]);
    expect(recorded[1]).toEqual({
      stepId: "a",
      executionId: "exec-7",
      status: "completed",
      startedAt: NOW.toISOString(),
      completedAt: NOW.toISOString(),
      result: { x: 1 }
    });
  });

  it("取消后不再派发步骤", async () => {
    const connectors = createMockConnectors();
    const outcome = await new GraphExecutor({ connectors }).run(
      graphOf([{ id: "a", type: "send_notification", config: { message: "hi" } }], [{ id: "c1", fromId: "t", toId: "a" }]),
      { id: "exec-8", triggerPayload: {} },
      { now, isCancelled: () => true }
    );

    expect(outcome.status).toBe("cancelled");
    expect(outcome.steps).toEqual([]);
    expect(connectors.calls.notifications).toEqual([]);
  });

  it("超过最大步数时失败", async () => {
    const outcome = await new GraphExecutor({ connectors: createMockConnectors(), maxSteps: 3 }).run(
      graphOf(
        [
          { id: "a", type: "set_variable", config: { variable: "x", value: 1 } },
          { id: "b", type: "set_variable", config: { variable: "y", value: 2 } }
        ],
        [
          { id: "c1", fromId: "t", toId: "a" },
          { id: "c2", fromId: "a", toId: "b" },
          { id: "c3", fromId: "b", toId: "a", guard: { field: "loop", operator: "equals", value: true } }
        ]
      ),
      { id: "exec-9", triggerPayload: { loop: true } },
      { now }
    );

    expect(outcome.status).toBe("failed");
    expect(outcome.error).toBe("Execution exceeded the maximum of 3 steps");
    expect(outcome.result?.executedSteps).toEqual(["a", "b", "a"]);
  });

  describe("审批关卡", () => {
    const graph = graphOf(
      [
        { id: "prep", type: "set_variable", config: { variable: "ready", value: true } },
        { id: "gate", type: "approval_gate", config: {} },
        { id: "ship", type: "send_notification", config: { message: "shipping {{topic}}" } }
      ],
      [
        { id: "c1", fromId: "t", toId: "prep" },
        { id: "c2", fromId: "prep", toId: "gate" },
        { id: "c3", fromId: "gate", toId: "ship" }
      ]
    );

    it("待审批时挂起并给出恢复点", async () => {
      const connectors = createMockConnectors();
      const outcome = await new GraphExecutor({ connectors, approvals: gateway }).run(
        graph,
        { id: "exec-10", triggerPayload: { topic: "launch" } },
        { now }
      );

      expect(outcome.status).toBe("pending_approval");
      expect(outcome.approvalId).toBe("APP-1");
      expect(outcome.resume).toEqual({
        afterStepId: "gate",
        context: { topic: "launch", ready: true, prep: { ready: true } }
      });
      expect(outcome.steps.map((record) => `${record.stepId}:${record.status}`)).toEqual(["prep:completed", "gate:pending"]);
      expect(connectors.calls.notifications).toEqual([]);
    });

    it("从恢复点继续执行后续步骤", async () => {
      const connectors = createMockConnectors();
      const outcome = await new GraphExecutor({ connectors, approvals: gateway }).run(
        graph,
        {
          id: "exec-10",
          triggerPayload: { topic: "launch" },
          resume: { afterStepId: "gate", context: { topic: "launch", gate: { approvalId: "APP-1", status: "approved" } } }
        },
        { now }
      );

      expect(outcome.status).toBe("completed");
      expect(outcome.result?.executedSteps).toEqual(["ship"]);
      expect(connectors.calls.notifications.map((call) => call.message)).toEqual(["shipping launch"]);
    });
  });
});
