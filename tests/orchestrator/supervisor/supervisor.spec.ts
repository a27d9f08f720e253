import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ExecutionSupervisor } from "../../../src/orchestrator/supervisor/supervisor.js";
import { ExecutionsRepository } from "../../../src/service/orchestrator/repositories/ExecutionsRepository.js";
import type { ExecutionStatus, WorkflowExecution } from "../../../src/shared/schemas/execution.js";

const SWEEP_AT = new Date("2026-03-02T09:00:00.000Z");
const MINUTE = 60_000;

function execution(id: string, status: ExecutionStatus, overrides: Partial<WorkflowExecution> = {}): WorkflowExecution {
  return {
    id,
    workflowId: "wf-1",
    workflowVersion: 1,
    status,
    triggerPayload: {},
    startedAt: "2026-03-02T08:00:00.000Z",
    updatedAt: "2026-03-02T08:00:00.000Z",
    retryCount: 0,
    maxRetries: 3,
    steps: [],
    ...overrides
  };
}

describe("ExecutionSupervisor", () => {
  let directory: string;
  let executions: ExecutionsRepository;
  let enqueued: { executionId: string; delayMs: number | undefined }[];
  let supervisor: ExecutionSupervisor;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "flowgate-supervisor-"));
    executions = new ExecutionsRepository({ directory, now: () => SWEEP_AT });
    await executions.initialize();
    enqueued = [];
    supervisor = new ExecutionSupervisor({
      executions,
      dispatcher: {
        enqueue(executionId, delayMs) {
          enqueued.push({ executionId, delayMs });
        }
      },
      runningTimeoutMs: 30 * MINUTE,
      startupGraceMs: 5 * MINUTE,
      baseBackoffMs: MINUTE,
      schedule: "*/30 * * * * *",
      now: () => SWEEP_AT
    });
  });

  afterEach(async () => {
    supervisor.stop();
    await rm(directory, { recursive: true, force: true });
  });

  it("超过运行时限的执行被标记为 timeout", async () => {
    await executions.create(execution("stuck", "running"));
    await executions.create(execution("busy", "running", { updatedAt: "2026-03-02T08:45:00.000Z" }));

    const report = await supervisor.sweep();

    expect(report.timedOut).toEqual(["stuck"]);
    expect(await executions.read("stuck")).toMatchObject({
      status: "timeout",
      error: "Execution timed out after 1800s",
      completedAt: SWEEP_AT.toISOString()
    });
    expect((await executions.read("busy"))?.status).toBe("running");
  });

  it("失败的执行按指数退避进入 retrying", async () => {
    await executions.create(execution("first", "failed", { error: "Step a failed: boom" }));
    await executions.create(execution("third", "failed", { retryCount: 2 }));

    const report = await supervisor.sweep();

    expect([...report.retried].sort((a, b) => a.executionId.localeCompare(b.executionId))).toEqual([
      { executionId: "first", attempt: 1, delayMs: 60_000 },
      { executionId: "third", attempt: 3, delayMs: 240_000 }
    ]);
    expect(await executions.read("first")).toMatchObject({
      status: "retrying",
      retryCount: 1,
      nextAttemptAt: "2026-03-02T09:01:00.000Z"
    });
    expect(enqueued).toContainEqual({ executionId: "third", delayMs: 240_000 });
  });

  it("重试用尽后只标记一次", async () => {
    await executions.create(execution("done-trying", "failed", { retryCount: 3 }));

    expect((await supervisor.sweep()).exhausted).toEqual(["done-trying"]);
    expect(await executions.read("done-trying")).toMatchObject({ status: "failed", retryExhausted: true });

    expect((await supervisor.sweep()).exhausted).toEqual([]);
    expect(enqueued).toEqual([]);
  });

  it("停滞的 pending 与 retrying 执行被重新派发", async () => {
    await executions.create(execution("stale-pending", "pending", { startedAt: "2026-03-02T08:50:00.000Z" }));
    await executions.create(execution("fresh-pending", "pending", { startedAt: "2026-03-02T08:58:00.000Z" }));
    await executions.create(
      execution("stale-retry", "retrying", { retryCount: 1, nextAttemptAt: "2026-03-02T08:50:00.000Z" })
    );
    await executions.create(
      execution("scheduled-retry", "retrying", { retryCount: 1, nextAttemptAt: "2026-03-02T09:10:00.000Z" })
    );

    const report = await supervisor.sweep();

    expect([...report.resubmitted].sort()).toEqual(["stale-pending", "stale-retry"]);
    expect([...enqueued].sort((a, b) => a.executionId.localeCompare(b.executionId))).toEqual([
      { executionId: "stale-pending", delayMs: 0 },
      { executionId: "stale-retry", delayMs: 0 }
    ]);
  });

  it("终态与待审批的执行不受影响", async () => {
    await executions.create(execution("ok", "completed", { completedAt: "2026-03-02T08:01:00.000Z" }));
    await executions.create(execution("waiting", "pending_approval"));

    const report = await supervisor.sweep();

    expect(report).toEqual({ sweptAt: SWEEP_AT.toISOString(), timedOut: [], resubmitted: [], retried: [], exhausted: [], resumed: [] });
    expect(supervisor.lastReport).toEqual(report);
  });

  it("start/stop 切换定时扫描", () => {
    expect(supervisor.running).toBe(false);
    supervisor.start();
    expect(supervisor.running).toBe(true);
    supervisor.stop();
    expect(supervisor.running).toBe(false);
  });
});
