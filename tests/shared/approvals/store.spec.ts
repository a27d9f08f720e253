import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ApprovalStore } from "../../../src/shared/approvals/store.js";
import type { ApprovalRequest } from "../../../src/shared/approvals/types.js";

function request(id: string, overrides: Partial<ApprovalRequest> = {}): ApprovalRequest {
  return {
    id,
    actionId: `act-${id}`,
    actionKind: "decision",
    requesterId: "user-1",
    approverId: "approver@example.com",
    description: "Decide on vendor",
    priority: "medium",
    payload: {},
    confidenceScore: 0.7,
    reasoning: "Autonomous action requires approval.",
    status: "pending",
    createdAt: "2026-03-02T09:00:00.000Z",
    ...overrides
  };
}

describe("ApprovalStore", () => {
  let directory: string;
  let store: ApprovalStore;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "flowgate-approval-store-"));
    store = new ApprovalStore({ directory });
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("pending 请求写入索引与历史", async () => {
    await store.save(request("APP-1"));

    const pending = JSON.parse(await readFile(join(directory, "pending.json"), "utf-8"));
    expect(pending).toEqual({ version: 1, items: ["APP-1"] });
    expect((await store.get("APP-1"))?.status).toBe("pending");
  });

  it("非 pending 的请求只进历史", async () => {
    await store.save(request("APP-1", { status: "auto_approved" }));
    expect(await store.listPending()).toEqual([]);
    expect(await store.listHistory()).toHaveLength(1);
  });

  it("再次保存为终态时移出索引", async () => {
    await store.save(request("APP-1"));
    await store.save(request("APP-1", { status: "rejected", responseReason: "no" }));

    expect(await store.listPending()).toEqual([]);
    expect(await store.listHistory()).toHaveLength(1);
  });

  it("listPending 按创建时间升序，listHistory 降序", async () => {
    await store.save(request("late", { createdAt: "2026-03-02T10:00:00.000Z" }));
    await store.save(request("early", { createdAt: "2026-03-02T08:00:00.000Z" }));

    expect((await store.listPending()).map((item) => item.id)).toEqual(["early", "late"]);
    expect((await store.listHistory()).map((item) => item.id)).toEqual(["late", "early"]);
  });

  it("resolvePending 区分未找到与审批人不匹配", async () => {
    await store.save(request("APP-1"));
    const approve = (current: ApprovalRequest): ApprovalRequest => ({ ...current, status: "approved" });

    expect(await store.resolvePending("missing", "approver@example.com", approve)).toEqual({
      applied: false,
      reason: "not_pending"
    });
    expect(await store.resolvePending("APP-1", "someone@example.com", approve)).toEqual({
      applied: false,
      reason: "approver_mismatch"
    });

    const outcome = await store.resolvePending("APP-1", "approver@example.com", approve);
    expect(outcome.applied).toBe(true);
    expect(await store.listPending()).toEqual([]);
    expect(await store.resolvePending("APP-1", "approver@example.com", approve)).toEqual({
      applied: false,
      reason: "not_pending"
    });
  });

  it("新实例读取已落盘的状态", async () => {
    await store.save(request("APP-1"));
    const reopened = new ApprovalStore({ directory });
    expect((await reopened.listPending()).map((item) => item.id)).toEqual(["APP-1"]);
  });
});
