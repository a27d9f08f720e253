import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { InProcessDispatchQueue } from "../../../../src/service/orchestrator/queue/dispatchQueue.js";

describe("InProcessDispatchQueue", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("延迟到期后调用 worker", async () => {
    const worker = vi.fn(async (_executionId: string) => undefined);
    const queue = new InProcessDispatchQueue({ worker, concurrency: 2 });

    queue.enqueue("exec-1", 1000);
    await vi.advanceTimersByTimeAsync(999);
    expect(worker).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await queue.drain();
    expect(worker).toHaveBeenCalledWith("exec-1");
    expect(queue.size).toBe(0);
  });

  it("并发数受限", async () => {
    let active = 0;
    let peak = 0;
    const worker = async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise<void>((resolve) => setTimeout(resolve, 10));
      active--;
    };
    const queue = new InProcessDispatchQueue({ worker, concurrency: 2 });

    for (const id of ["a", "b", "c", "d"]) {
      queue.enqueue(id);
    }
    await vi.advanceTimersByTimeAsync(100);
    await queue.drain();

    expect(peak).toBe(2);
  });

  it("worker 抛错不影响后续派发", async () => {
    const seen: string[] = [];
    const worker = async (executionId: string) => {
      seen.push(executionId);
      if (executionId === "bad") {
        throw new Error("worker failed");
      }
    };
    const queue = new InProcessDispatchQueue({ worker, concurrency: 1 });

    queue.enqueue("bad");
    queue.enqueue("good");
    await vi.advanceTimersByTimeAsync(0);
    await queue.drain();

    expect(seen).toEqual(["bad", "good"]);
  });

  it("关闭后清除定时器并忽略新的派发", async () => {
    const worker = vi.fn(async (_executionId: string) => undefined);
    const queue = new InProcessDispatchQueue({ worker, concurrency: 1 });

    queue.enqueue("later", 5000);
    await queue.close();
    queue.enqueue("after-close");
    await vi.advanceTimersByTimeAsync(10_000);

    expect(worker).not.toHaveBeenCalled();
    expect(queue.size).toBe(0);
  });
});
