import { describe, expect, it } from "vitest";
import type { ErrorInfo } from "@flowgraph/shared";
import { MemoryTaskQueue, MemoryTaskStore } from "../src/memory.js";

const T0 = Date.parse("2026-01-01T00:00:00.000Z");
const failure: ErrorInfo = { kind: "ToolExecutionError", message: "Tool 'echo' failed: boom", nodeId: "task_A" };

function setup(maxRetries = 1) {
  let now = T0;
  const store = new MemoryTaskStore(() => now);
  const advance = (ms: number) => {
    now += ms;
  };
  const create = () =>
    store.createTask({ type: "workflow_execute", params: {}, metadata: {}, maxRetries, ttlMs: 60_000 });
  return { store, advance, create };
}

describe("MemoryTaskStore", () => {
  it("retries until max retries, then fails terminally", async () => {
    const { store, create } = setup(1);
    const task = await create();
    await store.markQueued(task.id);

    await store.startTask(task.id, "worker-a", 1000);
    const first = await store.failTask(task.id, "worker-a", failure, true);
    expect(first?.retrying).toBe(true);
    expect(first?.task).toMatchObject({ status: "queued", retryCount: 1, error: failure, workerId: null });

    await store.startTask(task.id, "worker-a", 1000);
    const second = await store.failTask(task.id, "worker-a", failure, true);
    expect(second?.retrying).toBe(false);
    expect(second?.task).toMatchObject({
      status: "failed",
      retryCount: 1,
      completedAt: "2026-01-01T00:00:00.000Z",
      expiresAt: "2026-01-01T00:01:00.000Z"
    });
  });

  it("fails non-retryable errors without spending retries", async () => {
    const { store, create } = setup(3);
    const task = await create();
    await store.markQueued(task.id);
    await store.startTask(task.id, "worker-a", 1000);

    const outcome = await store.failTask(task.id, "worker-a", failure, false);
    expect(outcome?.retrying).toBe(false);
    expect(outcome?.task.status).toBe("failed");
    expect(outcome?.task.retryCount).toBe(0);
  });

  it("only lets the lease owner complete a task", async () => {
    const { store, create } = setup();
    const task = await create();
    await store.markQueued(task.id);
    await store.startTask(task.id, "worker-a", 1000);

    expect(await store.completeTask(task.id, "worker-b", { ok: true })).toBeNull();
    expect(await store.completeTask(task.id, "worker-a", { ok: true })).toMatchObject({
      status: "completed",
      result: { ok: true }
    });
    expect(await store.completeTask(task.id, "worker-a", { ok: false })).toBeNull();
  });

  it("hands an expired lease to another worker", async () => {
    const { store, advance, create } = setup();
    const task = await create();
    await store.markQueued(task.id);
    await store.startTask(task.id, "worker-a", 1000);

    expect(await store.startTask(task.id, "worker-b", 1000)).toBeNull();
    advance(1500);
    expect(await store.renewLease(task.id, "worker-b", 1000)).toBe(false);
    const takeover = await store.startTask(task.id, "worker-b", 1000);
    expect(takeover?.workerId).toBe("worker-b");
    expect(takeover?.startedAt).toBe("2026-01-01T00:00:00.000Z");
    expect(await store.renewLease(task.id, "worker-a", 1000)).toBe(false);
  });

  it("requeues expired leases without counting a retry", async () => {
    const { store, advance, create } = setup();
    const task = await create();
    await store.markQueued(task.id);
    await store.startTask(task.id, "worker-a", 1000);
    advance(1001);

    const recovered = await store.recoverExpiredLeases();
    expect(recovered.map((record) => [record.id, record.status, record.retryCount])).toEqual([[task.id, "queued", 0]]);
    expect(await store.recoverExpiredLeases()).toEqual([]);
  });

  it("never moves a task backward", async () => {
    const { store, create } = setup();
    const task = await create();
    await store.markQueued(task.id);
    await store.startTask(task.id, "worker-a", 1000);

    expect(await store.markQueued(task.id)).toBeNull();
    expect(await store.cancelTask(task.id)).toBeNull();
  });

  it("hides and purges records past their expiry", async () => {
    const { store, advance, create } = setup();
    const task = await create();
    await store.cancelTask(task.id);

    advance(59_999);
    expect((await store.getTask(task.id))?.status).toBe("cancelled");
    advance(1);
    expect(await store.getTask(task.id)).toBeNull();
    expect(await store.purgeExpired()).toBe(1);
    expect(await store.listTasks()).toEqual([]);
  });
});

describe("MemoryTaskQueue", () => {
  it("redelivers messages left idle past the lease", async () => {
    let now = T0;
    const queue = new MemoryTaskQueue(() => now);
    await queue.publish("task_queue:workflow_execute", "task-1");

    const [message] = await queue.readBatch(["task_queue:workflow_execute"], "worker-a", 10, 0);
    expect(message.taskId).toBe("task-1");
    expect(await queue.claimStale(["task_queue:workflow_execute"], "worker-b", 1000, 10)).toEqual([]);

    now += 1000;
    expect(await queue.claimStale(["task_queue:workflow_execute"], "worker-b", 1000, 10)).toEqual([message]);
    await queue.ack(message);
    expect(await queue.length("task_queue:workflow_execute")).toBe(0);
  });

  it("holds delayed messages until they are due", async () => {
    let now = T0;
    const queue = new MemoryTaskQueue(() => now);
    await queue.publish("task_queue:workflow_execute", "task-1", 2000);

    expect(await queue.pumpDelayed()).toBe(0);
    expect(await queue.length("task_queue:workflow_execute")).toBe(0);
    now += 2000;
    expect(await queue.pumpDelayed()).toBe(1);
    expect(queue.delayedCount()).toBe(0);
    expect(await queue.length("task_queue:workflow_execute")).toBe(1);
  });
});
