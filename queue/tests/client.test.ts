import { describe, expect, it } from "vitest";
import { QueueUnavailableError, TaskNotCancellable, TaskNotFound, withLogContext } from "@flowgraph/shared";
import { calculateBackoffMs } from "../src/backoff.js";
import { TaskQueueClient } from "../src/client.js";
import { MemoryTaskQueue, MemoryTaskStore } from "../src/memory.js";

class OfflineQueue extends MemoryTaskQueue {
  async publish(): Promise<void> {
    throw new Error("connection refused");
  }
}

function setup(queue = new MemoryTaskQueue()) {
  const store = new MemoryTaskStore();
  const client = new TaskQueueClient(store, queue, {
    maxRetries: 3,
    ttlMs: 7 * 24 * 60 * 60 * 1000,
    taskTypes: ["workflow_execute"]
  });
  return { store, queue, client };
}

describe("TaskQueueClient", () => {
  it("enqueues a queued task and carries the trace id", async () => {
    const { client } = setup();
    const taskId = await withLogContext({ traceId: "trace-1" }, () =>
      client.enqueue("workflow_execute", { workflowId: "greet" }, { source: "test" })
    );

    const task = await client.getStatus(taskId);
    expect(task.status).toBe("queued");
    expect(task.metadata).toEqual({ source: "test", traceId: "trace-1" });
    expect(task.maxRetries).toBe(3);
    expect(await client.queueStats()).toEqual({ "task_queue:workflow_execute": 1 });
  });

  it("fails the task and signals degraded mode when publishing fails", async () => {
    const { client, store } = setup(new OfflineQueue());

    await expect(client.enqueue("workflow_execute", {})).rejects.toBeInstanceOf(QueueUnavailableError);
    const [task] = await store.listTasks();
    expect(task.status).toBe("failed");
    expect(task.error).toEqual({
      kind: "QueueUnavailableError",
      message: "Task queue unavailable: connection refused",
      nodeId: null
    });
  });

  it("cancels only pending or queued tasks", async () => {
    const { client, store } = setup();
    const first = await client.enqueue("workflow_execute", {});
    expect(await client.cancel(first)).toBe(true);
    expect(await client.cancel(first)).toBe(false);
    expect((await client.getStatus(first)).status).toBe("cancelled");

    const second = await client.enqueue("workflow_execute", {});
    await store.startTask(second, "worker-a", 30_000);
    await expect(client.cancelOrThrow(second)).rejects.toBeInstanceOf(TaskNotCancellable);
    await expect(client.cancelOrThrow(second)).rejects.toThrow(
      `Task '${second}' is running and can no longer be cancelled.`
    );
  });

  it("raises TaskNotFound for unknown ids", async () => {
    const { client } = setup();
    await expect(client.getStatus("missing")).rejects.toBeInstanceOf(TaskNotFound);
    await expect(client.cancelOrThrow("missing")).rejects.toBeInstanceOf(TaskNotFound);
    expect(await client.cancel("missing")).toBe(false);
  });
});

describe("calculateBackoffMs", () => {
  it("doubles from one second and caps at thirty", () => {
    expect([1, 2, 3, 5, 6].map(calculateBackoffMs)).toEqual([1000, 2000, 4000, 16_000, 30_000]);
  });
});
