import { randomUUID } from "node:crypto";
import { assertTaskTransition, cancellableTaskStatuses, type ErrorInfo, type TaskRecord } from "@flowgraph/shared";
import type { CreateTaskInput, FailOutcome, QueueMessage, TaskFilter, TaskQueue, TaskStore } from "./ports.js";

export type Clock = () => number;

interface StoredTask {
  record: TaskRecord;
  ttlMs: number;
}

/** In-process TaskStore with the same compare-and-swap rules as the PostgreSQL store. */
export class MemoryTaskStore implements TaskStore {
  private readonly tasks = new Map<string, StoredTask>();

  constructor(private readonly now: Clock = Date.now) {}

  private iso(offsetMs = 0): string {
    return new Date(this.now() + offsetMs).toISOString();
  }

  private isExpired(record: TaskRecord): boolean {
    return record.expiresAt !== null && Date.parse(record.expiresAt) <= this.now();
  }

  private leaseExpired(record: TaskRecord): boolean {
    return record.leaseExpiresAt !== null && Date.parse(record.leaseExpiresAt) < this.now();
  }

  private update(stored: StoredTask, changes: Partial<TaskRecord>): TaskRecord {
    if (changes.status) {
      assertTaskTransition(stored.record.id, stored.record.status, changes.status);
    }
    stored.record = { ...stored.record, ...changes, updatedAt: this.iso() };
    return { ...stored.record };
  }

  private terminal(stored: StoredTask): Pick<TaskRecord, "completedAt" | "expiresAt"> {
    return { completedAt: this.iso(), expiresAt: this.iso(stored.ttlMs) };
  }

  async createTask(input: CreateTaskInput): Promise<TaskRecord> {
    const now = this.iso();
    const record: TaskRecord = {
      id: randomUUID(),
      type: input.type,
      status: "pending",
      params: input.params,
      metadata: input.metadata,
      result: null,
      error: null,
      retryCount: 0,
      maxRetries: input.maxRetries,
      workerId: null,
      leaseExpiresAt: null,
      createdAt: now,
      updatedAt: now,
      startedAt: null,
      completedAt: null,
      expiresAt: null
    };
    this.tasks.set(record.id, { record, ttlMs: input.ttlMs });
    return { ...record };
  }

  async getTask(taskId: string): Promise<TaskRecord | null> {
    const stored = this.tasks.get(taskId);
    if (!stored || this.isExpired(stored.record)) return null;
    return { ...stored.record };
  }

  async markQueued(taskId: string): Promise<TaskRecord | null> {
    const stored = this.tasks.get(taskId);
    if (stored?.record.status !== "pending") return null;
    return this.update(stored, { status: "queued" });
  }

  async markPublishFailed(taskId: string, error: ErrorInfo): Promise<TaskRecord | null> {
    const stored = this.tasks.get(taskId);
    if (!stored || !cancellableTaskStatuses.has(stored.record.status)) return null;
    return this.update(stored, { status: "failed", error, ...this.terminal(stored) });
  }

  async cancelTask(taskId: string): Promise<TaskRecord | null> {
    const stored = this.tasks.get(taskId);
    if (!stored || !cancellableTaskStatuses.has(stored.record.status)) return null;
    return this.update(stored, { status: "cancelled", ...this.terminal(stored) });
  }

  async startTask(taskId: string, workerId: string, leaseMs: number): Promise<TaskRecord | null> {
    const stored = this.tasks.get(taskId);
    if (!stored) return null;
    const { record } = stored;
    const claimable = record.status === "queued" || (record.status === "running" && this.leaseExpired(record));
    if (!claimable) return null;
    return this.update(stored, {
      status: "running",
      workerId,
      leaseExpiresAt: this.iso(leaseMs),
      startedAt: record.startedAt ?? this.iso()
    });
  }

  async renewLease(taskId: string, workerId: string, leaseMs: number): Promise<boolean> {
    const stored = this.tasks.get(taskId);
    if (stored?.record.status !== "running" || stored.record.workerId !== workerId) return false;
    this.update(stored, { leaseExpiresAt: this.iso(leaseMs) });
    return true;
  }

  async completeTask(taskId: string, workerId: string, result: unknown): Promise<TaskRecord | null> {
    const stored = this.tasks.get(taskId);
    if (stored?.record.status !== "running" || stored.record.workerId !== workerId) return null;
    return this.update(stored, {
      status: "completed",
      result,
      error: null,
      workerId: null,
      leaseExpiresAt: null,
      ...this.terminal(stored)
    });
  }

  async failTask(taskId: string, workerId: string, error: ErrorInfo, retryable: boolean): Promise<FailOutcome | null> {
    const stored = this.tasks.get(taskId);
    if (stored?.record.status !== "running" || stored.record.workerId !== workerId) return null;
    if (retryable && stored.record.retryCount < stored.record.maxRetries) {
      const task = this.update(stored, {
        status: "queued",
        retryCount: stored.record.retryCount + 1,
        error,
        workerId: null,
        leaseExpiresAt: null
      });
      return { task, retrying: true };
    }
    const task = this.update(stored, {
      status: "failed",
      error,
      workerId: null,
      leaseExpiresAt: null,
      ...this.terminal(stored)
    });
    return { task, retrying: false };
  }

  async recoverExpiredLeases(limit = 200): Promise<TaskRecord[]> {
    const recovered: TaskRecord[] = [];
    for (const stored of this.tasks.values()) {
      if (recovered.length >= limit) break;
      if (stored.record.status !== "running" || !this.leaseExpired(stored.record)) continue;
      recovered.push(this.update(stored, { status: "queued", workerId: null, leaseExpiresAt: null }));
    }
    return recovered;
  }

  async touchStaleQueued(olderThanMs: number, limit = 200): Promise<TaskRecord[]> {
    const cutoff = this.now() - olderThanMs;
    const stale: TaskRecord[] = [];
    for (const stored of this.tasks.values()) {
      if (stale.length >= limit) break;
      if (stored.record.status !== "queued" || Date.parse(stored.record.updatedAt) >= cutoff) continue;
      stale.push(this.update(stored, {}));
    }
    return stale;
  }

  async purgeExpired(): Promise<number> {
    let purged = 0;
    for (const [taskId, stored] of this.tasks.entries()) {
      if (this.isExpired(stored.record)) {
        this.tasks.delete(taskId);
        purged += 1;
      }
    }
    return purged;
  }

  async listTasks(filter: TaskFilter = {}): Promise<TaskRecord[]> {
    return [...this.tasks.values()]
      .map((stored) => stored.record)
      .filter((record) => !this.isExpired(record))
      .filter((record) => (filter.status ? record.status === filter.status : true))
      .filter((record) => (filter.type ? record.type === filter.type : true))
      .reverse()
      .slice(0, filter.limit ?? 100)
      .map((record) => ({ ...record }));
  }
}

interface Delivery {
  message: QueueMessage;
  consumer: string;
  deliveredAt: number;
}

/** In-process TaskQueue: ready lists, a pending-delivery table and a delayed set per process. */
export class MemoryTaskQueue implements TaskQueue {
  private readonly ready = new Map<string, QueueMessage[]>();
  private readonly pending = new Map<string, Delivery>();
  private delayed: Array<{ dueAt: number; queue: string; taskId: string }> = [];
  private sequence = 0;

  constructor(private readonly now: Clock = Date.now) {}

  private list(queue: string): QueueMessage[] {
    const existing = this.ready.get(queue);
    if (existing) return existing;
    const created: QueueMessage[] = [];
    this.ready.set(queue, created);
    return created;
  }

  async ensureQueues(queues: string[]): Promise<void> {
    queues.forEach((queue) => this.list(queue));
  }

  async publish(queue: string, taskId: string, delayMs = 0): Promise<void> {
    if (delayMs > 0) {
      this.delayed.push({ dueAt: this.now() + delayMs, queue, taskId });
      return;
    }
    this.sequence += 1;
    this.list(queue).push({ messageId: `${this.sequence}-0`, queue, taskId });
  }

  async readBatch(queues: string[], consumer: string, count: number, blockMs: number): Promise<QueueMessage[]> {
    const batch: QueueMessage[] = [];
    for (const queue of queues) {
      const messages = this.list(queue);
      while (batch.length < count && messages.length > 0) {
        const message = messages.shift();
        if (!message) break;
        this.pending.set(message.messageId, { message, consumer, deliveredAt: this.now() });
        batch.push(message);
      }
    }
    if (batch.length === 0 && blockMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, blockMs));
    }
    return batch;
  }

  async claimStale(queues: string[], consumer: string, minIdleMs: number, count: number): Promise<QueueMessage[]> {
    const claimed: QueueMessage[] = [];
    for (const delivery of this.pending.values()) {
      if (claimed.length >= count) break;
      if (!queues.includes(delivery.message.queue)) continue;
      if (this.now() - delivery.deliveredAt < minIdleMs) continue;
      delivery.consumer = consumer;
      delivery.deliveredAt = this.now();
      claimed.push(delivery.message);
    }
    return claimed;
  }

  async renewLease(message: QueueMessage, consumer: string): Promise<void> {
    const delivery = this.pending.get(message.messageId);
    if (delivery?.consumer === consumer) {
      delivery.deliveredAt = this.now();
    }
  }

  async ack(message: QueueMessage): Promise<void> {
    this.pending.delete(message.messageId);
  }

  async pumpDelayed(limit = 100): Promise<number> {
    const now = this.now();
    const due = this.delayed.filter((item) => item.dueAt <= now).slice(0, limit);
    this.delayed = this.delayed.filter((item) => !due.includes(item));
    for (const item of due) {
      await this.publish(item.queue, item.taskId);
    }
    return due.length;
  }

  async length(queue: string): Promise<number> {
    const unacked = [...this.pending.values()].filter((delivery) => delivery.message.queue === queue).length;
    return this.list(queue).length + unacked;
  }

  /** Delayed messages not yet due; exposed for tests. */
  delayedCount(): number {
    return this.delayed.length;
  }

  async close(): Promise<void> {
    this.ready.clear();
    this.pending.clear();
    this.delayed = [];
  }
}
