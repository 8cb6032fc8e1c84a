import { Redis } from "ioredis";
import type { QueueMessage, TaskQueue } from "./ports.js";

export const TASK_GROUP = "task_workers";
export const DELAYED_KEY = "task_queue_delayed";

function parseFields(raw: unknown[]): Record<string, string> {
  const record: Record<string, string> = {};
  for (let i = 0; i + 1 < raw.length; i += 2) {
    const key = raw[i];
    const value = raw[i + 1];
    if (typeof key === "string" && typeof value === "string") {
      record[key] = value;
    }
  }
  return record;
}

function parseEntries(queue: string, raw: unknown): QueueMessage[] {
  if (!Array.isArray(raw)) return [];
  return raw.flatMap((entry: unknown) => {
    if (!Array.isArray(entry) || typeof entry[0] !== "string" || !Array.isArray(entry[1])) return [];
    const fields = parseFields(entry[1]);
    if (!fields.taskId) return [];
    return [{ messageId: entry[0], queue, taskId: fields.taskId }];
  });
}

function parseDelayed(member: string): { queue: string; taskId: string } | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(member);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null) return null;
  const queue = "queue" in parsed ? parsed.queue : undefined;
  const taskId = "taskId" in parsed ? parsed.taskId : undefined;
  return typeof queue === "string" && typeof taskId === "string" ? { queue, taskId } : null;
}

/** One stream and consumer group per queue name; acknowledged entries are deleted. */
export class RedisTaskQueue implements TaskQueue {
  private readonly redis: Redis;

  constructor(redis: Redis | string) {
    this.redis = typeof redis === "string" ? new Redis(redis) : redis;
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }

  async ensureQueues(queues: string[]): Promise<void> {
    for (const queue of queues) {
      try {
        await this.redis.xgroup("CREATE", queue, TASK_GROUP, "0", "MKSTREAM");
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        if (!message.includes("BUSYGROUP")) {
          throw error;
        }
      }
    }
  }

  async publish(queue: string, taskId: string, delayMs = 0): Promise<void> {
    if (delayMs > 0) {
      await this.redis.zadd(DELAYED_KEY, Date.now() + delayMs, JSON.stringify({ queue, taskId }));
      return;
    }
    await this.redis.xadd(queue, "*", "taskId", taskId);
  }

  async readBatch(queues: string[], consumer: string, count: number, blockMs: number): Promise<QueueMessage[]> {
    if (queues.length === 0) return [];
    const response = await this.redis.call("XREADGROUP", [
      "GROUP",
      TASK_GROUP,
      consumer,
      "COUNT",
      count,
      "BLOCK",
      blockMs,
      "STREAMS",
      ...queues,
      ...queues.map(() => ">")
    ]);

    if (!Array.isArray(response)) return [];
    return response.flatMap((stream: unknown) => {
      if (!Array.isArray(stream) || typeof stream[0] !== "string") return [];
      return parseEntries(stream[0], stream[1]);
    });
  }

  async claimStale(queues: string[], consumer: string, minIdleMs: number, count: number): Promise<QueueMessage[]> {
    const claimed: QueueMessage[] = [];
    for (const queue of queues) {
      if (claimed.length >= count) break;
      const response = await this.redis.call("XAUTOCLAIM", [
        queue,
        TASK_GROUP,
        consumer,
        minIdleMs,
        "0-0",
        "COUNT",
        count - claimed.length
      ]);
      if (Array.isArray(response)) {
        claimed.push(...parseEntries(queue, response[1]));
      }
    }
    return claimed;
  }

  async renewLease(message: QueueMessage, consumer: string): Promise<void> {
    // Re-claiming with min-idle 0 resets the idle timer without delivering the entry again.
    await this.redis.call("XCLAIM", [message.queue, TASK_GROUP, consumer, 0, message.messageId, "JUSTID"]);
  }

  async ack(message: QueueMessage): Promise<void> {
    await this.redis.xack(message.queue, TASK_GROUP, message.messageId);
    await this.redis.xdel(message.queue, message.messageId);
  }

  async pumpDelayed(limit = 100): Promise<number> {
    const due = await this.redis.zrangebyscore(DELAYED_KEY, 0, Date.now(), "LIMIT", 0, limit);
    let moved = 0;
    for (const member of due) {
      const removed = await this.redis.zrem(DELAYED_KEY, member);
      if (removed === 0) continue;
      const target = parseDelayed(member);
      if (!target) continue;
      await this.redis.xadd(target.queue, "*", "taskId", target.taskId);
      moved += 1;
    }
    return moved;
  }

  async length(queue: string): Promise<number> {
    return this.redis.xlen(queue);
  }
}
