import { MAX_BACKOFF_MS, queueNameFor, type TaskQueue, type TaskStore } from "@flowgraph/queue";
import { createLogger, type TaskRecord } from "@flowgraph/shared";
import { leaseRecoveredCounter, queuePumpCounter, taskPurgedCounter } from "../metrics/metrics.js";

const logger = createLogger("reaper");

export interface ReaperOptions {
  intervalMs: number;
  /** Worker lease length; a queued task idle for twice this (and past any retry backoff) is published again. */
  leaseMs: number;
}

export interface ReaperTick {
  recovered: number;
  requeued: number;
  pumped: number;
  purged: number;
}

/**
 * Periodic housekeeping: re-queue tasks whose lease expired, re-publish queued tasks whose
 * message was lost, release due retries, drop expired records.
 */
export class RecoveryReaper {
  private timer: NodeJS.Timeout | null = null;
  private readonly staleQueuedMs: number;

  constructor(
    private readonly store: TaskStore,
    private readonly queue: TaskQueue,
    private readonly options: ReaperOptions
  ) {
    this.staleQueuedMs = Math.max(2 * options.leaseMs, 2 * MAX_BACKOFF_MS);
  }

  start(): void {
    this.timer = setInterval(() => {
      this.tick().catch((error) => {
        logger.error("reaper tick failed", { error });
      });
    }, this.options.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  async tick(): Promise<ReaperTick> {
    const recovered = await this.store.recoverExpiredLeases();
    await this.publishAll(recovered);
    if (recovered.length > 0) {
      leaseRecoveredCounter.inc(recovered.length);
      logger.warn("re-queued tasks with expired leases", { taskIds: recovered.map((task) => task.id) });
    }

    // A duplicate message is harmless: only one worker wins startTask.
    const stale = await this.store.touchStaleQueued(this.staleQueuedMs);
    await this.publishAll(stale);
    if (stale.length > 0) {
      logger.warn("re-published stale queued tasks", { taskIds: stale.map((task) => task.id) });
    }

    const pumped = await this.queue.pumpDelayed();
    if (pumped > 0) {
      queuePumpCounter.inc(pumped);
    }

    const purged = await this.store.purgeExpired();
    if (purged > 0) {
      taskPurgedCounter.inc(purged);
      logger.info("purged expired task records", { purged });
    }
    return { recovered: recovered.length, requeued: stale.length, pumped, purged };
  }

  /** A failed publish leaves the task queued; the stale sweep picks it up on a later tick. */
  private async publishAll(tasks: TaskRecord[]): Promise<void> {
    for (const task of tasks) {
      try {
        await this.queue.publish(queueNameFor(task.type), task.id);
      } catch (error) {
        logger.error("publish failed; task stays queued", { taskId: task.id, error });
      }
    }
  }
}
