import { calculateBackoffMs, queueNameFor, type QueueMessage, type TaskQueue, type TaskStore } from "@flowgraph/queue";
import {
  createLogger,
  isTerminalTaskStatus,
  toErrorInfo,
  withLogContext,
  WorkflowError,
  type TaskRecord
} from "@flowgraph/shared";
import type { TaskHandler, TaskOutcome } from "./executor.js";
import { taskExecutionCounter, taskExecutionLatency } from "./metrics.js";

const logger = createLogger("worker");

export type ProcessResult = "skipped" | "deferred" | "completed" | "retrying" | "failed" | "cancelled" | "lost";

export interface TaskWorkerOptions {
  workerId: string;
  leaseMs: number;
  heartbeatMs: number;
  maxBatch: number;
  blockMs: number;
  backoffMs?: (retryCount: number) => number;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class TaskWorker {
  private running = false;
  private readonly queues: string[];
  private readonly backoffMs: (retryCount: number) => number;

  constructor(
    private readonly store: TaskStore,
    private readonly queue: TaskQueue,
    private readonly handlers: Record<string, TaskHandler>,
    private readonly options: TaskWorkerOptions
  ) {
    this.queues = Object.keys(handlers).map(queueNameFor);
    this.backoffMs = options.backoffMs ?? calculateBackoffMs;
  }

  async start(): Promise<void> {
    await this.queue.ensureQueues(this.queues);
    this.running = true;
    logger.info("worker started", { workerId: this.options.workerId, queues: this.queues });
    while (this.running) {
      try {
        await this.pollOnce();
      } catch (error) {
        logger.error("poll failed", { error });
        await delay(1000);
      }
    }
    logger.info("worker stopped", { workerId: this.options.workerId });
  }

  /** The loop exits after the batch in progress; leases of unfinished work simply expire. */
  stop(): void {
    this.running = false;
  }

  /** One poll: release due delayed messages, take over stale ones, read fresh ones, process them. */
  async pollOnce(): Promise<ProcessResult[]> {
    const { workerId, leaseMs, maxBatch, blockMs } = this.options;
    await this.queue.pumpDelayed();
    const reclaimed = await this.queue.claimStale(this.queues, workerId, leaseMs, maxBatch);
    const fresh =
      reclaimed.length >= maxBatch
        ? []
        : await this.queue.readBatch(this.queues, workerId, maxBatch - reclaimed.length, blockMs);

    const results: ProcessResult[] = [];
    for (const message of [...reclaimed, ...fresh]) {
      results.push(await this.processMessage(message));
    }
    return results;
  }

  async processMessage(message: QueueMessage): Promise<ProcessResult> {
    const { workerId, leaseMs } = this.options;
    const task = await this.store.getTask(message.taskId);
    if (!task || isTerminalTaskStatus(task.status)) {
      await this.queue.ack(message);
      return "skipped";
    }
    const handler = this.handlers[task.type];
    if (!handler) {
      logger.warn("no handler for task type", { taskId: task.id, type: task.type });
      await this.queue.ack(message);
      return "skipped";
    }

    // Left unacknowledged: the delivery may already belong to the worker holding the lease,
    // and an idle one is claimed again once the task is done.
    const started = await this.store.startTask(task.id, workerId, leaseMs);
    if (!started) {
      return "deferred";
    }

    const traceId = typeof started.metadata.traceId === "string" ? started.metadata.traceId : undefined;
    return withLogContext({ traceId, taskId: started.id, workerId }, () => this.execute(started, message, handler));
  }

  private async execute(task: TaskRecord, message: QueueMessage, handler: TaskHandler): Promise<ProcessResult> {
    const controller = new AbortController();
    const heartbeat = setInterval(() => {
      this.heartbeat(task, message, controller).catch((error) => {
        logger.error("heartbeat failed", { error });
      });
    }, this.options.heartbeatMs);

    logger.info("task started", { attempt: task.retryCount + 1 });
    const startNs = process.hrtime.bigint();
    try {
      let outcome: TaskOutcome;
      try {
        outcome = await handler(task, controller.signal);
      } catch (error) {
        outcome = {
          status: "failed",
          error: toErrorInfo(error),
          retryable: error instanceof WorkflowError ? error.retryable : true
        };
      }
      const result = await this.record(task, outcome);
      taskExecutionCounter.inc({ status: result });
      return result;
    } finally {
      clearInterval(heartbeat);
      await this.queue.ack(message);
      const durationSec = Number(process.hrtime.bigint() - startNs) / 1_000_000_000;
      taskExecutionLatency.observe(durationSec);
    }
  }

  private async heartbeat(task: TaskRecord, message: QueueMessage, controller: AbortController): Promise<void> {
    const renewed = await this.store.renewLease(task.id, this.options.workerId, this.options.leaseMs);
    if (!renewed) {
      logger.warn("task lease lost; abandoning run");
      controller.abort("lease lost");
      return;
    }
    await this.queue.renewLease(message, this.options.workerId);
  }

  private async record(task: TaskRecord, outcome: TaskOutcome): Promise<ProcessResult> {
    const { workerId } = this.options;
    switch (outcome.status) {
      case "completed": {
        const completed = await this.store.completeTask(task.id, workerId, outcome.result);
        if (!completed) {
          logger.warn("completion rejected; lease no longer held");
          return "lost";
        }
        logger.info("task completed");
        return "completed";
      }
      case "cancelled":
        logger.warn("task run cancelled", { error: outcome.error });
        return "cancelled";
      case "failed": {
        const failed = await this.store.failTask(task.id, workerId, outcome.error, outcome.retryable);
        if (!failed) {
          logger.warn("failure rejected; lease no longer held", { error: outcome.error });
          return "lost";
        }
        if (!failed.retrying) {
          logger.error("task failed", { error: outcome.error });
          return "failed";
        }
        const backoffMs = this.backoffMs(failed.task.retryCount);
        try {
          await this.queue.publish(queueNameFor(task.type), task.id, backoffMs);
        } catch (error) {
          // The task stays queued; the control plane's stale sweep publishes it again.
          logger.error("retry publish failed", { error, retryCount: failed.task.retryCount });
          return "retrying";
        }
        logger.warn("task failed; retry scheduled", { error: outcome.error, retryCount: failed.task.retryCount, backoffMs });
        return "retrying";
      }
    }
  }
}
