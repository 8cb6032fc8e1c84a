import {
  createLogger,
  getLogContext,
  QueueUnavailableError,
  TaskNotCancellable,
  TaskNotFound,
  type TaskRecord
} from "@flowgraph/shared";
import { queueNameFor, type TaskQueue, type TaskStore } from "./ports.js";

const logger = createLogger("task-queue-client");

export interface TaskQueueClientOptions {
  maxRetries: number;
  ttlMs: number;
  taskTypes: string[];
}

export class TaskQueueClient {
  constructor(
    private readonly store: TaskStore,
    private readonly queue: TaskQueue,
    private readonly options: TaskQueueClientOptions
  ) {}

  /**
   * Records the task as pending, marks it queued and publishes it. The queued mark comes
   * first so a worker never reads a message for a task that is still pending. A publish
   * failure finalizes the task as failed and raises QueueUnavailableError.
   */
  async enqueue(type: string, params: Record<string, unknown>, metadata: Record<string, unknown> = {}): Promise<string> {
    const traceId = getLogContext().traceId;
    const task = await this.store.createTask({
      type,
      params,
      metadata: traceId && metadata.traceId === undefined ? { ...metadata, traceId } : metadata,
      maxRetries: this.options.maxRetries,
      ttlMs: this.options.ttlMs
    });

    const queued = await this.store.markQueued(task.id);
    if (!queued) {
      logger.warn("task left pending before publish", { taskId: task.id });
      return task.id;
    }

    try {
      await this.queue.publish(queueNameFor(type), task.id);
    } catch (error) {
      const failure = new QueueUnavailableError(error);
      await this.store.markPublishFailed(task.id, failure.toInfo());
      logger.error("task publish failed", { taskId: task.id, error });
      throw failure;
    }

    logger.info("task enqueued", { taskId: task.id, type });
    return task.id;
  }

  async getStatus(taskId: string): Promise<TaskRecord> {
    const task = await this.store.getTask(taskId);
    if (!task) {
      throw new TaskNotFound(taskId);
    }
    return task;
  }

  /** True when the task was pending or queued and is now cancelled. */
  async cancel(taskId: string): Promise<boolean> {
    const cancelled = await this.store.cancelTask(taskId);
    if (cancelled) {
      logger.info("task cancelled", { taskId });
    }
    return cancelled !== null;
  }

  async cancelOrThrow(taskId: string): Promise<TaskRecord> {
    const cancelled = await this.store.cancelTask(taskId);
    if (cancelled) {
      logger.info("task cancelled", { taskId });
      return cancelled;
    }
    const current = await this.getStatus(taskId);
    throw new TaskNotCancellable(taskId, current.status);
  }

  async queueStats(): Promise<Record<string, number>> {
    const stats: Record<string, number> = {};
    try {
      for (const type of this.options.taskTypes) {
        const queue = queueNameFor(type);
        stats[queue] = await this.queue.length(queue);
      }
    } catch (error) {
      throw new QueueUnavailableError(error);
    }
    return stats;
  }
}
