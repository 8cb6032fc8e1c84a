import type { ErrorInfo, TaskRecord, TaskStatus } from "@flowgraph/shared";

export const QUEUE_PREFIX = "task_queue:";

/** Task type of a deferred workflow run; params are `{workflowId, variables}`. */
export const WORKFLOW_TASK_TYPE = "workflow_execute";

export function queueNameFor(taskType: string): string {
  return `${QUEUE_PREFIX}${taskType}`;
}

export interface CreateTaskInput {
  type: string;
  params: Record<string, unknown>;
  metadata: Record<string, unknown>;
  maxRetries: number;
  ttlMs: number;
}

export interface FailOutcome {
  task: TaskRecord;
  retrying: boolean;
}

export interface TaskFilter {
  status?: TaskStatus;
  type?: string;
  limit?: number;
}

/**
 * Durable task records. Every status change is a compare-and-swap: a method returns
 * null (or false) when the record was not in the expected prior state.
 */
export interface TaskStore {
  createTask(input: CreateTaskInput): Promise<TaskRecord>;
  /** Records past their expiry are treated as absent. */
  getTask(taskId: string): Promise<TaskRecord | null>;
  markQueued(taskId: string): Promise<TaskRecord | null>;
  markPublishFailed(taskId: string, error: ErrorInfo): Promise<TaskRecord | null>;
  cancelTask(taskId: string): Promise<TaskRecord | null>;
  /** Claims a queued task, or a running one whose lease already expired. */
  startTask(taskId: string, workerId: string, leaseMs: number): Promise<TaskRecord | null>;
  renewLease(taskId: string, workerId: string, leaseMs: number): Promise<boolean>;
  completeTask(taskId: string, workerId: string, result: unknown): Promise<TaskRecord | null>;
  failTask(taskId: string, workerId: string, error: ErrorInfo, retryable: boolean): Promise<FailOutcome | null>;
  /** Moves running tasks whose lease expired back to queued. */
  recoverExpiredLeases(limit?: number): Promise<TaskRecord[]>;
  /**
   * Queued tasks not updated for more than `olderThanMs`: their message may never have
   * reached the queue. Each returned record has `updatedAt` refreshed.
   */
  touchStaleQueued(olderThanMs: number, limit?: number): Promise<TaskRecord[]>;
  purgeExpired(): Promise<number>;
  listTasks(filter?: TaskFilter): Promise<TaskRecord[]>;
}

export interface QueueMessage {
  messageId: string;
  queue: string;
  taskId: string;
}

export interface TaskQueue {
  ensureQueues(queues: string[]): Promise<void>;
  publish(queue: string, taskId: string, delayMs?: number): Promise<void>;
  readBatch(queues: string[], consumer: string, count: number, blockMs: number): Promise<QueueMessage[]>;
  /** Takes over messages that another consumer left unacknowledged for at least `minIdleMs`. */
  claimStale(queues: string[], consumer: string, minIdleMs: number, count: number): Promise<QueueMessage[]>;
  renewLease(message: QueueMessage, consumer: string): Promise<void>;
  ack(message: QueueMessage): Promise<void>;
  pumpDelayed(limit?: number): Promise<number>;
  length(queue: string): Promise<number>;
  close(): Promise<void>;
}
