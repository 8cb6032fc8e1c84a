import type { ErrorInfo, TaskRecord, TaskStatus } from "@flowgraph/shared";
import type { Pool } from "pg";
import { withTransaction } from "./db.js";
import type { CreateTaskInput, FailOutcome, TaskFilter, TaskStore } from "./ports.js";

type TaskRow = {
  id: string;
  type: string;
  status: TaskStatus;
  params: Record<string, unknown>;
  metadata: Record<string, unknown>;
  result: unknown;
  error: ErrorInfo | null;
  retry_count: number;
  max_retries: number;
  ttl_ms: string;
  worker_id: string | null;
  lease_expires_at: Date | null;
  created_at: Date;
  updated_at: Date;
  started_at: Date | null;
  completed_at: Date | null;
  expires_at: Date | null;
};

const terminalExpiry = `completed_at = NOW(),
             expires_at = NOW() + ((ttl_ms::text || ' milliseconds')::interval)`;

export class PostgresTaskStore implements TaskStore {
  constructor(private readonly pool: Pool) {}

  async createTask(input: CreateTaskInput): Promise<TaskRecord> {
    const result = await this.pool.query<TaskRow>(
      `INSERT INTO tasks (type, status, params, metadata, max_retries, ttl_ms)
       VALUES ($1, 'pending', $2, $3, $4, $5)
       RETURNING *`,
      [input.type, JSON.stringify(input.params), JSON.stringify(input.metadata), input.maxRetries, input.ttlMs]
    );
    return toTaskRecord(result.rows[0]);
  }

  async getTask(taskId: string): Promise<TaskRecord | null> {
    const result = await this.pool.query<TaskRow>(
      `SELECT * FROM tasks
       WHERE id = $1
         AND (expires_at IS NULL OR expires_at > NOW())`,
      [taskId]
    );
    const row = result.rows[0];
    return row ? toTaskRecord(row) : null;
  }

  async markQueued(taskId: string): Promise<TaskRecord | null> {
    return this.updateOne(
      `UPDATE tasks
       SET status = 'queued',
           updated_at = NOW()
       WHERE id = $1
         AND status = 'pending'
       RETURNING *`,
      [taskId]
    );
  }

  async markPublishFailed(taskId: string, error: ErrorInfo): Promise<TaskRecord | null> {
    return this.updateOne(
      `UPDATE tasks
       SET status = 'failed',
           error = $2,
           ${terminalExpiry},
           updated_at = NOW()
       WHERE id = $1
         AND status IN ('pending', 'queued')
       RETURNING *`,
      [taskId, JSON.stringify(error)]
    );
  }

  async cancelTask(taskId: string): Promise<TaskRecord | null> {
    return this.updateOne(
      `UPDATE tasks
       SET status = 'cancelled',
           ${terminalExpiry},
           updated_at = NOW()
       WHERE id = $1
         AND status IN ('pending', 'queued')
       RETURNING *`,
      [taskId]
    );
  }

  async startTask(taskId: string, workerId: string, leaseMs: number): Promise<TaskRecord | null> {
    return this.updateOne(
      `UPDATE tasks
       SET status = 'running',
           worker_id = $2,
           lease_expires_at = NOW() + (($3::text || ' milliseconds')::interval),
           started_at = COALESCE(started_at, NOW()),
           updated_at = NOW()
       WHERE id = $1
         AND (status = 'queued' OR (status = 'running' AND lease_expires_at < NOW()))
       RETURNING *`,
      [taskId, workerId, leaseMs]
    );
  }

  async renewLease(taskId: string, workerId: string, leaseMs: number): Promise<boolean> {
    const result = await this.pool.query(
      `UPDATE tasks
       SET lease_expires_at = NOW() + (($3::text || ' milliseconds')::interval),
           updated_at = NOW()
       WHERE id = $1
         AND status = 'running'
         AND worker_id = $2`,
      [taskId, workerId, leaseMs]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async completeTask(taskId: string, workerId: string, result: unknown): Promise<TaskRecord | null> {
    return this.updateOne(
      `UPDATE tasks
       SET status = 'completed',
           result = $3,
           error = NULL,
           worker_id = NULL,
           lease_expires_at = NULL,
           ${terminalExpiry},
           updated_at = NOW()
       WHERE id = $1
         AND status = 'running'
         AND worker_id = $2
       RETURNING *`,
      [taskId, workerId, JSON.stringify(result ?? null)]
    );
  }

  async failTask(taskId: string, workerId: string, error: ErrorInfo, retryable: boolean): Promise<FailOutcome | null> {
    return withTransaction(this.pool, async (client) => {
      const current = await client.query<TaskRow>(
        `SELECT * FROM tasks
         WHERE id = $1
           AND status = 'running'
           AND worker_id = $2
         FOR UPDATE`,
        [taskId, workerId]
      );
      const task = current.rows[0];
      if (!task) return null;

      if (retryable && task.retry_count < task.max_retries) {
        const retried = await client.query<TaskRow>(
          `UPDATE tasks
           SET status = 'queued',
               retry_count = retry_count + 1,
               error = $2,
               worker_id = NULL,
               lease_expires_at = NULL,
               updated_at = NOW()
           WHERE id = $1
           RETURNING *`,
          [taskId, JSON.stringify(error)]
        );
        return { task: toTaskRecord(retried.rows[0]), retrying: true };
      }

      const failed = await client.query<TaskRow>(
        `UPDATE tasks
         SET status = 'failed',
             error = $2,
             worker_id = NULL,
             lease_expires_at = NULL,
             ${terminalExpiry},
             updated_at = NOW()
         WHERE id = $1
         RETURNING *`,
        [taskId, JSON.stringify(error)]
      );
      return { task: toTaskRecord(failed.rows[0]), retrying: false };
    });
  }

  async recoverExpiredLeases(limit = 200): Promise<TaskRecord[]> {
    const result = await this.pool.query<TaskRow>(
      `WITH expired AS (
          SELECT id
          FROM tasks
          WHERE status = 'running'
            AND lease_expires_at IS NOT NULL
            AND lease_expires_at < NOW()
          ORDER BY lease_expires_at ASC
          LIMIT $1
          FOR UPDATE SKIP LOCKED
       )
       UPDATE tasks t
       SET status = 'queued',
           worker_id = NULL,
           lease_expires_at = NULL,
           updated_at = NOW()
       FROM expired
       WHERE t.id = expired.id
       RETURNING t.*`,
      [limit]
    );
    return result.rows.map(toTaskRecord);
  }

  async touchStaleQueued(olderThanMs: number, limit = 200): Promise<TaskRecord[]> {
    const result = await this.pool.query<TaskRow>(
      `WITH stale AS (
          SELECT id
          FROM tasks
          WHERE status = 'queued'
            AND updated_at < NOW() - (($1::text || ' milliseconds')::interval)
          ORDER BY updated_at ASC
          LIMIT $2
          FOR UPDATE SKIP LOCKED
       )
       UPDATE tasks t
       SET updated_at = NOW()
       FROM stale
       WHERE t.id = stale.id
       RETURNING t.*`,
      [olderThanMs, limit]
    );
    return result.rows.map(toTaskRecord);
  }

  async purgeExpired(): Promise<number> {
    const result = await this.pool.query(
      `DELETE FROM tasks
       WHERE expires_at IS NOT NULL
         AND expires_at <= NOW()`
    );
    return result.rowCount ?? 0;
  }

  async listTasks(filter: TaskFilter = {}): Promise<TaskRecord[]> {
    const result = await this.pool.query<TaskRow>(
      `SELECT * FROM tasks
       WHERE ($1::text IS NULL OR status = $1)
         AND ($2::text IS NULL OR type = $2)
         AND (expires_at IS NULL OR expires_at > NOW())
       ORDER BY created_at DESC
       LIMIT $3`,
      [filter.status ?? null, filter.type ?? null, filter.limit ?? 100]
    );
    return result.rows.map(toTaskRecord);
  }

  private async updateOne(text: string, values: unknown[]): Promise<TaskRecord | null> {
    const result = await this.pool.query<TaskRow>(text, values);
    const row = result.rows[0];
    return row ? toTaskRecord(row) : null;
  }
}

function toIso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

function toTaskRecord(row: TaskRow): TaskRecord {
  return {
    id: row.id,
    type: row.type,
    status: row.status,
    params: row.params,
    metadata: row.metadata,
    result: row.result,
    error: row.error,
    retryCount: row.retry_count,
    maxRetries: row.max_retries,
    workerId: row.worker_id,
    leaseExpiresAt: toIso(row.lease_expires_at),
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
    startedAt: toIso(row.started_at),
    completedAt: toIso(row.completed_at),
    expiresAt: toIso(row.expires_at)
  };
}
