import { InvalidTaskTransition } from "./errors.js";
import type { RunStatus, TaskStatus } from "./types.js";

const runTransitions: Record<RunStatus, Set<RunStatus>> = {
  running: new Set(["completed", "failed", "cancelled"]),
  completed: new Set(),
  failed: new Set(),
  cancelled: new Set()
};

// running -> queued is the retry and lease-recovery edge; running -> running is a lease takeover.
const taskTransitions: Record<TaskStatus, Set<TaskStatus>> = {
  pending: new Set(["queued", "failed", "cancelled"]),
  queued: new Set(["running", "failed", "cancelled"]),
  running: new Set(["running", "completed", "failed", "queued"]),
  completed: new Set(),
  failed: new Set(),
  cancelled: new Set()
};

export const terminalTaskStatuses: ReadonlySet<TaskStatus> = new Set(["completed", "failed", "cancelled"]);

export const cancellableTaskStatuses: ReadonlySet<TaskStatus> = new Set(["pending", "queued"]);

export function canTransitionRun(from: RunStatus, to: RunStatus): boolean {
  return runTransitions[from].has(to);
}

export function canTransitionTask(from: TaskStatus, to: TaskStatus): boolean {
  return taskTransitions[from].has(to);
}

export function isTerminalTaskStatus(status: TaskStatus): boolean {
  return terminalTaskStatuses.has(status);
}

export function assertRunTransition(from: RunStatus, to: RunStatus): void {
  if (!canTransitionRun(from, to)) {
    throw new Error(`Invalid run transition: ${from} -> ${to}`);
  }
}

export function assertTaskTransition(taskId: string, from: TaskStatus, to: TaskStatus): void {
  if (!canTransitionTask(from, to)) {
    throw new InvalidTaskTransition(taskId, from, to);
  }
}
