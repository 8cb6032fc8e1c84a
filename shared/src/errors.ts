import type { ErrorInfo, TaskStatus, ValidationError } from "./types.js";

export class WorkflowError extends Error {
  readonly kind: string;
  readonly retryable: boolean;
  nodeId: string | null;

  constructor(kind: string, message: string, options: { nodeId?: string | null; retryable?: boolean; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = kind;
    this.kind = kind;
    this.nodeId = options.nodeId ?? null;
    this.retryable = options.retryable ?? true;
  }

  toInfo(): ErrorInfo {
    return { kind: this.kind, message: this.message, nodeId: this.nodeId };
  }
}

export class VariableResolutionError extends WorkflowError {
  constructor(readonly path: string) {
    super("VariableResolutionError", `Unresolvable variable path '${path}'.`);
  }
}

export class ConditionEvaluationError extends WorkflowError {
  constructor(message: string, readonly expression: string) {
    super("ConditionEvaluationError", `${message} in '${expression}'.`);
  }
}

export class ToolNotFound extends WorkflowError {
  constructor(readonly toolName: string) {
    super("ToolNotFound", `Tool '${toolName}' is not registered.`);
  }
}

export class ToolExecutionError extends WorkflowError {
  constructor(nodeId: string, readonly toolName: string, cause: unknown) {
    super("ToolExecutionError", `Tool '${toolName}' failed: ${describeError(cause)}`, { nodeId, cause });
  }
}

export class GraphStructureError extends WorkflowError {
  constructor(readonly issues: ValidationError[]) {
    super(
      "GraphStructureError",
      `Invalid workflow definition: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ")}`,
      { retryable: false }
    );
  }
}

export class EdgeResolutionError extends WorkflowError {
  constructor(nodeId: string, message: string) {
    super("EdgeResolutionError", message, { nodeId });
  }
}

export class LoopLimitExceeded extends WorkflowError {
  constructor(nodeId: string, readonly maxIterations: number) {
    super("LoopLimitExceeded", `Loop '${nodeId}' exceeded ${maxIterations} iterations.`, { nodeId });
  }
}

export class WorkflowTimeout extends WorkflowError {
  constructor(readonly timeoutMs: number) {
    super("WorkflowTimeout", `Workflow run exceeded ${timeoutMs}ms.`);
  }
}

export class WorkflowCancelled extends WorkflowError {
  constructor(reason: string) {
    super("WorkflowCancelled", `Workflow run cancelled: ${reason}`, { retryable: false });
  }
}

export class WorkflowNotFound extends WorkflowError {
  constructor(readonly workflowId: string) {
    super("WorkflowNotFound", `Workflow '${workflowId}' not found.`, { retryable: false });
  }
}

export class TaskNotFound extends WorkflowError {
  constructor(readonly taskId: string) {
    super("TaskNotFound", `Task '${taskId}' not found.`, { retryable: false });
  }
}

export class TaskNotCancellable extends WorkflowError {
  constructor(readonly taskId: string, readonly status: TaskStatus) {
    super("TaskNotCancellable", `Task '${taskId}' is ${status} and can no longer be cancelled.`, { retryable: false });
  }
}

export class InvalidTaskTransition extends WorkflowError {
  constructor(taskId: string, from: TaskStatus, to: TaskStatus) {
    super("InvalidTaskTransition", `Invalid task transition for '${taskId}': ${from} -> ${to}`, { retryable: false });
  }
}

export class QueueUnavailableError extends WorkflowError {
  constructor(cause: unknown) {
    super("QueueUnavailableError", `Task queue unavailable: ${describeError(cause)}`, { cause });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toErrorInfo(error: unknown, nodeId: string | null = null): ErrorInfo {
  if (error instanceof WorkflowError) {
    return error.toInfo();
  }
  return { kind: "InternalError", message: describeError(error), nodeId };
}
