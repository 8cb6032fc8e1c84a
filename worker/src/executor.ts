import {
  toErrorInfo,
  withLogContext,
  WorkflowError,
  type ErrorInfo,
  type ExecutionEngine,
  type TaskRecord,
  type Variables,
  type WorkflowStore
} from "@flowgraph/shared";

export type TaskOutcome =
  | { status: "completed"; result: unknown }
  | { status: "failed"; error: ErrorInfo; retryable: boolean }
  | { status: "cancelled"; error: ErrorInfo };

export type TaskHandler = (task: TaskRecord, signal: AbortSignal) => Promise<TaskOutcome>;

export interface WorkflowTaskParams {
  workflowId: string;
  variables: Variables;
}

export function parseWorkflowTaskParams(params: Record<string, unknown>): WorkflowTaskParams {
  const { workflowId, variables } = params;
  if (typeof workflowId !== "string" || workflowId.length === 0) {
    throw new WorkflowError("InvalidTaskParams", "Task params need a workflowId.", { retryable: false });
  }
  if (variables === undefined || variables === null) {
    return { workflowId, variables: {} };
  }
  if (typeof variables !== "object" || Array.isArray(variables)) {
    throw new WorkflowError("InvalidTaskParams", "Task variables must be a mapping.", { retryable: false });
  }
  return { workflowId, variables: { ...variables } };
}

function failure(error: unknown): TaskOutcome {
  return {
    status: "failed",
    error: toErrorInfo(error),
    retryable: error instanceof WorkflowError ? error.retryable : true
  };
}

/** Runs one `workflow_execute` task: load the workflow, run it, report the outcome. */
export function createWorkflowTaskHandler(deps: {
  workflows: WorkflowStore;
  engine: ExecutionEngine;
  runTimeoutMs?: number;
}): TaskHandler {
  return async (task, signal) => {
    let params: WorkflowTaskParams;
    try {
      params = parseWorkflowTaskParams(task.params);
    } catch (error) {
      return failure(error);
    }

    return withLogContext({ workflowId: params.workflowId }, async (): Promise<TaskOutcome> => {
      try {
        const workflow = await deps.workflows.load(params.workflowId);
        const result = await deps.engine.run(workflow, params.variables, { signal, timeoutMs: deps.runTimeoutMs });
        if (result.status === "completed") {
          return { status: "completed", result };
        }
        const error = result.error ?? { kind: "InternalError", message: "Run ended without an error.", nodeId: null };
        if (result.status === "cancelled") {
          return { status: "cancelled", error };
        }
        return { status: "failed", error, retryable: true };
      } catch (error) {
        return failure(error);
      }
    });
  };
}
