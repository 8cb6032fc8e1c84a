import { describe, expect, it } from "vitest";
import {
  BaseTool,
  createLogger,
  EchoTool,
  ExecutionEngine,
  MemoryWorkflowStore,
  parseWorkflowDefinition,
  ToolRegistry,
  type TaskRecord
} from "@flowgraph/shared";
import { WORKFLOW_TASK_TYPE } from "@flowgraph/queue";
import { MemoryTaskStore } from "@flowgraph/queue/memory";
import { createWorkflowTaskHandler, parseWorkflowTaskParams } from "../src/executor.js";

class ExplodingTool extends BaseTool {
  constructor() {
    super("explode", "Always fails.");
  }

  invoke(): unknown {
    throw new Error("boom");
  }
}

function workflowWith(toolName: string, toolParams: Record<string, unknown>) {
  return parseWorkflowDefinition({
    id: `uses_${toolName}`,
    name: `Uses ${toolName}`,
    nodes: [
      { id: "start", kind: "start", name: "Start" },
      { id: "greet", kind: "task", name: "Greet", tool_name: toolName, tool_params: toolParams },
      { id: "end", kind: "end", name: "End" }
    ],
    edges: [
      { source: "start", target: "greet" },
      { source: "greet", target: "end" }
    ]
  });
}

const handler = createWorkflowTaskHandler({
  workflows: new MemoryWorkflowStore([workflowWith("echo", { name: "${name}" }), workflowWith("explode", {})]),
  engine: new ExecutionEngine({
    tools: new ToolRegistry().register(new EchoTool()).register(new ExplodingTool()),
    logger: createLogger("executor-test", "error")
  })
});

async function taskWith(params: Record<string, unknown>): Promise<TaskRecord> {
  const store = new MemoryTaskStore();
  return store.createTask({ type: WORKFLOW_TASK_TYPE, params, metadata: {}, maxRetries: 3, ttlMs: 60_000 });
}

describe("parseWorkflowTaskParams", () => {
  it("defaults variables to an empty mapping", () => {
    expect(parseWorkflowTaskParams({ workflowId: "greet" })).toEqual({ workflowId: "greet", variables: {} });
  });

  it("rejects variables that are not a mapping", () => {
    expect(() => parseWorkflowTaskParams({ workflowId: "greet", variables: [1] })).toThrow(
      "Task variables must be a mapping."
    );
  });
});

describe("createWorkflowTaskHandler", () => {
  it("completes with the full execution result", async () => {
    const task = await taskWith({ workflowId: "uses_echo", variables: { name: "Ada" } });

    const outcome = await handler(task, new AbortController().signal);

    expect(outcome).toMatchObject({
      status: "completed",
      result: {
        workflowId: "uses_echo",
        status: "completed",
        variables: { name: "Ada", greet: "Ada", greet_result: "Ada" },
        visited: ["start", "greet", "end"]
      }
    });
  });

  it("reports a tool failure as retryable", async () => {
    const task = await taskWith({ workflowId: "uses_explode" });

    const outcome = await handler(task, new AbortController().signal);

    expect(outcome).toEqual({
      status: "failed",
      retryable: true,
      error: { kind: "ToolExecutionError", message: "Tool 'explode' failed: boom", nodeId: "greet" }
    });
  });

  it("does not retry a missing workflow", async () => {
    const task = await taskWith({ workflowId: "missing" });

    const outcome = await handler(task, new AbortController().signal);

    expect(outcome).toEqual({
      status: "failed",
      retryable: false,
      error: { kind: "WorkflowNotFound", message: "Workflow 'missing' not found.", nodeId: null }
    });
  });

  it("does not retry invalid task params", async () => {
    const task = await taskWith({ variables: {} });

    const outcome = await handler(task, new AbortController().signal);

    expect(outcome).toEqual({
      status: "failed",
      retryable: false,
      error: { kind: "InvalidTaskParams", message: "Task params need a workflowId.", nodeId: null }
    });
  });

  it("reports an aborted run as cancelled", async () => {
    const task = await taskWith({ workflowId: "uses_echo", variables: { name: "Ada" } });
    const controller = new AbortController();
    controller.abort("lease lost");

    const outcome = await handler(task, controller.signal);

    expect(outcome).toEqual({
      status: "cancelled",
      error: { kind: "WorkflowCancelled", message: "Workflow run cancelled: lease lost", nodeId: "start" }
    });
  });
});
