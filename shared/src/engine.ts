import { evaluateCondition } from "./conditions.js";
import {
  describeError,
  EdgeResolutionError,
  GraphStructureError,
  LoopLimitExceeded,
  ToolExecutionError,
  toErrorInfo,
  WorkflowCancelled,
  WorkflowError,
  WorkflowTimeout
} from "./errors.js";
import { assertWorkflowStructure, indexWorkflow, type WorkflowIndex } from "./graph.js";
import { createLogger, withLogContext, type Logger } from "./logger.js";
import { assertRunTransition } from "./stateMachine.js";
import type { ToolRegistry } from "./tools.js";
import type {
  ConditionNode,
  ErrorInfo,
  ExecutionResult,
  LoopNode,
  ParallelNode,
  RunStatus,
  TaskNode,
  ToolInvocation,
  Variables,
  Workflow,
  WorkflowEdge,
  WorkflowNode
} from "./types.js";
import { resolveParams } from "./variables.js";

export interface EngineOptions {
  tools: ToolRegistry;
  maxLoopIterations?: number;
  timeoutMs?: number;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  invocation?: ToolInvocation;
}

interface RunState {
  index: WorkflowIndex;
  signal?: AbortSignal;
  timeoutMs: number | null;
  deadline: number | null;
  invocation: ToolInvocation;
}

class ExecutionContext {
  readonly written = new Set<string>();
  readonly visited: string[] = [];
  readonly nodeResults: Record<string, unknown> = {};

  constructor(readonly variables: Variables) {}

  set(key: string, value: unknown): void {
    this.variables[key] = value;
    this.written.add(key);
  }

  fork(): ExecutionContext {
    return new ExecutionContext({ ...this.variables });
  }
}

function attachNode(error: unknown, nodeId: string): WorkflowError {
  if (error instanceof WorkflowError) {
    if (error.nodeId === null) error.nodeId = nodeId;
    return error;
  }
  return new WorkflowError("InternalError", describeError(error), { nodeId, cause: error });
}

function abortReason(signal: AbortSignal): string {
  return signal.reason === undefined ? "aborted" : describeError(signal.reason);
}

export class ExecutionEngine {
  private readonly tools: ToolRegistry;
  private readonly maxLoopIterations: number;
  private readonly timeoutMs: number | null;
  private readonly logger: Logger;

  constructor(options: EngineOptions) {
    this.tools = options.tools;
    this.maxLoopIterations = options.maxLoopIterations ?? 100;
    this.timeoutMs = options.timeoutMs ?? null;
    this.logger = options.logger ?? createLogger("engine");
  }

  /**
   * Runs a workflow from its start node until an end node is reached or the run fails.
   * Structural problems reject before any node executes; run-time failures are captured
   * in the returned result.
   */
  async run(
    workflow: Workflow,
    initialVariables: Variables = {},
    options: RunOptions = {}
  ): Promise<ExecutionResult> {
    assertWorkflowStructure(workflow);
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const startedAt = Date.now();
    const state: RunState = {
      index: indexWorkflow(workflow),
      signal: options.signal,
      timeoutMs,
      deadline: timeoutMs === null ? null : startedAt + timeoutMs,
      invocation: options.invocation ?? "async"
    };
    const context = new ExecutionContext({ ...initialVariables });

    return withLogContext({ workflowId: workflow.id }, async () => {
      this.logger.info("workflow run started", { nodes: workflow.nodes.length });
      let status: Exclude<RunStatus, "running">;
      let error: ErrorInfo | null = null;
      try {
        await this.walk(state.index.start, context, state);
        status = "completed";
      } catch (caught) {
        status = caught instanceof WorkflowCancelled ? "cancelled" : "failed";
        error = toErrorInfo(caught);
      }
      assertRunTransition("running", status);

      const finishedAt = Date.now();
      const durationMs = finishedAt - startedAt;
      if (error) {
        this.logger.warn("workflow run ended", { status, durationMs, error });
      } else {
        this.logger.info("workflow run ended", { status, durationMs });
      }
      return {
        workflowId: workflow.id,
        status,
        variables: context.variables,
        nodeResults: context.nodeResults,
        visited: context.visited,
        error,
        startedAt: new Date(startedAt).toISOString(),
        finishedAt: new Date(finishedAt).toISOString(),
        durationMs
      };
    });
  }

  private async walk(start: WorkflowNode, context: ExecutionContext, state: RunState): Promise<void> {
    let current: WorkflowNode | null = start;
    while (current) {
      const node: WorkflowNode = current;
      const result = await this.execute(node, context, state);
      try {
        current = this.follow(node, result, context, state);
      } catch (error) {
        throw attachNode(error, node.id);
      }
    }
  }

  private checkpoint(state: RunState): void {
    if (state.signal?.aborted) {
      throw new WorkflowCancelled(abortReason(state.signal));
    }
    if (state.deadline !== null && state.timeoutMs !== null && Date.now() > state.deadline) {
      throw new WorkflowTimeout(state.timeoutMs);
    }
  }

  private async execute(node: WorkflowNode, context: ExecutionContext, state: RunState): Promise<unknown> {
    try {
      this.checkpoint(state);
      context.visited.push(node.id);
      const result = await this.dispatch(node, context, state);
      context.nodeResults[node.id] = result;
      return result;
    } catch (error) {
      throw attachNode(error, node.id);
    }
  }

  private async dispatch(node: WorkflowNode, context: ExecutionContext, state: RunState): Promise<unknown> {
    switch (node.kind) {
      case "start":
      case "end":
        return null;
      case "task":
        return this.runTask(node, context, state);
      case "condition":
        return this.runCondition(node, context);
      case "loop":
        return this.runLoop(node, context, state);
      case "parallel":
        return this.runParallel(node, context, state);
    }
  }

  private follow(node: WorkflowNode, result: unknown, context: ExecutionContext, state: RunState): WorkflowNode | null {
    if (node.kind === "end") return null;
    const edges = state.index.outgoing.get(node.id) ?? [];

    if (node.kind !== "condition") {
      const unconditional = edges.filter((edge) => edge.condition === undefined);
      if (unconditional.length !== 1) {
        throw new EdgeResolutionError(
          node.id,
          `Node '${node.id}' needs exactly one unconditional outgoing edge, found ${unconditional.length}.`
        );
      }
      return this.nodeById(unconditional[0].target, state);
    }

    const outcome = result === true;
    const edge = edges.find((candidate) => this.guardMatches(candidate, outcome, context));
    if (!edge) {
      throw new EdgeResolutionError(node.id, `No outgoing edge of '${node.id}' matched condition result ${outcome}.`);
    }
    return this.nodeById(edge.target, state);
  }

  private guardMatches(edge: WorkflowEdge, outcome: boolean, context: ExecutionContext): boolean {
    if (edge.condition === undefined) return true;
    const guard = edge.condition.trim();
    if (guard === "true") return outcome;
    if (guard === "false") return !outcome;
    return evaluateCondition(guard, context.variables);
  }

  private nodeById(nodeId: string, state: RunState): WorkflowNode {
    const node = state.index.nodes.get(nodeId);
    if (!node) {
      throw new GraphStructureError([{ path: `node(${nodeId})`, message: `Unknown node '${nodeId}'.` }]);
    }
    return node;
  }

  private async runTask(node: TaskNode, context: ExecutionContext, state: RunState): Promise<unknown> {
    let result: unknown;
    try {
      const params = resolveParams(node.toolParams, context.variables);
      try {
        const tool = this.tools.lookup(node.toolName);
        result = state.invocation === "async" ? await tool.invokeAsync(params) : tool.invoke(params);
      } catch (error) {
        throw new ToolExecutionError(node.id, node.toolName, error);
      }
    } catch (error) {
      if (!node.bestEffort) throw error;
      const info = toErrorInfo(attachNode(error, node.id));
      this.logger.warn("best-effort task failed", { nodeId: node.id, error: info });
      result = { error: info };
    }

    // A result that arrives after cancellation or the deadline is discarded.
    this.checkpoint(state);
    context.set(node.id, result);
    context.set(`${node.id}_result`, result);
    return result;
  }

  private runCondition(node: ConditionNode, context: ExecutionContext): boolean {
    return evaluateCondition(node.conditionExpr, context.variables);
  }

  private async runLoop(node: LoopNode, context: ExecutionContext, state: RunState): Promise<{ iterations: number }> {
    const { conditionExpr, body } = node.loopConfig;
    const limit = node.loopConfig.maxIterations ?? this.maxLoopIterations;
    const hadIndex = Object.prototype.hasOwnProperty.call(context.variables, "loop_index");
    const previousIndex = context.variables.loop_index;
    let iterations = 0;

    try {
      while (evaluateCondition(conditionExpr, context.variables)) {
        if (iterations >= limit) {
          throw new LoopLimitExceeded(node.id, limit);
        }
        this.checkpoint(state);
        iterations += 1;
        context.set("loop_index", iterations);
        for (const childId of body) {
          await this.execute(this.nodeById(childId, state), context, state);
        }
      }
    } finally {
      if (hadIndex) {
        context.variables.loop_index = previousIndex;
      } else {
        delete context.variables.loop_index;
      }
    }
    return { iterations };
  }

  private async runParallel(
    node: ParallelNode,
    context: ExecutionContext,
    state: RunState
  ): Promise<{ branches: number; conflicts: string[] }> {
    const forks = node.parallelBranches.map(() => context.fork());
    const settled = await Promise.allSettled(
      node.parallelBranches.map(async (branch, branchIndex) => {
        for (const childId of branch) {
          await this.execute(this.nodeById(childId, state), forks[branchIndex], state);
        }
      })
    );

    for (const fork of forks) {
      context.visited.push(...fork.visited);
      Object.assign(context.nodeResults, fork.nodeResults);
    }
    const failure = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === "rejected");
    if (failure) {
      throw attachNode(failure.reason, node.id);
    }

    const writers = new Set<string>();
    const conflicts: string[] = [];
    for (const fork of forks) {
      for (const key of fork.written) {
        if (!(key in fork.variables)) continue;
        if (writers.has(key) && !conflicts.includes(key)) {
          conflicts.push(key);
        }
        writers.add(key);
        context.set(key, fork.variables[key]);
      }
    }
    if (conflicts.length > 0) {
      this.logger.warn("parallel branches wrote the same variables; last branch wins", {
        nodeId: node.id,
        conflicts
      });
    }
    return { branches: node.parallelBranches.length, conflicts };
  }
}

export function runWorkflow(
  workflow: Workflow,
  initialVariables: Variables,
  options: EngineOptions & RunOptions
): Promise<ExecutionResult> {
  const { signal, invocation, ...engineOptions } = options;
  return new ExecutionEngine(engineOptions).run(workflow, initialVariables, { signal, invocation });
}
