export type NodeKind = "start" | "end" | "task" | "condition" | "loop" | "parallel";

export type RunStatus = "running" | "completed" | "failed" | "cancelled";

export type TaskStatus = "pending" | "queued" | "running" | "completed" | "failed" | "cancelled";

export type ToolInvocation = "sync" | "async";

export type Variables = Record<string, unknown>;

interface NodeBase {
  id: string;
  name: string;
  description?: string;
}

export interface StartNode extends NodeBase {
  kind: "start";
}

export interface EndNode extends NodeBase {
  kind: "end";
}

export interface TaskNode extends NodeBase {
  kind: "task";
  toolName: string;
  toolParams: Record<string, unknown>;
  bestEffort: boolean;
}

export interface ConditionNode extends NodeBase {
  kind: "condition";
  conditionExpr: string;
}

export interface LoopConfig {
  conditionExpr: string;
  body: string[];
  maxIterations?: number;
}

export interface LoopNode extends NodeBase {
  kind: "loop";
  loopConfig: LoopConfig;
}

export interface ParallelNode extends NodeBase {
  kind: "parallel";
  parallelBranches: string[][];
}

export type WorkflowNode = StartNode | EndNode | TaskNode | ConditionNode | LoopNode | ParallelNode;

export interface WorkflowEdge {
  source: string;
  target: string;
  condition?: string;
}

export interface Workflow {
  id: string;
  name: string;
  version: string;
  description?: string;
  nodes: WorkflowNode[];
  edges: WorkflowEdge[];
  metadata: Record<string, unknown>;
}

export interface WorkflowSummary {
  id: string;
  name: string;
  version: string;
  description?: string;
}

export interface ErrorInfo {
  kind: string;
  message: string;
  nodeId: string | null;
}

export interface ExecutionResult {
  workflowId: string;
  status: Exclude<RunStatus, "running">;
  variables: Variables;
  nodeResults: Record<string, unknown>;
  visited: string[];
  error: ErrorInfo | null;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export interface TaskRecord {
  id: string;
  type: string;
  status: TaskStatus;
  params: Record<string, unknown>;
  metadata: Record<string, unknown>;
  result: unknown;
  error: ErrorInfo | null;
  retryCount: number;
  maxRetries: number;
  workerId: string | null;
  leaseExpiresAt: string | null;
  createdAt: string;
  updatedAt: string;
  startedAt: string | null;
  completedAt: string | null;
  expiresAt: string | null;
}

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}
