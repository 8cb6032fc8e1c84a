import { GraphStructureError } from "./errors.js";
import type {
  NodeKind,
  ValidationError,
  ValidationResult,
  Workflow,
  WorkflowEdge,
  WorkflowNode
} from "./types.js";

const nodeKinds: readonly NodeKind[] = ["start", "end", "task", "condition", "loop", "parallel"];

const kindSpecificFields: Record<string, NodeKind> = {
  tool_name: "task",
  tool_params: "task",
  best_effort: "task",
  condition_expr: "condition",
  loop_config: "loop",
  parallel_branches: "parallel"
};

export interface WorkflowIndex {
  start: WorkflowNode;
  nodes: Map<string, WorkflowNode>;
  outgoing: Map<string, WorkflowEdge[]>;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSet(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (Array.isArray(value)) return value.length > 0;
  if (isObject(value)) return Object.keys(value).length > 0;
  return true;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function parseIdList(value: unknown, path: string, errors: ValidationError[]): string[] | null {
  if (!Array.isArray(value) || value.length === 0) {
    errors.push({ path, message: "Must be a non-empty array of node ids." });
    return null;
  }
  const ids: string[] = [];
  value.forEach((item, index) => {
    if (!isNonEmptyString(item)) {
      errors.push({ path: `${path}[${index}]`, message: "Node id must be a non-empty string." });
      return;
    }
    ids.push(item);
  });
  return ids.length === value.length ? ids : null;
}

function parseNode(raw: unknown, index: number, seen: Set<string>, errors: ValidationError[]): WorkflowNode | null {
  const path = `nodes[${index}]`;
  if (!isObject(raw)) {
    errors.push({ path, message: "Node must be an object." });
    return null;
  }

  const id = raw.id;
  if (!isNonEmptyString(id)) {
    errors.push({ path: `${path}.id`, message: "Node id is required." });
    return null;
  }
  if (seen.has(id)) {
    errors.push({ path: `${path}.id`, message: `Duplicate node id '${id}'.` });
    return null;
  }
  seen.add(id);

  const name = raw.name;
  if (!isNonEmptyString(name)) {
    errors.push({ path: `${path}.name`, message: "Node name is required." });
  }
  const rawKind = raw.kind ?? raw.type;
  const kind = typeof rawKind === "string" ? nodeKinds.find((candidate) => candidate === rawKind.toLowerCase()) : undefined;
  if (!kind) {
    errors.push({ path: `${path}.kind`, message: `Node kind must be one of ${nodeKinds.join(", ")}.` });
    return null;
  }
  const description = raw.description;
  if (description !== undefined && description !== null && typeof description !== "string") {
    errors.push({ path: `${path}.description`, message: "Description must be a string." });
  }

  for (const [field, owner] of Object.entries(kindSpecificFields)) {
    if (owner !== kind && isSet(raw[field])) {
      errors.push({ path: `${path}.${field}`, message: `'${field}' is only valid on ${owner} nodes.` });
    }
  }

  const base = {
    id,
    name: typeof name === "string" ? name : id,
    ...(typeof description === "string" ? { description } : {})
  };

  switch (kind) {
    case "start":
      return { ...base, kind: "start" };
    case "end":
      return { ...base, kind: "end" };
    case "task": {
      const toolName = raw.tool_name;
      const toolParams = raw.tool_params ?? {};
      const bestEffort = raw.best_effort ?? false;
      if (!isNonEmptyString(toolName)) {
        errors.push({ path: `${path}.tool_name`, message: "Task nodes require tool_name." });
      }
      if (!isObject(toolParams)) {
        errors.push({ path: `${path}.tool_params`, message: "tool_params must be a mapping." });
      }
      if (typeof bestEffort !== "boolean") {
        errors.push({ path: `${path}.best_effort`, message: "best_effort must be a boolean." });
      }
      if (!isNonEmptyString(toolName) || !isObject(toolParams) || typeof bestEffort !== "boolean") return null;
      return { ...base, kind, toolName, toolParams, bestEffort };
    }
    case "condition": {
      const conditionExpr = raw.condition_expr;
      if (!isNonEmptyString(conditionExpr)) {
        errors.push({ path: `${path}.condition_expr`, message: "Condition nodes require condition_expr." });
        return null;
      }
      return { ...base, kind, conditionExpr };
    }
    case "loop": {
      const config = raw.loop_config;
      if (!isObject(config)) {
        errors.push({ path: `${path}.loop_config`, message: "Loop nodes require loop_config." });
        return null;
      }
      const conditionExpr = config.condition_expr;
      if (!isNonEmptyString(conditionExpr)) {
        errors.push({ path: `${path}.loop_config.condition_expr`, message: "loop_config.condition_expr is required." });
      }
      const body = parseIdList(config.body, `${path}.loop_config.body`, errors);
      const maxIterations = config.max_iterations;
      const validMax =
        maxIterations === undefined ||
        maxIterations === null ||
        (typeof maxIterations === "number" && Number.isInteger(maxIterations) && maxIterations > 0);
      if (!validMax) {
        errors.push({ path: `${path}.loop_config.max_iterations`, message: "max_iterations must be a positive integer." });
      }
      if (!isNonEmptyString(conditionExpr) || !body || !validMax) return null;
      return {
        ...base,
        kind,
        loopConfig: {
          conditionExpr,
          body,
          ...(typeof maxIterations === "number" ? { maxIterations } : {})
        }
      };
    }
    case "parallel": {
      const branches = raw.parallel_branches;
      if (!Array.isArray(branches) || branches.length === 0) {
        errors.push({ path: `${path}.parallel_branches`, message: "Parallel nodes require parallel_branches." });
        return null;
      }
      const parsed = branches.map((branch, branchIndex) =>
        parseIdList(branch, `${path}.parallel_branches[${branchIndex}]`, errors)
      );
      const complete = parsed.filter((branch): branch is string[] => branch !== null);
      if (complete.length !== parsed.length) return null;
      return { ...base, kind, parallelBranches: complete };
    }
  }
}

function parseEdges(raw: unknown, errors: ValidationError[]): WorkflowEdge[] {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) {
    errors.push({ path: "edges", message: "Edges must be an array." });
    return [];
  }
  const edges: WorkflowEdge[] = [];
  raw.forEach((edge, index) => {
    if (!isObject(edge)) {
      errors.push({ path: `edges[${index}]`, message: "Edge must be an object." });
      return;
    }
    const { source, target, condition } = edge;
    if (!isNonEmptyString(source)) {
      errors.push({ path: `edges[${index}].source`, message: "Edge source is required." });
    }
    if (!isNonEmptyString(target)) {
      errors.push({ path: `edges[${index}].target`, message: "Edge target is required." });
    }
    if (condition !== undefined && condition !== null && !isNonEmptyString(condition)) {
      errors.push({ path: `edges[${index}].condition`, message: "Edge condition must be a non-empty string." });
    }
    if (!isNonEmptyString(source) || !isNonEmptyString(target)) return;
    edges.push(isNonEmptyString(condition) ? { source, target, condition } : { source, target });
  });
  return edges;
}

function nestedSequences(node: WorkflowNode): string[][] {
  if (node.kind === "loop") return [node.loopConfig.body];
  if (node.kind === "parallel") return node.parallelBranches;
  return [];
}

function validateStructure(workflow: Workflow, errors: ValidationError[]): void {
  const byId = new Map(workflow.nodes.map((node) => [node.id, node]));

  const starts = workflow.nodes.filter((node) => node.kind === "start");
  if (starts.length !== 1) {
    errors.push({ path: "nodes", message: `Workflow must have exactly one start node (found ${starts.length}).` });
  }
  if (!workflow.nodes.some((node) => node.kind === "end")) {
    errors.push({ path: "nodes", message: "Workflow must have at least one end node." });
  }

  const containerOf = new Map<string, string>();
  for (const node of workflow.nodes) {
    nestedSequences(node).forEach((sequence, sequenceIndex) => {
      sequence.forEach((childId, position) => {
        const path =
          node.kind === "loop"
            ? `node(${node.id}).loop_config.body[${position}]`
            : `node(${node.id}).parallel_branches[${sequenceIndex}][${position}]`;
        const child = byId.get(childId);
        if (!child) {
          errors.push({ path, message: `Unknown node '${childId}'.` });
          return;
        }
        if (childId === node.id) {
          errors.push({ path, message: "A node cannot contain itself." });
          return;
        }
        if (child.kind === "start" || child.kind === "end") {
          errors.push({ path, message: "Start and end nodes cannot be nested." });
          return;
        }
        const owner = containerOf.get(childId);
        if (owner) {
          errors.push({ path, message: `Node '${childId}' already belongs to '${owner}'.` });
          return;
        }
        containerOf.set(childId, node.id);
      });
    });
  }

  workflow.edges.forEach((edge, index) => {
    for (const end of ["source", "target"] as const) {
      const nodeId = edge[end];
      if (!byId.has(nodeId)) {
        errors.push({ path: `edges[${index}].${end}`, message: `Unknown node '${nodeId}'.` });
      } else if (containerOf.has(nodeId)) {
        errors.push({ path: `edges[${index}].${end}`, message: `Nested node '${nodeId}' cannot take part in edges.` });
      }
    }
  });

  if (errors.length > 0) return;

  const outgoing = groupOutgoing(workflow.edges);
  const incoming = new Set(workflow.edges.map((edge) => edge.target));

  for (const node of workflow.nodes) {
    if (containerOf.has(node.id)) continue;
    const out = outgoing.get(node.id) ?? [];
    const path = `node(${node.id})`;
    switch (node.kind) {
      case "end":
        if (out.length > 0) errors.push({ path, message: "End node cannot have outgoing edges." });
        break;
      case "condition":
        if (out.length === 0) errors.push({ path, message: "Condition node needs at least one outgoing edge." });
        break;
      default:
        if (node.kind === "start" && incoming.has(node.id)) {
          errors.push({ path, message: "Start node cannot have incoming edges." });
        }
        if (out.length !== 1 || out[0].condition !== undefined) {
          errors.push({ path, message: "Node must have exactly one unconditional outgoing edge." });
        }
    }
  }

  const successors = new Map<string, string[]>();
  workflow.nodes
    .filter((node) => !containerOf.has(node.id))
    .forEach((node) => successors.set(node.id, (outgoing.get(node.id) ?? []).map((edge) => edge.target)));
  if (hasCycle(successors)) {
    errors.push({ path: "edges", message: "Edge graph must be acyclic; use a loop node for repetition." });
  }

  if (starts.length !== 1) return;
  const reached = new Set<string>([starts[0].id]);
  const frontier = [starts[0].id];
  while (frontier.length > 0) {
    const current = frontier.pop();
    const node = current === undefined ? undefined : byId.get(current);
    if (!node) continue;
    const next = [...(outgoing.get(node.id) ?? []).map((edge) => edge.target), ...nestedSequences(node).flat()];
    next.forEach((nodeId) => {
      if (reached.has(nodeId)) return;
      reached.add(nodeId);
      frontier.push(nodeId);
    });
  }
  workflow.nodes.forEach((node) => {
    if (!reached.has(node.id)) {
      errors.push({ path: `node(${node.id})`, message: "Node is unreachable from the start node." });
    }
  });
}

function groupOutgoing(edges: WorkflowEdge[]): Map<string, WorkflowEdge[]> {
  const outgoing = new Map<string, WorkflowEdge[]>();
  edges.forEach((edge) => {
    const list = outgoing.get(edge.source) ?? [];
    list.push(edge);
    outgoing.set(edge.source, list);
  });
  return outgoing;
}

function hasCycle(successors: Map<string, string[]>): boolean {
  const inDegree = new Map<string, number>();
  for (const node of successors.keys()) {
    inDegree.set(node, 0);
  }
  for (const targets of successors.values()) {
    targets.forEach((target) => inDegree.set(target, (inDegree.get(target) ?? 0) + 1));
  }

  const queue: string[] = [];
  for (const [node, degree] of inDegree.entries()) {
    if (degree === 0) queue.push(node);
  }

  let visited = 0;
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    visited += 1;
    (successors.get(current) ?? []).forEach((target) => {
      const nextDegree = (inDegree.get(target) ?? 0) - 1;
      inDegree.set(target, nextDegree);
      if (nextDegree === 0) queue.push(target);
    });
  }

  return visited !== inDegree.size;
}

function buildWorkflow(input: unknown): { workflow: Workflow | null; errors: ValidationError[] } {
  const errors: ValidationError[] = [];

  if (!isObject(input)) {
    return { workflow: null, errors: [{ path: "root", message: "Workflow definition must be an object." }] };
  }

  const { id, name, version, description, metadata } = input;
  if (!isNonEmptyString(id)) {
    errors.push({ path: "id", message: "Workflow id is required." });
  }
  if (!isNonEmptyString(name)) {
    errors.push({ path: "name", message: "Workflow name is required." });
  }
  const versionText = version === undefined || version === null ? "1.0.0" : version;
  if (typeof versionText !== "number" && !isNonEmptyString(versionText)) {
    errors.push({ path: "version", message: "Version must be a number or a non-empty string." });
  }
  if (description !== undefined && description !== null && typeof description !== "string") {
    errors.push({ path: "description", message: "Description must be a string." });
  }
  if (metadata !== undefined && metadata !== null && !isObject(metadata)) {
    errors.push({ path: "metadata", message: "Metadata must be a mapping." });
  }

  const rawNodes = input.nodes;
  if (!Array.isArray(rawNodes) || rawNodes.length === 0) {
    errors.push({ path: "nodes", message: "Nodes must be a non-empty array." });
    return { workflow: null, errors };
  }

  const seen = new Set<string>();
  const nodes = rawNodes
    .map((raw, index) => parseNode(raw, index, seen, errors))
    .filter((node): node is WorkflowNode => node !== null);
  const edges = parseEdges(input.edges, errors);

  if (errors.length > 0 || !isNonEmptyString(id) || !isNonEmptyString(name)) {
    return { workflow: null, errors };
  }

  const workflow: Workflow = {
    id,
    name,
    version: String(versionText),
    ...(typeof description === "string" ? { description } : {}),
    nodes,
    edges,
    metadata: isObject(metadata) ? metadata : {}
  };
  validateStructure(workflow, errors);
  return { workflow: errors.length === 0 ? workflow : null, errors };
}

export function validateWorkflowDefinition(input: unknown): ValidationResult {
  const { errors } = buildWorkflow(input);
  return { valid: errors.length === 0, errors };
}

export function parseWorkflowDefinition(input: unknown): Workflow {
  const { workflow, errors } = buildWorkflow(input);
  if (!workflow) {
    throw new GraphStructureError(errors);
  }
  return workflow;
}

/** Re-checks an already-built workflow; used by the engine before a run starts. */
export function assertWorkflowStructure(workflow: Workflow): void {
  const errors: ValidationError[] = [];
  const ids = new Set<string>();
  workflow.nodes.forEach((node, index) => {
    if (ids.has(node.id)) {
      errors.push({ path: `nodes[${index}].id`, message: `Duplicate node id '${node.id}'.` });
    }
    ids.add(node.id);
  });
  if (errors.length === 0) {
    validateStructure(workflow, errors);
  }
  if (errors.length > 0) {
    throw new GraphStructureError(errors);
  }
}

export function indexWorkflow(workflow: Workflow): WorkflowIndex {
  const start = workflow.nodes.find((node) => node.kind === "start");
  if (!start) {
    throw new GraphStructureError([{ path: "nodes", message: "Workflow must have exactly one start node (found 0)." }]);
  }
  return {
    start,
    nodes: new Map(workflow.nodes.map((node) => [node.id, node])),
    outgoing: groupOutgoing(workflow.edges)
  };
}
