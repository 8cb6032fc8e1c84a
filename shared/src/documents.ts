import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { GraphStructureError } from "./errors.js";
import { parseWorkflowDefinition } from "./graph.js";
import type { Workflow, WorkflowNode } from "./types.js";

export type DocumentFormat = "yaml" | "json";

export function formatForFile(fileName: string): DocumentFormat | null {
  if (fileName.endsWith(".yaml") || fileName.endsWith(".yml")) return "yaml";
  if (fileName.endsWith(".json")) return "json";
  return null;
}

export function parseWorkflowDocument(text: string, format: DocumentFormat): Workflow {
  let raw: unknown;
  try {
    raw = format === "yaml" ? parseYaml(text) : JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new GraphStructureError([{ path: "root", message: `Unparseable ${format} document: ${message}` }]);
  }
  return parseWorkflowDefinition(raw);
}

function nodeDocument(node: WorkflowNode): Record<string, unknown> {
  const base: Record<string, unknown> = { id: node.id, kind: node.kind, name: node.name };
  if (node.description !== undefined) base.description = node.description;

  switch (node.kind) {
    case "task":
      return {
        ...base,
        tool_name: node.toolName,
        tool_params: node.toolParams,
        ...(node.bestEffort ? { best_effort: true } : {})
      };
    case "condition":
      return { ...base, condition_expr: node.conditionExpr };
    case "loop":
      return {
        ...base,
        loop_config: {
          condition_expr: node.loopConfig.conditionExpr,
          body: node.loopConfig.body,
          ...(node.loopConfig.maxIterations !== undefined ? { max_iterations: node.loopConfig.maxIterations } : {})
        }
      };
    case "parallel":
      return { ...base, parallel_branches: node.parallelBranches };
    default:
      return base;
  }
}

/** The snake_case document form that `parseWorkflowDocument` reads back. */
export function toWorkflowDocument(workflow: Workflow): Record<string, unknown> {
  return {
    id: workflow.id,
    name: workflow.name,
    version: workflow.version,
    ...(workflow.description !== undefined ? { description: workflow.description } : {}),
    nodes: workflow.nodes.map(nodeDocument),
    edges: workflow.edges.map((edge) => ({ ...edge })),
    metadata: workflow.metadata
  };
}

export function serializeWorkflowDocument(workflow: Workflow, format: DocumentFormat): string {
  const document = toWorkflowDocument(workflow);
  return format === "yaml" ? stringifyYaml(document) : `${JSON.stringify(document, null, 2)}\n`;
}
