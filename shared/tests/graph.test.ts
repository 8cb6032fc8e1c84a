import { describe, expect, it } from "vitest";
import { GraphStructureError } from "../src/errors.js";
import { assertWorkflowStructure, parseWorkflowDefinition, validateWorkflowDefinition } from "../src/graph.js";

function linear(): Record<string, unknown> {
  return {
    id: "linear",
    name: "Linear",
    version: 1,
    nodes: [
      { id: "start", kind: "start", name: "Start" },
      { id: "task_A", kind: "task", name: "A", tool_name: "echo", tool_params: { x: "${in}" } },
      { id: "end", kind: "end", name: "End" }
    ],
    edges: [
      { source: "start", target: "task_A" },
      { source: "task_A", target: "end" }
    ]
  };
}

describe("validateWorkflowDefinition", () => {
  it("accepts a linear workflow", () => {
    const result = validateWorkflowDefinition(linear());
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
  });

  it("builds typed nodes with defaults", () => {
    const workflow = parseWorkflowDefinition(linear());
    expect(workflow.version).toBe("1");
    expect(workflow.metadata).toEqual({});
    expect(workflow.nodes[1]).toEqual({
      id: "task_A",
      kind: "task",
      name: "A",
      toolName: "echo",
      toolParams: { x: "${in}" },
      bestEffort: false
    });
  });

  it("accepts the type key in any case", () => {
    const document = linear();
    document.nodes = [
      { id: "start", type: "START", name: "Start" },
      { id: "task_A", type: "Task", name: "A", tool_name: "echo" },
      { id: "end", type: "end", name: "End" }
    ];
    const workflow = parseWorkflowDefinition(document);
    expect(workflow.nodes.map((node) => node.kind)).toEqual(["start", "task", "end"]);
  });

  it("requires exactly one start node", () => {
    const result = validateWorkflowDefinition({
      id: "no-start",
      name: "No start",
      nodes: [
        { id: "task_A", kind: "task", name: "A", tool_name: "echo" },
        { id: "end", kind: "end", name: "End" }
      ],
      edges: [{ source: "task_A", target: "end" }]
    });
    expect(result.valid).toBe(false);
    expect(result.errors).toContainEqual({
      path: "nodes",
      message: "Workflow must have exactly one start node (found 0)."
    });
  });

  it("rejects dangling edges", () => {
    const document = linear();
    document.edges = [
      { source: "start", target: "task_A" },
      { source: "task_A", target: "end" },
      { source: "task_A", target: "ghost" }
    ];
    expect(validateWorkflowDefinition(document).errors).toEqual([
      { path: "edges[2].target", message: "Unknown node 'ghost'." }
    ]);
  });

  it("rejects unreachable nodes", () => {
    const document = linear();
    document.nodes = [
      { id: "start", kind: "start", name: "Start" },
      { id: "task_A", kind: "task", name: "A", tool_name: "echo" },
      { id: "orphan", kind: "task", name: "Orphan", tool_name: "echo" },
      { id: "end", kind: "end", name: "End" }
    ];
    document.edges = [
      { source: "start", target: "task_A" },
      { source: "task_A", target: "end" },
      { source: "orphan", target: "end" }
    ];
    expect(validateWorkflowDefinition(document).errors).toEqual([
      { path: "node(orphan)", message: "Node is unreachable from the start node." }
    ]);
  });

  it("rejects cycles outside loop nodes", () => {
    const result = validateWorkflowDefinition({
      id: "cycle",
      name: "Cycle",
      nodes: [
        { id: "start", kind: "start", name: "Start" },
        { id: "check", kind: "condition", name: "Check", condition_expr: "${x} > 1" },
        { id: "work", kind: "task", name: "Work", tool_name: "echo" },
        { id: "end", kind: "end", name: "End" }
      ],
      edges: [
        { source: "start", target: "check" },
        { source: "check", target: "work", condition: "true" },
        { source: "check", target: "end", condition: "false" },
        { source: "work", target: "check" }
      ]
    });
    expect(result.errors).toEqual([
      { path: "edges", message: "Edge graph must be acyclic; use a loop node for repetition." }
    ]);
  });

  it("rejects fields that belong to another kind", () => {
    const document = linear();
    document.nodes = [
      { id: "start", kind: "start", name: "Start" },
      { id: "task_A", kind: "condition", name: "A", tool_name: "echo", condition_expr: "true" },
      { id: "end", kind: "end", name: "End" }
    ];
    expect(validateWorkflowDefinition(document).errors).toContainEqual({
      path: "nodes[1].tool_name",
      message: "'tool_name' is only valid on task nodes."
    });
  });

  it("requires tool_name on task nodes", () => {
    const document = linear();
    document.nodes = [
      { id: "start", kind: "start", name: "Start" },
      { id: "task_A", kind: "task", name: "A" },
      { id: "end", kind: "end", name: "End" }
    ];
    expect(validateWorkflowDefinition(document).errors).toContainEqual({
      path: "nodes[1].tool_name",
      message: "Task nodes require tool_name."
    });
  });

  it("keeps nested nodes out of the edge graph", () => {
    const result = validateWorkflowDefinition({
      id: "nested",
      name: "Nested",
      nodes: [
        { id: "start", kind: "start", name: "Start" },
        { id: "repeat", kind: "loop", name: "Repeat", loop_config: { condition_expr: "false", body: ["inc"] } },
        { id: "inc", kind: "task", name: "Inc", tool_name: "echo" },
        { id: "end", kind: "end", name: "End" }
      ],
      edges: [
        { source: "start", target: "repeat" },
        { source: "repeat", target: "end" },
        { source: "inc", target: "end" }
      ]
    });
    expect(result.errors).toEqual([
      { path: "edges[2].source", message: "Nested node 'inc' cannot take part in edges." }
    ]);
  });

  it("rejects a non-positive max_iterations", () => {
    const result = validateWorkflowDefinition({
      id: "loop",
      name: "Loop",
      nodes: [
        { id: "start", kind: "start", name: "Start" },
        { id: "repeat", kind: "loop", name: "Repeat", loop_config: { condition_expr: "true", body: ["inc"], max_iterations: 0 } },
        { id: "inc", kind: "task", name: "Inc", tool_name: "echo" },
        { id: "end", kind: "end", name: "End" }
      ],
      edges: [
        { source: "start", target: "repeat" },
        { source: "repeat", target: "end" }
      ]
    });
    expect(result.errors).toContainEqual({
      path: "nodes[1].loop_config.max_iterations",
      message: "max_iterations must be a positive integer."
    });
  });
});

describe("parseWorkflowDefinition", () => {
  it("throws a GraphStructureError listing every issue", () => {
    expect(() => parseWorkflowDefinition({ name: "Nameless", nodes: [] })).toThrow(GraphStructureError);
    try {
      parseWorkflowDefinition({ name: "Nameless", nodes: [] });
    } catch (error) {
      expect(error).toBeInstanceOf(GraphStructureError);
      if (error instanceof GraphStructureError) {
        expect(error.issues).toEqual([
          { path: "id", message: "Workflow id is required." },
          { path: "nodes", message: "Nodes must be a non-empty array." }
        ]);
        expect(error.retryable).toBe(false);
      }
    }
  });
});

describe("assertWorkflowStructure", () => {
  it("re-checks a workflow built in code", () => {
    const workflow = parseWorkflowDefinition(linear());
    expect(() => assertWorkflowStructure({ ...workflow, edges: workflow.edges.slice(0, 1) })).toThrow(
      "node(task_A): Node must have exactly one unconditional outgoing edge."
    );
  });
});
