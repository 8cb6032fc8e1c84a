import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parseWorkflowDocument, toWorkflowDocument } from "../src/documents.js";
import { GraphStructureError, WorkflowNotFound } from "../src/errors.js";
import { parseWorkflowDefinition } from "../src/graph.js";
import { FileWorkflowStore, MemoryWorkflowStore } from "../src/workflowStore.js";

const greetingYaml = [
  "id: greet",
  "name: Greeting",
  "version: 2",
  "nodes:",
  "  - id: start",
  "    type: START",
  "    name: Start",
  "  - id: say",
  "    kind: task",
  "    name: Say",
  "    tool_name: echo",
  "    tool_params:",
  '      text: "Hello ${who}"',
  "  - id: end",
  "    kind: end",
  "    name: End",
  "edges:",
  "  - source: start",
  "    target: say",
  "  - source: say",
  "    target: end",
  ""
].join("\n");

function loopWorkflow(id: string) {
  return parseWorkflowDefinition({
    id,
    name: "Saved",
    description: "Saved",
    nodes: [
      { id: "start", kind: "start", name: "Start" },
      {
        id: "repeat",
        kind: "loop",
        name: "Repeat",
        loop_config: { condition_expr: "${n} < 2", body: ["bump"], max_iterations: 4 }
      },
      { id: "bump", kind: "task", name: "Bump", tool_name: "echo", tool_params: { v: 1 }, best_effort: true },
      { id: "end", kind: "end", name: "End" }
    ],
    edges: [
      { source: "start", target: "repeat" },
      { source: "repeat", target: "end" }
    ],
    metadata: { owner: "tests" }
  });
}

describe("parseWorkflowDocument", () => {
  it("reads the YAML form", () => {
    const workflow = parseWorkflowDocument(greetingYaml, "yaml");
    expect(workflow.version).toBe("2");
    expect(workflow.nodes[0].kind).toBe("start");
    expect(workflow.nodes[1]).toMatchObject({ toolName: "echo", toolParams: { text: "Hello ${who}" } });
  });

  it("reports unparseable text as a structure error", () => {
    expect(() => parseWorkflowDocument("{", "json")).toThrow(GraphStructureError);
    expect(() => parseWorkflowDocument("{", "json")).toThrow("root: Unparseable json document");
  });

  it("writes a document that parses back to the same workflow", () => {
    const workflow = loopWorkflow("saved");
    const document = toWorkflowDocument(workflow);
    expect(document.nodes).toContainEqual({
      id: "repeat",
      kind: "loop",
      name: "Repeat",
      loop_config: { condition_expr: "${n} < 2", body: ["bump"], max_iterations: 4 }
    });
    expect(parseWorkflowDocument(JSON.stringify(document), "json")).toEqual(workflow);
  });
});

describe("FileWorkflowStore", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), "flowgraph-workflows-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("loads YAML files and lists every workflow by id", async () => {
    const store = new FileWorkflowStore(directory);
    await writeFile(path.join(directory, "greet.yaml"), greetingYaml, "utf8");
    await writeFile(path.join(directory, "notes.txt"), "not a workflow", "utf8");
    await writeFile(path.join(directory, ".hidden.json"), "{}", "utf8");
    await store.save(loopWorkflow("other"));

    expect((await store.load("greet")).name).toBe("Greeting");
    expect(await store.load("other")).toEqual(loopWorkflow("other"));
    expect(await store.list()).toEqual([
      { id: "greet", name: "Greeting", version: "2" },
      { id: "other", name: "Saved", version: "1.0.0", description: "Saved" }
    ]);
  });

  it("raises WorkflowNotFound for missing or unsafe ids", async () => {
    const store = new FileWorkflowStore(directory);
    await expect(store.load("absent")).rejects.toBeInstanceOf(WorkflowNotFound);
    await expect(store.load("../etc/passwd")).rejects.toBeInstanceOf(WorkflowNotFound);
  });

  it("replaces a YAML workflow when the same id is saved", async () => {
    const store = new FileWorkflowStore(directory);
    await writeFile(path.join(directory, "greet.yaml"), greetingYaml, "utf8");

    await store.save({ ...parseWorkflowDocument(greetingYaml, "yaml"), name: "Greeting v2" });

    expect((await store.load("greet")).name).toBe("Greeting v2");
    expect(await readdir(directory)).toEqual(["greet.json"]);
  });

  it("rejects a file whose document id differs from its name", async () => {
    const store = new FileWorkflowStore(directory);
    await writeFile(path.join(directory, "alpha.json"), JSON.stringify(toWorkflowDocument(loopWorkflow("beta"))), "utf8");

    await expect(store.load("alpha")).rejects.toBeInstanceOf(GraphStructureError);
    await expect(store.load("alpha")).rejects.toThrow("Document id 'beta' does not match file name 'alpha.json'.");
  });

  it("searches id, name and description without regard to case", async () => {
    const store = new FileWorkflowStore(directory);
    await writeFile(path.join(directory, "greet.yaml"), greetingYaml, "utf8");
    await store.save(loopWorkflow("other"));

    expect(await store.search("GREET")).toEqual([{ id: "greet", name: "Greeting", version: "2" }]);
    expect((await store.search("saved")).map((summary) => summary.id)).toEqual(["other"]);
    expect(await store.search("nothing-like-this")).toEqual([]);
  });

  it("deletes every file of a workflow and reports a missing one", async () => {
    const store = new FileWorkflowStore(directory);
    await writeFile(path.join(directory, "greet.yaml"), greetingYaml, "utf8");

    await store.delete("greet");

    await expect(store.load("greet")).rejects.toBeInstanceOf(WorkflowNotFound);
    await expect(store.delete("greet")).rejects.toBeInstanceOf(WorkflowNotFound);
    await expect(store.delete("../greet")).rejects.toBeInstanceOf(WorkflowNotFound);
  });

  it("lists nothing when the directory does not exist", async () => {
    const store = new FileWorkflowStore(path.join(directory, "missing"));
    expect(await store.list()).toEqual([]);
  });
});

describe("MemoryWorkflowStore", () => {
  it("saves, loads and lists sorted summaries", async () => {
    const store = new MemoryWorkflowStore([loopWorkflow("zeta")]);
    await store.save(loopWorkflow("alpha"));

    expect((await store.load("alpha")).id).toBe("alpha");
    expect((await store.list()).map((summary) => summary.id)).toEqual(["alpha", "zeta"]);
    await expect(store.load("beta")).rejects.toThrow("Workflow 'beta' not found.");
  });

  it("searches and deletes", async () => {
    const store = new MemoryWorkflowStore([loopWorkflow("zeta"), loopWorkflow("alpha")]);

    expect((await store.search("ZET")).map((summary) => summary.id)).toEqual(["zeta"]);
    await store.delete("zeta");
    expect((await store.list()).map((summary) => summary.id)).toEqual(["alpha"]);
    await expect(store.delete("zeta")).rejects.toThrow("Workflow 'zeta' not found.");
  });
});
