import { mkdir, readdir, readFile, unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { formatForFile, parseWorkflowDocument, serializeWorkflowDocument } from "./documents.js";
import { GraphStructureError, WorkflowNotFound } from "./errors.js";
import { assertWorkflowStructure } from "./graph.js";
import type { Workflow, WorkflowSummary } from "./types.js";

export interface WorkflowStore {
  load(workflowId: string): Promise<Workflow>;
  list(): Promise<WorkflowSummary[]>;
}

export interface WritableWorkflowStore extends WorkflowStore {
  save(workflow: Workflow): Promise<void>;
  /** Summaries whose id, name or description contains the keyword, ignoring case. */
  search(keyword: string): Promise<WorkflowSummary[]>;
  delete(workflowId: string): Promise<void>;
}

const workflowIdPattern = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;
const extensions = [".yaml", ".yml", ".json"] as const;

export function isValidWorkflowId(workflowId: string): boolean {
  return workflowIdPattern.test(workflowId);
}

function summarize(workflow: Workflow): WorkflowSummary {
  return {
    id: workflow.id,
    name: workflow.name,
    version: workflow.version,
    ...(workflow.description !== undefined ? { description: workflow.description } : {})
  };
}

function matchesKeyword(summary: WorkflowSummary, keyword: string): boolean {
  const needle = keyword.trim().toLowerCase();
  return [summary.id, summary.name, summary.description ?? ""].some((field) => field.toLowerCase().includes(needle));
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** Reads `<id>.yaml`, `<id>.yml` or `<id>.json` from one directory; saves as JSON. */
export class FileWorkflowStore implements WritableWorkflowStore {
  constructor(private readonly directory: string) {}

  async load(workflowId: string): Promise<Workflow> {
    if (!isValidWorkflowId(workflowId)) {
      throw new WorkflowNotFound(workflowId);
    }
    for (const extension of extensions) {
      const fileName = `${workflowId}${extension}`;
      let text: string;
      try {
        text = await readFile(path.join(this.directory, fileName), "utf8");
      } catch (error) {
        if (isMissingFile(error)) continue;
        throw error;
      }
      const workflow = parseWorkflowDocument(text, extension === ".json" ? "json" : "yaml");
      if (workflow.id !== workflowId) {
        throw new GraphStructureError([
          { path: "id", message: `Document id '${workflow.id}' does not match file name '${fileName}'.` }
        ]);
      }
      return workflow;
    }
    throw new WorkflowNotFound(workflowId);
  }

  async list(): Promise<WorkflowSummary[]> {
    let files: string[];
    try {
      files = await readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const ids = new Set<string>();
    for (const file of files) {
      const format = formatForFile(file);
      const id = format ? file.slice(0, file.lastIndexOf(".")) : "";
      if (isValidWorkflowId(id)) ids.add(id);
    }

    const summaries: WorkflowSummary[] = [];
    for (const id of [...ids].sort()) {
      summaries.push(summarize(await this.load(id)));
    }
    return summaries;
  }

  async save(workflow: Workflow): Promise<void> {
    if (!isValidWorkflowId(workflow.id)) {
      throw new GraphStructureError([{ path: "id", message: `Workflow id '${workflow.id}' is not a valid file name.` }]);
    }
    assertWorkflowStructure(workflow);
    await mkdir(this.directory, { recursive: true });
    await writeFile(path.join(this.directory, `${workflow.id}.json`), serializeWorkflowDocument(workflow, "json"), "utf8");
    // load() prefers YAML, so an older YAML copy would shadow the saved document.
    await this.removeFiles(workflow.id, [".yaml", ".yml"]);
  }

  async search(keyword: string): Promise<WorkflowSummary[]> {
    return (await this.list()).filter((summary) => matchesKeyword(summary, keyword));
  }

  async delete(workflowId: string): Promise<void> {
    if (!isValidWorkflowId(workflowId) || (await this.removeFiles(workflowId, extensions)) === 0) {
      throw new WorkflowNotFound(workflowId);
    }
  }

  private async removeFiles(workflowId: string, candidates: readonly string[]): Promise<number> {
    let removed = 0;
    for (const extension of candidates) {
      try {
        await unlink(path.join(this.directory, `${workflowId}${extension}`));
        removed += 1;
      } catch (error) {
        if (!isMissingFile(error)) throw error;
      }
    }
    return removed;
  }
}

export class MemoryWorkflowStore implements WritableWorkflowStore {
  private readonly workflows = new Map<string, Workflow>();

  constructor(workflows: Workflow[] = []) {
    workflows.forEach((workflow) => this.workflows.set(workflow.id, workflow));
  }

  async load(workflowId: string): Promise<Workflow> {
    const workflow = this.workflows.get(workflowId);
    if (!workflow) {
      throw new WorkflowNotFound(workflowId);
    }
    return workflow;
  }

  async list(): Promise<WorkflowSummary[]> {
    return [...this.workflows.values()].map(summarize).sort((a, b) => a.id.localeCompare(b.id));
  }

  async save(workflow: Workflow): Promise<void> {
    assertWorkflowStructure(workflow);
    this.workflows.set(workflow.id, workflow);
  }

  async search(keyword: string): Promise<WorkflowSummary[]> {
    return (await this.list()).filter((summary) => matchesKeyword(summary, keyword));
  }

  async delete(workflowId: string): Promise<void> {
    if (!this.workflows.delete(workflowId)) {
      throw new WorkflowNotFound(workflowId);
    }
  }
}
