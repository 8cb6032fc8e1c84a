import { WORKFLOW_TASK_TYPE, type TaskQueueClient } from "@flowgraph/queue";
import {
  createLogger,
  QueueUnavailableError,
  withLogContext,
  type ExecutionEngine,
  type ExecutionResult,
  type TaskRecord,
  type Variables,
  type Workflow,
  type WorkflowSummary,
  type WritableWorkflowStore
} from "@flowgraph/shared";
import { syncRunCounter, syncRunDurationHistogram, taskCancelledCounter, taskSubmittedCounter } from "./metrics/metrics.js";

const logger = createLogger("workflow-service");

export type SubmitOutcome =
  | { mode: "queued"; taskId: string }
  | { mode: "inline"; taskId: null; result: ExecutionResult };

export interface WorkflowServiceOptions {
  /** Run inline when the queue rejects a submission. */
  inlineFallback: boolean;
  runTimeoutMs?: number;
}

export class WorkflowService {
  constructor(
    private readonly workflows: WritableWorkflowStore,
    private readonly engine: ExecutionEngine,
    private readonly tasks: TaskQueueClient,
    private readonly options: WorkflowServiceOptions
  ) {}

  async runWorkflow(workflowId: string, variables: Variables = {}, mode: "sync" | "inline" = "sync"): Promise<ExecutionResult> {
    const workflow = await this.workflows.load(workflowId);
    return withLogContext({ workflowId }, async () => {
      const result = await this.engine.run(workflow, variables, { timeoutMs: this.options.runTimeoutMs });
      syncRunCounter.inc({ status: result.status, mode });
      syncRunDurationHistogram.observe(result.durationMs / 1000);
      logger.info("workflow run finished", { status: result.status, durationMs: result.durationMs, mode });
      return result;
    });
  }

  /** Queues a run; the workflow is loaded first so an unknown id fails here and not in a worker. */
  async submitWorkflow(workflowId: string, variables: Variables = {}, metadata: Record<string, unknown> = {}): Promise<string> {
    const workflow = await this.workflows.load(workflowId);
    const taskId = await this.tasks.enqueue(
      WORKFLOW_TASK_TYPE,
      { workflowId, variables },
      { ...metadata, workflowName: workflow.name, workflowVersion: workflow.version }
    );
    taskSubmittedCounter.inc({ type: WORKFLOW_TASK_TYPE });
    return taskId;
  }

  async submitOrRunInline(
    workflowId: string,
    variables: Variables = {},
    metadata: Record<string, unknown> = {}
  ): Promise<SubmitOutcome> {
    try {
      return { mode: "queued", taskId: await this.submitWorkflow(workflowId, variables, metadata) };
    } catch (error) {
      if (!(error instanceof QueueUnavailableError) || !this.options.inlineFallback) {
        throw error;
      }
      logger.warn("queue unavailable; running workflow inline", { workflowId, error });
      return { mode: "inline", taskId: null, result: await this.runWorkflow(workflowId, variables, "inline") };
    }
  }

  async getTask(taskId: string): Promise<TaskRecord> {
    return this.tasks.getStatus(taskId);
  }

  async cancelTask(taskId: string): Promise<TaskRecord> {
    const task = await this.tasks.cancelOrThrow(taskId);
    taskCancelledCounter.inc();
    return task;
  }

  async queueStats(): Promise<Record<string, number>> {
    return this.tasks.queueStats();
  }

  async getWorkflow(workflowId: string): Promise<Workflow> {
    return this.workflows.load(workflowId);
  }

  async listWorkflows(): Promise<WorkflowSummary[]> {
    return this.workflows.list();
  }

  async searchWorkflows(keyword: string): Promise<WorkflowSummary[]> {
    return this.workflows.search(keyword);
  }

  async deleteWorkflow(workflowId: string): Promise<void> {
    await this.workflows.delete(workflowId);
    logger.info("workflow deleted", { workflowId });
  }

  async saveWorkflow(workflow: Workflow): Promise<Workflow> {
    await this.workflows.save(workflow);
    logger.info("workflow saved", { workflowId: workflow.id, version: workflow.version });
    return workflow;
  }
}
