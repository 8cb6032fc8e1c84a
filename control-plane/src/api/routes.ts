import { Router, type Request, type Response } from "express";
import {
  createLogger,
  GraphStructureError,
  parseWorkflowDefinition,
  parseWorkflowDocument,
  QueueUnavailableError,
  TaskNotCancellable,
  TaskNotFound,
  toErrorInfo,
  toWorkflowDocument,
  WorkflowError,
  WorkflowNotFound,
  type Variables,
  type Workflow
} from "@flowgraph/shared";
import type { WorkflowService } from "../orchestrator.js";

const logger = createLogger("api");

export class InvalidRequestError extends WorkflowError {
  constructor(message: string) {
    super("InvalidRequest", message, { retryable: false });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function statusFor(error: unknown): number {
  if (error instanceof WorkflowNotFound || error instanceof TaskNotFound) return 404;
  if (error instanceof GraphStructureError || error instanceof InvalidRequestError) return 400;
  if (error instanceof TaskNotCancellable) return 409;
  if (error instanceof QueueUnavailableError) return 503;
  return 500;
}

function sendError(response: Response, error: unknown): void {
  const status = statusFor(error);
  if (status === 500) {
    logger.error("request failed", { error });
  }
  response.status(status).json({
    error: toErrorInfo(error),
    ...(error instanceof GraphStructureError ? { details: error.issues } : {})
  });
}

function route(handler: (request: Request, response: Response) => Promise<void>) {
  return (request: Request, response: Response) => {
    handler(request, response).catch((error: unknown) => sendError(response, error));
  };
}

function mappingField(body: unknown, field: string): Record<string, unknown> {
  const value = isRecord(body) ? body[field] : undefined;
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new InvalidRequestError(`'${field}' must be a mapping.`);
  }
  return value;
}

/** A workflow document as JSON, or `{format, source}` carrying a serialized document. */
function parseWorkflowBody(body: unknown): Workflow {
  if (isRecord(body) && typeof body.source === "string") {
    const format = body.format === undefined ? "yaml" : body.format;
    if (format === "yaml" || format === "json") {
      return parseWorkflowDocument(body.source, format);
    }
    throw new InvalidRequestError("'format' must be yaml or json.");
  }
  return parseWorkflowDefinition(body);
}

export function createApiRouter(deps: { service: WorkflowService }): Router {
  const router = Router();
  const { service } = deps;

  router.post(
    "/workflows",
    route(async (request, response) => {
      const workflow = await service.saveWorkflow(parseWorkflowBody(request.body));
      response.status(201).json({ workflow: toWorkflowDocument(workflow) });
    })
  );

  router.get(
    "/workflows",
    route(async (_request, response) => {
      response.status(200).json({ workflows: await service.listWorkflows() });
    })
  );

  // Registered ahead of /workflows/:workflowId so "search" is not read as an id.
  router.get(
    "/workflows/search/:keyword",
    route(async (request, response) => {
      response.status(200).json({ workflows: await service.searchWorkflows(String(request.params.keyword ?? "")) });
    })
  );

  router.get(
    "/workflows/:workflowId",
    route(async (request, response) => {
      const workflow = await service.getWorkflow(String(request.params.workflowId ?? ""));
      response.status(200).json({ workflow: toWorkflowDocument(workflow) });
    })
  );

  router.delete(
    "/workflows/:workflowId",
    route(async (request, response) => {
      const workflowId = String(request.params.workflowId ?? "");
      await service.deleteWorkflow(workflowId);
      response.status(200).json({ deleted: workflowId });
    })
  );

  router.post(
    "/workflows/:workflowId/run",
    route(async (request, response) => {
      const variables: Variables = mappingField(request.body, "variables");
      const result = await service.runWorkflow(String(request.params.workflowId ?? ""), variables);
      response.status(200).json({ result });
    })
  );

  router.post(
    "/workflows/:workflowId/submit",
    route(async (request, response) => {
      const variables: Variables = mappingField(request.body, "variables");
      const metadata = mappingField(request.body, "metadata");
      const outcome = await service.submitOrRunInline(String(request.params.workflowId ?? ""), variables, metadata);
      if (outcome.mode === "inline") {
        response.status(200).json(outcome);
        return;
      }
      response.status(202).json({ taskId: outcome.taskId, status: "queued" });
    })
  );

  router.get(
    "/tasks/:taskId",
    route(async (request, response) => {
      response.status(200).json({ task: await service.getTask(String(request.params.taskId ?? "")) });
    })
  );

  router.post(
    "/tasks/:taskId/cancel",
    route(async (request, response) => {
      response.status(200).json({ task: await service.cancelTask(String(request.params.taskId ?? "")) });
    })
  );

  router.get(
    "/queue/stats",
    route(async (_request, response) => {
      response.status(200).json({ queues: await service.queueStats() });
    })
  );

  return router;
}
