import { randomUUID } from "node:crypto";
import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import { describeError, withLogContext } from "@flowgraph/shared";
import { createApiRouter } from "./api/routes.js";
import { metricsContentType, metricsSnapshot } from "./metrics/metrics.js";
import type { WorkflowService } from "./orchestrator.js";

export const TRACE_HEADER = "x-trace-id";

function httpStatusOf(error: unknown): number {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return 500;
}

export function createApp(deps: { maxBodyBytes: number; service: WorkflowService }) {
  const app = express();
  app.use(cors({ exposedHeaders: [TRACE_HEADER] }));
  app.use(express.json({ limit: deps.maxBodyBytes }));
  app.use((request, response, next) => {
    const traceId = request.header(TRACE_HEADER) || randomUUID();
    response.setHeader(TRACE_HEADER, traceId);
    withLogContext({ traceId }, () => next());
  });
  app.get("/api/health", (_request, response) => {
    response.status(200).json({ ok: true });
  });
  app.get("/api/metrics", async (_request, response) => {
    response.setHeader("Content-Type", metricsContentType());
    response.send(await metricsSnapshot());
  });
  app.use("/api", createApiRouter({ service: deps.service }));
  // Body parser failures (malformed JSON, oversized payloads) arrive here.
  app.use((error: unknown, _request: Request, response: Response, _next: NextFunction) => {
    response.status(httpStatusOf(error)).json({
      error: { kind: "InvalidRequest", message: describeError(error), nodeId: null }
    });
  });
  return app;
}
