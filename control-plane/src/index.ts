import { PostgresTaskStore, RedisTaskQueue, TaskQueueClient, WORKFLOW_TASK_TYPE, queueNameFor } from "@flowgraph/queue";
import { createDefaultToolRegistry, createLogger, ExecutionEngine, FileWorkflowStore } from "@flowgraph/shared";
import { createApp } from "./app.js";
import { config } from "./config.js";
import { getPool } from "./db.js";
import { WorkflowService } from "./orchestrator.js";
import { RecoveryReaper } from "./recovery/reaper.js";

const logger = createLogger("control-plane");

async function main(): Promise<void> {
  const store = new PostgresTaskStore(getPool());
  const queue = new RedisTaskQueue(config.redisUrl);
  await queue.ensureQueues([queueNameFor(WORKFLOW_TASK_TYPE)]);

  const engine = new ExecutionEngine({
    tools: createDefaultToolRegistry({ fileRoot: config.toolFileRoot }),
    maxLoopIterations: config.maxLoopIterations,
    timeoutMs: config.workflowTimeoutMs
  });
  const tasks = new TaskQueueClient(store, queue, {
    maxRetries: config.taskMaxRetries,
    ttlMs: config.taskTtlMs,
    taskTypes: [WORKFLOW_TASK_TYPE]
  });
  const service = new WorkflowService(new FileWorkflowStore(config.workflowDir), engine, tasks, {
    inlineFallback: config.queueInlineFallback
  });

  const reaper = new RecoveryReaper(store, queue, { intervalMs: config.reaperIntervalMs, leaseMs: config.leaseMs });
  reaper.start();

  const app = createApp({ maxBodyBytes: config.maxBodyBytes, service });
  const server = app.listen(config.apiPort, () => {
    logger.info("control-plane listening", { port: config.apiPort });
  });

  const shutdown = async (): Promise<void> => {
    reaper.stop();
    await queue.close();
    await getPool().end();
    server.close(() => {
      process.exit(0);
    });
  };

  process.on("SIGINT", () => {
    shutdown().catch((error) => {
      logger.error("shutdown failed", { error });
      process.exit(1);
    });
  });
  process.on("SIGTERM", () => {
    shutdown().catch((error) => {
      logger.error("shutdown failed", { error });
      process.exit(1);
    });
  });
}

main().catch((error) => {
  logger.error("control-plane crashed", { error });
  process.exit(1);
});
