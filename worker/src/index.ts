import { PostgresTaskStore, RedisTaskQueue, WORKFLOW_TASK_TYPE } from "@flowgraph/queue";
import { createDefaultToolRegistry, createLogger, ExecutionEngine, FileWorkflowStore } from "@flowgraph/shared";
import { config } from "./config.js";
import { getPool } from "./db.js";
import { createWorkflowTaskHandler } from "./executor.js";
import { startMetricsServer } from "./metrics.js";
import { TaskWorker } from "./taskWorker.js";

const logger = createLogger("worker");

async function main(): Promise<void> {
  const store = new PostgresTaskStore(getPool());
  const queue = new RedisTaskQueue(config.redisUrl);
  const engine = new ExecutionEngine({
    tools: createDefaultToolRegistry({ fileRoot: config.toolFileRoot }),
    maxLoopIterations: config.maxLoopIterations,
    timeoutMs: config.workflowTimeoutMs
  });
  const handler = createWorkflowTaskHandler({
    workflows: new FileWorkflowStore(config.workflowDir),
    engine
  });

  const worker = new TaskWorker(store, queue, { [WORKFLOW_TASK_TYPE]: handler }, {
    workerId: config.workerId,
    leaseMs: config.leaseMs,
    heartbeatMs: config.heartbeatMs,
    maxBatch: config.maxBatch,
    blockMs: config.blockMs
  });
  const metricsServer = startMetricsServer(config.metricsPort);

  const shutdown = async () => {
    worker.stop();
    await queue.close();
    await getPool().end();
    metricsServer.close();
    process.exit(0);
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

  await worker.start();
}

main().catch((error) => {
  logger.error("worker crashed", { error });
  process.exit(1);
});
