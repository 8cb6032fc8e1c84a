import client from "prom-client";

client.collectDefaultMetrics();

export const taskSubmittedCounter = new client.Counter({
  name: "task_submitted_total",
  help: "Number of workflow tasks submitted to the queue.",
  labelNames: ["type"] as const
});

export const taskCancelledCounter = new client.Counter({
  name: "task_cancelled_total",
  help: "Number of tasks cancelled before execution."
});

export const syncRunCounter = new client.Counter({
  name: "workflow_sync_run_total",
  help: "Number of synchronous workflow runs by final status.",
  labelNames: ["status", "mode"] as const
});

export const syncRunDurationHistogram = new client.Histogram({
  name: "workflow_sync_run_duration_seconds",
  help: "Synchronous workflow run duration in seconds.",
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 10, 30, 60, 300]
});

export const leaseRecoveredCounter = new client.Counter({
  name: "task_lease_recovered_total",
  help: "Number of running tasks re-queued after their lease expired."
});

export const queuePumpCounter = new client.Counter({
  name: "queue_delayed_pump_total",
  help: "Number of delayed tasks moved to active queue."
});

export const taskPurgedCounter = new client.Counter({
  name: "task_purged_total",
  help: "Number of expired task records deleted."
});

export async function metricsSnapshot(): Promise<string> {
  return client.register.metrics();
}

export function metricsContentType(): string {
  return client.register.contentType;
}
