export * from "./backoff.js";
export * from "./client.js";
export * from "./db.js";
export * from "./ports.js";
export * from "./postgresStore.js";
export * from "./redisQueue.js";
