import { AsyncLocalStorage } from "node:async_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  traceId?: string;
  taskId?: string;
  workflowId?: string;
  workerId?: string;
}

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

const levelOrder: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const contextStorage = new AsyncLocalStorage<LogContext>();

function parseLevel(value: string | undefined): LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error" ? value : "info";
}

export function getLogContext(): LogContext {
  return contextStorage.getStore() ?? {};
}

export function withLogContext<T>(context: LogContext, fn: () => T): T {
  return contextStorage.run({ ...getLogContext(), ...context }, fn);
}

function serializeField(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

export function createLogger(component: string, level: LogLevel = parseLevel(process.env.LOG_LEVEL)): Logger {
  const write = (entryLevel: LogLevel, message: string, fields: Record<string, unknown> = {}) => {
    if (levelOrder[entryLevel] < levelOrder[level]) return;
    const extra = Object.fromEntries(Object.entries(fields).map(([key, value]) => [key, serializeField(value)]));
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level: entryLevel,
      component,
      message,
      ...getLogContext(),
      ...extra
    });
    if (entryLevel === "warn" || entryLevel === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields)
  };
}
