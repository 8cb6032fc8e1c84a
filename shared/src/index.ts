export * from "./builtinTools.js";
export * from "./conditions.js";
export * from "./documents.js";
export * from "./engine.js";
export * from "./errors.js";
export * from "./graph.js";
export * from "./logger.js";
export * from "./stateMachine.js";
export * from "./tools.js";
export * from "./types.js";
export * from "./variables.js";
export * from "./workflowStore.js";
