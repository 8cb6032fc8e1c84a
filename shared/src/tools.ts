import { ToolNotFound } from "./errors.js";
import { createLogger } from "./logger.js";

const logger = createLogger("tools");

export type ToolParams = Record<string, unknown>;

export interface Tool {
  readonly name: string;
  readonly description: string;
  invoke(params: ToolParams): unknown;
  invokeAsync(params: ToolParams): Promise<unknown>;
}

export abstract class BaseTool implements Tool {
  constructor(
    readonly name: string,
    readonly description: string
  ) {}

  abstract invoke(params: ToolParams): unknown;

  async invokeAsync(params: ToolParams): Promise<unknown> {
    return this.invoke(params);
  }
}

/** Shared across concurrent runs; registered tools must tolerate concurrent invocation. */
export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  register(tool: Tool): this {
    this.tools.set(tool.name, tool);
    logger.debug("tool registered", { tool: tool.name });
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  lookup(name: string): Tool {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolNotFound(name);
    }
    return tool;
  }

  list(): Tool[] {
    return [...this.tools.values()];
  }

  describe(): Record<string, string> {
    return Object.fromEntries(this.list().map((tool) => [tool.name, tool.description]));
  }

  invoke(name: string, params: ToolParams): unknown {
    return this.lookup(name).invoke(params);
  }

  async invokeAsync(name: string, params: ToolParams): Promise<unknown> {
    return this.lookup(name).invokeAsync(params);
  }
}
