import { appendFileSync, existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from "node:fs";
import { access, appendFile, mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { BaseTool, ToolRegistry, type ToolParams } from "./tools.js";

function requireString(params: ToolParams, key: string, tool: string): string {
  const value = params[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${tool}: '${key}' must be a non-empty string.`);
  }
  return value;
}

function optionalRecord(params: ToolParams, key: string, tool: string): Record<string, unknown> {
  const value = params[key];
  if (value === undefined || value === null) return {};
  if (typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${tool}: '${key}' must be a mapping.`);
  }
  return Object.fromEntries(Object.entries(value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class EchoTool extends BaseTool {
  constructor() {
    super("echo", "Returns the single parameter's value, or every parameter when several are given.");
  }

  invoke(params: ToolParams): unknown {
    const values = Object.values(params);
    return values.length === 1 ? values[0] : { ...params };
  }
}

export class ApiCallTool extends BaseTool {
  constructor() {
    super("api_call", "Calls an HTTP endpoint. Params: url, method, headers, params, json_data, timeout (seconds).");
  }

  invoke(): unknown {
    throw new Error("api_call supports async invocation only.");
  }

  async invokeAsync(params: ToolParams): Promise<unknown> {
    const url = new URL(requireString(params, "url", this.name));
    const method = typeof params.method === "string" ? params.method.toUpperCase() : "GET";
    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(optionalRecord(params, "headers", this.name))) {
      headers[key] = String(value);
    }
    for (const [key, value] of Object.entries(optionalRecord(params, "params", this.name))) {
      url.searchParams.append(key, String(value));
    }
    const timeoutSeconds = typeof params.timeout === "number" && params.timeout > 0 ? params.timeout : 30;

    let body: string | undefined;
    if (params.json_data !== undefined && params.json_data !== null) {
      body = JSON.stringify(params.json_data);
      headers["content-type"] = headers["content-type"] ?? "application/json";
    }

    const response = await fetch(url, {
      method,
      headers,
      body,
      signal: AbortSignal.timeout(timeoutSeconds * 1000)
    });
    const contentType = response.headers.get("content-type") ?? "";
    const data: unknown = contentType.startsWith("application/json") ? await response.json() : await response.text();
    return {
      status_code: response.status,
      headers: Object.fromEntries(response.headers.entries()),
      data
    };
  }
}

export class DataProcessingTool extends BaseTool {
  constructor() {
    super("data_processing", "Data helpers. Operations: parse_json, to_json, filter, transform, extract, count.");
  }

  invoke(params: ToolParams): unknown {
    const operation = requireString(params, "operation", this.name).toLowerCase();
    const data = params.data;

    switch (operation) {
      case "parse_json":
        return typeof data === "string" ? JSON.parse(data) : data;
      case "to_json":
        return JSON.stringify(data, null, 2);
      case "filter": {
        if (!Array.isArray(data)) {
          throw new Error("data_processing: filter needs a list.");
        }
        const key = params.key;
        if (typeof key !== "string") return data;
        return data.filter((item) => isRecord(item) && item[key] === params.value);
      }
      case "transform": {
        const type = typeof params.type === "string" ? params.type : "uppercase";
        if (typeof data !== "string") {
          throw new Error("data_processing: transform needs a string.");
        }
        if (type === "uppercase") return data.toUpperCase();
        if (type === "lowercase") return data.toLowerCase();
        throw new Error(`data_processing: unsupported transform '${type}'.`);
      }
      case "extract": {
        if (!isRecord(data)) {
          throw new Error("data_processing: extract needs a mapping.");
        }
        const keys = Array.isArray(params.keys) ? params.keys.filter((key): key is string => typeof key === "string") : [];
        return Object.fromEntries(keys.filter((key) => key in data).map((key) => [key, data[key]]));
      }
      case "count":
        if (Array.isArray(data) || typeof data === "string") return data.length;
        if (isRecord(data)) return Object.keys(data).length;
        throw new Error("data_processing: count needs a list, string or mapping.");
      default:
        throw new Error(`data_processing: unsupported operation '${operation}'.`);
    }
  }
}

export class FileOperationTool extends BaseTool {
  private readonly root: string;

  constructor(root: string) {
    super("file_operation", "Reads and writes files under the configured root. Operations: read, write, append, exists, list.");
    this.root = path.resolve(root);
  }

  private resolve(params: ToolParams): string {
    const relative = typeof params.path === "string" ? params.path : ".";
    const target = path.resolve(this.root, relative);
    if (target !== this.root && !target.startsWith(`${this.root}${path.sep}`)) {
      throw new Error(`file_operation: path '${relative}' escapes the file root.`);
    }
    return target;
  }

  private display(target: string): string {
    return path.relative(this.root, target) || ".";
  }

  invoke(params: ToolParams): unknown {
    const operation = requireString(params, "operation", this.name);
    const target = this.resolve(params);
    switch (operation) {
      case "read":
        return { path: this.display(target), content: readFileSync(target, "utf8") };
      case "write":
      case "append": {
        const content = String(params.content ?? "");
        mkdirSync(path.dirname(target), { recursive: true });
        if (operation === "write") writeFileSync(target, content, "utf8");
        else appendFileSync(target, content, "utf8");
        return { path: this.display(target), bytes: Buffer.byteLength(content) };
      }
      case "exists":
        return { path: this.display(target), exists: existsSync(target) };
      case "list":
        return { path: this.display(target), entries: readdirSync(target).sort() };
      default:
        throw new Error(`file_operation: unsupported operation '${operation}'.`);
    }
  }

  async invokeAsync(params: ToolParams): Promise<unknown> {
    const operation = requireString(params, "operation", this.name);
    const target = this.resolve(params);
    switch (operation) {
      case "read":
        return { path: this.display(target), content: await readFile(target, "utf8") };
      case "write":
      case "append": {
        const content = String(params.content ?? "");
        await mkdir(path.dirname(target), { recursive: true });
        if (operation === "write") await writeFile(target, content, "utf8");
        else await appendFile(target, content, "utf8");
        return { path: this.display(target), bytes: Buffer.byteLength(content) };
      }
      case "exists": {
        const exists = await access(target).then(
          () => true,
          () => false
        );
        return { path: this.display(target), exists };
      }
      case "list":
        return { path: this.display(target), entries: (await readdir(target)).sort() };
      default:
        throw new Error(`file_operation: unsupported operation '${operation}'.`);
    }
  }
}

export function createDefaultToolRegistry(options: { fileRoot: string }): ToolRegistry {
  return new ToolRegistry()
    .register(new EchoTool())
    .register(new ApiCallTool())
    .register(new DataProcessingTool())
    .register(new FileOperationTool(options.fileRoot));
}
