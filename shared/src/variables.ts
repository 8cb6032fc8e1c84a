import { VariableResolutionError } from "./errors.js";
import type { Variables } from "./types.js";

const placeholderPattern = /\$\{([^}]+)\}/g;
const wholePlaceholderPattern = /^\$\{([^}]+)\}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function lookupVariable(path: string, scope: Variables): unknown {
  const segments = path.trim().split(".");
  let current: unknown = scope;
  for (const segment of segments) {
    if (segment.length === 0) {
      throw new VariableResolutionError(path.trim());
    }
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      const index = Number.parseInt(segment, 10);
      if (index >= current.length) {
        throw new VariableResolutionError(path.trim());
      }
      current = current[index];
      continue;
    }
    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      throw new VariableResolutionError(path.trim());
    }
    current = current[segment];
  }
  if (current === undefined) {
    throw new VariableResolutionError(path.trim());
  }
  return current;
}

export function renderValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === null) return "null";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

export function resolveString(template: string, scope: Variables): unknown {
  const whole = wholePlaceholderPattern.exec(template);
  if (whole) {
    return lookupVariable(whole[1], scope);
  }
  return template.replace(placeholderPattern, (_match, path: string) => renderValue(lookupVariable(path, scope)));
}

/**
 * Replaces every `${path}` placeholder inside a value. A string that is exactly one
 * placeholder becomes the raw looked-up value; mixed strings get the rendered text.
 * Mappings and sequences are rebuilt with the same shape.
 */
export function resolveVariables(value: unknown, scope: Variables): unknown {
  if (typeof value === "string") {
    return resolveString(value, scope);
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveVariables(item, scope));
  }
  if (isRecord(value)) {
    const resolved: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      resolved[key] = resolveVariables(item, scope);
    }
    return resolved;
  }
  return value;
}

export function resolveParams(params: Record<string, unknown>, scope: Variables): Record<string, unknown> {
  const resolved: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(params)) {
    resolved[key] = resolveVariables(item, scope);
  }
  return resolved;
}
