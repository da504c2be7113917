// src/common/argumentUtils.ts

import { InvalidToolArgumentsError, describeError } from "./errors";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Normalizes the arguments a model attached to a tool call. Providers send
 * either a JSON string or an already decoded object; blank means `{}`.
 */
export function decodeToolArguments(toolName: string, raw: unknown): Record<string, unknown> {
  if (raw === undefined || raw === null) {
    return {};
  }

  let value = raw;
  if (typeof raw === "string") {
    if (!raw.trim()) {
      return {};
    }
    try {
      value = JSON.parse(raw);
    } catch (error) {
      throw new InvalidToolArgumentsError(toolName, describeError(error));
    }
  }

  if (!isRecord(value)) {
    throw new InvalidToolArgumentsError(toolName, "expected a JSON object");
  }
  return value;
}

/**
 * Compact single-line rendering used in tool execution logs: `{'a': 1, 'b': 'x'}`.
 * Booleans and null keep their JSON spelling.
 */
export function formatArguments(value: unknown): string {
  if (typeof value === "string") {
    return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
  }
  if (Array.isArray(value)) {
    return `[${value.map(formatArguments).join(", ")}]`;
  }
  if (isRecord(value)) {
    const entries = Object.entries(value).map(([key, item]) => `${formatArguments(key)}: ${formatArguments(item)}`);
    return `{${entries.join(", ")}}`;
  }
  if (value === undefined || value === null) {
    return "null";
  }
  return String(value);
}
