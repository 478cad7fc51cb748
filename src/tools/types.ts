/**
 * Tools (plugins) agents can call through the backend's function calling.
 */

import type { ToolSpec } from "../adapters/llm";

export type ToolArguments = Record<string, unknown>;

export interface Tool {
  readonly spec: ToolSpec;
  /** A terminal tool ends the calling agent's turn once it has run (control transfer). */
  readonly terminal?: boolean;
  /** Result text handed back to the model. May throw; the agent turns that into an "unavailable" result. */
  invoke(args: ToolArguments): Promise<string>;
}

/** Parse the model's JSON arguments; anything but an object is treated as no arguments. */
export function parseToolArguments(raw: string): ToolArguments {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw || "{}");
  } catch {
    return {};
  }
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) return {};
  return parsed as ToolArguments;
}

/** Trimmed string argument, or undefined when absent/blank/not a string. */
export function stringArg(args: ToolArguments, key: string): string | undefined {
  const v = args[key];
  if (typeof v !== "string") return undefined;
  const t = v.trim();
  return t.length > 0 ? t : undefined;
}
