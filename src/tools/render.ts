import { toolError } from "../errors.js";
import { isRecord, type ToolPayload } from "../mcp/invoker.js";
import type { ToolFailure } from "../types.js";
import { failure } from "./registry.js";

/**
 * Rendering helpers shared by the tool adapters.
 *
 * Payloads come from remote servers, so every accessor tolerates missing or
 * mistyped fields and falls back to a placeholder.
 */

export const TRUNCATION_MARKER = "...";

/** Cut `text` to `max` characters, appending `marker` when something was cut. */
export function truncate(text: string, max: number, marker: string = TRUNCATION_MARKER): string {
  if (text.length <= max) return text;
  return text.slice(0, max) + marker;
}

export function field(payload: ToolPayload, key: string, fallback: string): string {
  const value = payload[key];
  if (typeof value === "string" && value.length > 0) return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return fallback;
}

export function optionalField(payload: ToolPayload, key: string): string | undefined {
  const value = payload[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function numberField(payload: ToolPayload, key: string, fallback = 0): number {
  const value = payload[key];
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

export function stringList(payload: ToolPayload, key: string): string[] {
  const value = payload[key];
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string");
}

export function records(payload: ToolPayload, key: string): ToolPayload[] {
  const value = payload[key];
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord);
}

export function record(payload: ToolPayload, key: string): ToolPayload | undefined {
  const value = payload[key];
  return isRecord(value) ? value : undefined;
}

export function succeeded(payload: ToolPayload): boolean {
  return payload.success === true;
}

/** The server answered without error but did not confirm the operation */
export function unconfirmed(operation: string): ToolFailure {
  return failure(operation, toolError("remote", "the server did not confirm the operation"));
}

export function argString(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

export function argNumber(args: Record<string, unknown>, key: string, fallback: number): number {
  const value = args[key];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return fallback;
}
