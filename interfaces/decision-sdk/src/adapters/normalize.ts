import { InvalidEventError } from "../errors";
import { ZodError } from "zod";
import { generateId, randomIdentity, type IdentitySource } from "../identity/sources";
import { isJsonObject } from "../model/factories";
import type { JsonObject } from "../model/types";
import { parseNormalizedEvent, type NormalizedEvent } from "../accumulator/events";

// Field spellings seen across agent frameworks, in lookup order.
const ID_KEYS = ["id", "tool_call_id", "toolCallId", "call_id", "callId"];
const NAME_KEYS = ["tool_name", "toolName", "name"];
const ARGS_KEYS = ["args", "arguments", "input", "tool_input", "toolInput"];
const OUTPUT_KEYS = ["output", "result", "tool_output", "toolOutput"];

function pick(source: JsonObject, keys: string[]): unknown {
  for (const key of keys) {
    if (source[key] !== undefined && source[key] !== null) {
      return source[key];
    }
  }
  return undefined;
}

function parseJson(value: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(value) };
  } catch {
    return { ok: false };
  }
}

function toObject(raw: unknown): JsonObject {
  if (typeof raw === "string") {
    const parsed = parseJson(raw);
    if (parsed.ok && isJsonObject(parsed.value)) {
      return parsed.value;
    }
    throw new InvalidEventError("Tool call string is not a JSON object");
  }
  if (isJsonObject(raw)) {
    return raw;
  }
  throw new InvalidEventError("Tool call must be an object or a JSON string");
}

export function normalizeArgs(value: unknown): JsonObject {
  if (value === undefined || value === null) {
    return {};
  }
  if (typeof value === "string") {
    const parsed = parseJson(value);
    if (parsed.ok && isJsonObject(parsed.value)) {
      return parsed.value;
    }
    return { raw: value };
  }
  if (isJsonObject(value)) {
    return value;
  }
  return { value };
}

export function normalizeOutput(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }
  const parsed = parseJson(value);
  return parsed.ok ? parsed.value : value;
}

/**
 * Shared helper for framework adapters: turns a loosely shaped tool call
 * (plain object, nested `function` block, or JSON text) into a NormalizedEvent.
 */
export function normalizeToolCall(raw: unknown, identity: IdentitySource = randomIdentity): NormalizedEvent {
  const source = toObject(raw);
  const fn = isJsonObject(source.function) ? source.function : {};

  const toolName = pick(source, NAME_KEYS) ?? pick(fn, ["name"]) ?? "unknown";
  const id = pick(source, ID_KEYS);
  const error = pick(source, ["error"]);

  const candidate = {
    kind: pick(source, ["kind"]),
    id: (typeof id === "string" && id.length > 0) || typeof id === "number" ? String(id) : generateId(identity),
    toolName: String(toolName),
    args: normalizeArgs(pick(source, ARGS_KEYS) ?? pick(fn, ["arguments"])),
    output: normalizeOutput(pick(source, OUTPUT_KEYS)),
    error: error === undefined ? null : String(error),
    timestamp: pick(source, ["timestamp"])
  };

  try {
    return parseNormalizedEvent(candidate);
  } catch (error) {
    if (error instanceof ZodError) {
      const issue = error.issues[0];
      const field = issue && issue.path.length ? issue.path.join(".") : "event";
      throw new InvalidEventError(`Tool call ${field} is invalid: ${issue?.message ?? error.message}`);
    }
    throw error;
  }
}
