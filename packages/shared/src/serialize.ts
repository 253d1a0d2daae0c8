import type { ExecutionEvent } from "./events.js";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** An event as it goes out in a request body. */
export type WireEvent = { [key: string]: JsonValue };

export const CIRCULAR_PLACEHOLDER = "[Circular]";

interface HasToJson {
  toJSON(): unknown;
}

function hasToJson(value: object): value is HasToJson {
  return "toJSON" in value && typeof value.toJSON === "function";
}

/** Values `JSON.stringify` would omit from an object. */
function isOmitted(value: unknown): boolean {
  return value === undefined || typeof value === "function" || typeof value === "symbol";
}

/**
 * Normalize an arbitrary agent payload into a JSON value.
 *
 * Follows `JSON.stringify` semantics where it has them (omitted keys,
 * `null` array holes, `toJSON()`), and maps what it would reject or
 * mangle: bigint becomes a decimal string, Map an object, Set an array,
 * Error `{ name, message }`, and a reference back into its own ancestry
 * (including a `toJSON()` that returns its own receiver) becomes
 * `"[Circular]"`.
 *
 * Throws whatever a `toJSON()` or getter on the payload throws.
 */
export function toJsonValue(value: unknown): JsonValue {
  return normalize(value, new Set<object>());
}

function normalize(value: unknown, ancestors: Set<object>): JsonValue {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      return Number.isFinite(value) ? value : null;
    case "bigint":
      return value.toString();
    case "function":
    case "symbol":
      return null;
  }

  if (typeof value !== "object") return null;
  if (ancestors.has(value)) return CIRCULAR_PLACEHOLDER;

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }

  ancestors.add(value);
  try {
    if (hasToJson(value)) {
      return normalize(value.toJSON(), ancestors);
    }
    if (Array.isArray(value)) {
      return value.map((item) => normalize(item, ancestors));
    }
    if (value instanceof Set) {
      return Array.from(value, (item) => normalize(item, ancestors));
    }
    if (value instanceof Map) {
      const out: { [key: string]: JsonValue } = {};
      for (const [key, item] of value) {
        if (isOmitted(item)) continue;
        out[String(key)] = normalize(item, ancestors);
      }
      return out;
    }
    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }

    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      if (isOmitted(item)) continue;
      out[key] = normalize(item, ancestors);
    }
    return out;
  } finally {
    ancestors.delete(value);
  }
}

/** Normalize each entry of a record, omitting the keys `JSON.stringify` would. */
export function toJsonObject(record: Record<string, unknown>): { [key: string]: JsonValue } {
  const out: { [key: string]: JsonValue } = {};
  for (const [key, item] of Object.entries(record)) {
    if (isOmitted(item)) continue;
    out[key] = toJsonValue(item);
  }
  return out;
}

/**
 * Wire representation of an execution event.
 *
 * Optional fields left `undefined` are dropped; payload fields
 * (`input`, `output`, `ground_truth`, …) go through {@link toJsonValue}
 * and can throw the same way.
 */
export function serializeEvent(event: ExecutionEvent): WireEvent {
  const out: WireEvent = {};
  for (const [key, item] of Object.entries(event)) {
    if (item === undefined) continue;
    out[key] = toJsonValue(item);
  }
  return out;
}
