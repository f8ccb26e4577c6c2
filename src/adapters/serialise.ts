export type ResultContentType = "application/json" | "text/plain";

export interface SerialisedResult {
  readonly contentType: ResultContentType;
  readonly text: string;
}

/** `JSON.stringify` replacer writing bigints as decimal strings. */
function replaceBigInt(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

/**
 * Renders a tool result as text: objects and arrays become JSON, strings pass
 * through, other values use their JSON or string form. Throws a `TypeError`
 * when an object graph is cyclic.
 */
export function serialiseResult(value: unknown): SerialisedResult {
  if (value === undefined) {
    return { contentType: "text/plain", text: "" };
  }
  if (typeof value === "string") {
    return { contentType: "text/plain", text: value };
  }
  if (typeof value === "object" && value !== null) {
    return { contentType: "application/json", text: JSON.stringify(value, replaceBigInt) };
  }
  if (typeof value === "bigint" || typeof value === "symbol" || typeof value === "function") {
    return { contentType: "text/plain", text: String(value) };
  }
  return { contentType: "text/plain", text: JSON.stringify(value) };
}

/**
 * Copies a tool result into plain JSON data so every transport can encode it:
 * bigints become decimal strings, functions and symbols disappear the way
 * `JSON.stringify` drops them. Throws a `TypeError` for cyclic values.
 */
export function toJsonValue(value: unknown): unknown {
  const text: string | undefined = JSON.stringify(value, replaceBigInt);
  if (text === undefined) {
    return undefined;
  }
  const parsed: unknown = JSON.parse(text);
  return parsed;
}
