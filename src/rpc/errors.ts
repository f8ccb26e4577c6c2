import type { JsonRpcFailure, JsonRpcId, JsonRpcResponse } from "./types.js";

/**
 * JSON-RPC error categories surfaced by the protocol core, with their code
 * and default message. Codes from -32001 downwards are application errors
 * raised while running tools.
 */
export const JSON_RPC_ERROR_TAXONOMY = {
  PARSE_ERROR: { code: -32700, message: "Parse error" },
  INVALID_REQUEST: { code: -32600, message: "Invalid Request" },
  METHOD_NOT_FOUND: { code: -32601, message: "Method not found" },
  INVALID_PARAMS: { code: -32602, message: "Invalid params" },
  INTERNAL: { code: -32603, message: "Internal error" },
  TOOL_EXECUTION_FAILED: { code: -32001, message: "Tool execution failed" },
  TOOL_NOT_FOUND: { code: -32002, message: "Tool not found" },
} as const;

export type JsonRpcErrorCategory = keyof typeof JSON_RPC_ERROR_TAXONOMY;

/** Structured diagnostics attached to error responses. Never includes stacks. */
export interface JsonRpcErrorData {
  category: JsonRpcErrorCategory;
  request_id?: string | null;
  hint?: string;
  issues?: unknown;
  tool?: string;
  status?: number;
}

export interface JsonRpcErrorOptions {
  requestId?: string | null;
  hint?: string;
  issues?: unknown;
  tool?: string;
  status?: number;
}

function createJsonRpcErrorData(category: JsonRpcErrorCategory, options: JsonRpcErrorOptions): JsonRpcErrorData {
  const data: JsonRpcErrorData = { category };
  if (options.requestId !== undefined) {
    data.request_id = options.requestId;
  }
  if (options.tool !== undefined) {
    data.tool = options.tool;
  }
  if (options.hint !== undefined) {
    data.hint = options.hint;
  }
  if (options.issues !== undefined) {
    data.issues = options.issues;
  }
  if (options.status !== undefined) {
    data.status = options.status;
  }
  return data;
}

/** Base class for typed JSON-RPC errors. Subclasses fix the category. */
export class JsonRpcError extends Error {
  readonly category: JsonRpcErrorCategory;
  readonly code: number;
  readonly data: JsonRpcErrorData;

  constructor(category: JsonRpcErrorCategory, message?: string, options: JsonRpcErrorOptions = {}) {
    const taxonomy = JSON_RPC_ERROR_TAXONOMY[category];
    super(message ?? taxonomy.message);
    this.name = new.target.name;
    this.category = category;
    this.code = taxonomy.code;
    this.data = createJsonRpcErrorData(category, options);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed envelope or unknown method: the request is never dispatched. */
export class ProtocolError extends JsonRpcError {
  constructor(category: "PARSE_ERROR" | "INVALID_REQUEST" | "METHOD_NOT_FOUND", message?: string, options: JsonRpcErrorOptions = {}) {
    super(category, message, options);
  }
}

/** Method parameters (or tool arguments) do not match what the method expects. */
export class InvalidParamsError extends JsonRpcError {
  constructor(message?: string, options: JsonRpcErrorOptions = {}) {
    super("INVALID_PARAMS", message, options);
  }
}

export class InternalError extends JsonRpcError {
  constructor(message?: string, options: JsonRpcErrorOptions = {}) {
    super("INTERNAL", message, options);
  }
}

/** Formats a {@link JsonRpcError} into a JSON-RPC error response. */
export function toJsonRpcError(id: JsonRpcId | null, error: JsonRpcError): JsonRpcFailure {
  return {
    jsonrpc: "2.0",
    id,
    error: {
      code: error.code,
      message: error.message,
      data: error.data,
    },
  };
}

/** Response sent by transports when a payload is not valid JSON. */
export function parseErrorResponse(hint?: string): JsonRpcFailure {
  return toJsonRpcError(null, new ProtocolError("PARSE_ERROR", undefined, hint ? { hint } : {}));
}

export interface EncodedResponse {
  /** The response actually encoded, which may be the replacement error. */
  readonly response: JsonRpcResponse;
  readonly text: string;
}

/**
 * Encodes a response for the wire. When the response cannot be encoded (a
 * cyclic result, for instance) an internal error with the same id is sent in
 * its place.
 */
export function encodeJsonRpcResponse(response: JsonRpcResponse): EncodedResponse {
  try {
    return { response, text: JSON.stringify(response) };
  } catch (error) {
    const hint = `response is not JSON-encodable: ${error instanceof Error ? error.message : String(error)}`;
    const replacement = toJsonRpcError(response.id, new InternalError(undefined, { hint }));
    return { response: replacement, text: JSON.stringify(replacement) };
  }
}
