import { z } from "zod";

export type JsonRpcId = string | number;

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccess {
  jsonrpc: "2.0";
  id: JsonRpcId | null;
  result: unknown;
}

export interface JsonRpcFailure {
  jsonrpc: "2.0";
  id: JsonRpcId | null;
  error: JsonRpcErrorObject;
}

/** A response carries exactly one of `result` or `error`. */
export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

export const JsonRpcIdSchema = z.union([z.string(), z.number().finite()]);

/**
 * Envelope accepted by the protocol core. A missing `id` marks a
 * notification; `params` may be an object or a positional array.
 */
export const JsonRpcEnvelopeSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: JsonRpcIdSchema.optional(),
  method: z.string().min(1),
  params: z.union([z.record(z.unknown()), z.array(z.unknown())]).optional(),
});

export type JsonRpcEnvelope = z.infer<typeof JsonRpcEnvelopeSchema>;

export function isJsonRpcFailure(response: JsonRpcResponse): response is JsonRpcFailure {
  return "error" in response;
}
