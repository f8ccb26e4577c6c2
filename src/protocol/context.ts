import { z } from "zod";

/** Transport tags carried in request contexts. */
export type TransportTag = "stdio" | "http" | "sse" | "stream" | "sdk" | "direct";

/**
 * Per-request context handed to the protocol core. It is a lookup key into
 * the session store, never a holder of mutable state.
 */
export interface McpRequestContext {
  readonly userId: string;
  readonly transport: TransportTag;
  readonly sessionId?: string | null;
  /** Transport-level correlation id (e.g. `x-request-id`), distinct from the JSON-RPC id. */
  readonly requestId?: string;
}

export const DEFAULT_USER_ID = "default";

const UserIdSchema = z.string().trim().min(1).max(128);

/** Builds a frozen context, falling back to the default user for blank identifiers. */
export function createRequestContext(
  transport: TransportTag,
  overrides: { userId?: unknown; sessionId?: string | null; requestId?: string } = {},
): McpRequestContext {
  const userId = UserIdSchema.safeParse(overrides.userId);
  return Object.freeze({
    userId: userId.success ? userId.data : DEFAULT_USER_ID,
    transport,
    ...(overrides.sessionId !== undefined ? { sessionId: overrides.sessionId } : {}),
    ...(overrides.requestId !== undefined ? { requestId: overrides.requestId } : {}),
  });
}
