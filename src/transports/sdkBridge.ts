import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { JSONRPCMessageSchema } from "@modelcontextprotocol/sdk/types.js";

import type { StructuredLogger } from "../logger.js";
import { createRequestContext } from "../protocol/context.js";
import type { ProtocolCore } from "../protocol/core.js";
import type { ProtocolDependencies } from "../protocol/deps.js";
import { encodeJsonRpcResponse } from "../rpc/errors.js";

export interface SdkBridgeOptions {
  readonly core: ProtocolCore;
  readonly deps: ProtocolDependencies;
  readonly logger?: Pick<StructuredLogger, "info" | "warn" | "error">;
  readonly userId?: string;
}

/**
 * Serves the protocol core over any SDK {@link Transport} (stdio, in-memory
 * pairs, streamable HTTP). Responses are checked against the SDK message
 * schema before sending; an error carrying a `null` id cannot be represented
 * there and is only logged.
 */
export async function attachProtocolCore(transport: Transport, options: SdkBridgeOptions): Promise<void> {
  const { core, deps, logger } = options;

  const handleMessage = async (message: unknown): Promise<void> => {
    const context = createRequestContext("sdk", {
      userId: options.userId,
      ...(transport.sessionId !== undefined ? { sessionId: transport.sessionId } : {}),
    });
    const handled = await core.handle(message, context, deps);
    if (!handled) {
      return;
    }
    const { response } = encodeJsonRpcResponse(handled);
    const parsed = JSONRPCMessageSchema.safeParse(response);
    if (!parsed.success) {
      logger?.warn("sdk_response_dropped", { id: response.id, reason: "not representable as an SDK message" });
      return;
    }
    await transport.send(parsed.data);
  };

  transport.onmessage = (message) => {
    void handleMessage(message).catch((error: unknown) => {
      logger?.error("sdk_message_failed", {
        message: error instanceof Error ? error.message : String(error),
      });
      transport.onerror?.(error instanceof Error ? error : new Error(String(error)));
    });
  };
  transport.onclose = () => {
    logger?.info("sdk_transport_closed");
  };

  await transport.start();
  logger?.info("sdk_transport_started");
}
