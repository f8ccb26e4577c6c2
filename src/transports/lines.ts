import { once } from "node:events";
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

import type { StructuredLogger } from "../logger.js";
import { createRequestContext } from "../protocol/context.js";
import type { ProtocolCore } from "../protocol/core.js";
import type { ProtocolDependencies } from "../protocol/deps.js";
import { encodeJsonRpcResponse, parseErrorResponse } from "../rpc/errors.js";
import type { JsonRpcResponse } from "../rpc/types.js";

export interface LineTransportOptions {
  readonly input: Readable;
  readonly output: Writable;
  readonly core: ProtocolCore;
  readonly deps: ProtocolDependencies;
  readonly logger?: Pick<StructuredLogger, "info" | "warn">;
  readonly userId?: string;
  readonly sessionId?: string;
}

async function writeLine(output: Writable, response: JsonRpcResponse): Promise<void> {
  if (!output.write(`${encodeJsonRpcResponse(response).text}\n`)) {
    await once(output, "drain");
  }
}

/**
 * Line-delimited JSON-RPC loop: one JSON document per input line, one
 * response line per request, nothing for notifications. Each request is fully
 * handled and its response written before the next line is read. Resolves
 * when the input ends.
 */
export async function serveLines(options: LineTransportOptions): Promise<void> {
  const { input, output, core, deps, logger } = options;
  const context = createRequestContext("stdio", {
    userId: options.userId,
    ...(options.sessionId !== undefined ? { sessionId: options.sessionId } : {}),
  });
  const lines = createInterface({ input, crlfDelay: Infinity });
  logger?.info("line_transport_started");

  let lineNumber = 0;
  for await (const line of lines) {
    lineNumber += 1;
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }
    let request: unknown;
    try {
      request = JSON.parse(trimmed);
    } catch (error) {
      logger?.warn("line_transport_parse_error", {
        line: lineNumber,
        message: error instanceof Error ? error.message : String(error),
      });
      await writeLine(output, parseErrorResponse());
      continue;
    }
    const response = await core.handle(request, context, deps);
    if (response) {
      await writeLine(output, response);
    }
  }
  logger?.info("line_transport_closed", { lines: lineNumber });
}
