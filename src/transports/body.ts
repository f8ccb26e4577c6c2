import { Buffer } from "node:buffer";
import type { IncomingMessage } from "node:http";

/** Default request body limit: 1 MiB. */
export const DEFAULT_MAX_BODY_BYTES = 1 << 20;

/** Body read failure annotated with the HTTP status to answer with. */
export class HttpBodyError extends Error {
  constructor(
    readonly status: 400 | 413,
    message: string,
  ) {
    super(message);
    this.name = "HttpBodyError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface JsonBody {
  readonly parsed: unknown;
  readonly raw: string;
  readonly bytes: number;
}

/**
 * Reads and parses a JSON request body, refusing payloads larger than
 * `maxBytes` (413) and undecodable JSON (400).
 */
export async function readJsonBody(req: IncomingMessage, maxBytes = DEFAULT_MAX_BODY_BYTES): Promise<JsonBody> {
  const buffers: Buffer[] = [];
  let totalBytes = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    totalBytes += buffer.length;
    if (totalBytes > maxBytes) {
      throw new HttpBodyError(413, "Payload Too Large");
    }
    buffers.push(buffer);
  }

  const raw = Buffer.concat(buffers).toString("utf8");
  try {
    return { parsed: JSON.parse(raw), raw, bytes: totalBytes };
  } catch (error) {
    throw new HttpBodyError(400, error instanceof Error ? error.message : "invalid JSON body");
  }
}
