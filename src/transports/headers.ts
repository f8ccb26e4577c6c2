import { randomUUID } from "node:crypto";
import type { IncomingMessage } from "node:http";

/** Response surface used by the HTTP transport; satisfied by `ServerResponse`. */
export interface HttpResponseLike {
  statusCode: number;
  readonly headersSent: boolean;
  setHeader(name: string, value: number | string | readonly string[]): unknown;
  writeHead(status: number, headers?: Record<string, string>): unknown;
  write(chunk: string): boolean;
  end(chunk?: string): unknown;
  on(event: "close", listener: () => void): unknown;
}

/** Security headers applied to every response. */
export function applySecurityHeaders(res: HttpResponseLike): void {
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("Referrer-Policy", "no-referrer");
}

/**
 * Keeps the `x-request-id` supplied by a proxy, or mints a UUID, and echoes
 * it on the response.
 */
export function ensureRequestId(req: IncomingMessage, res: HttpResponseLike): string {
  const incoming = req.headers["x-request-id"];
  const requestId = typeof incoming === "string" && incoming.trim() ? incoming.trim() : randomUUID();
  res.setHeader("x-request-id", requestId);
  return requestId;
}

/** Reads a single-valued header, ignoring blanks and repeated values. */
export function readHeader(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name.toLowerCase()];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}
