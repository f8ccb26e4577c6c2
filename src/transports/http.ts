import { randomUUID } from "node:crypto";
import { type IncomingMessage, type Server, createServer } from "node:http";

import { z } from "zod";

import { runWithRequestContext } from "../infra/requestContext.js";
import type { StructuredLogger } from "../logger.js";
import { createRequestContext, type McpRequestContext } from "../protocol/context.js";
import type { ProtocolCore } from "../protocol/core.js";
import type { ProtocolDependencies } from "../protocol/deps.js";
import {
  InternalError,
  InvalidParamsError,
  ProtocolError,
  encodeJsonRpcResponse,
  parseErrorResponse,
  toJsonRpcError,
} from "../rpc/errors.js";
import { type JsonRpcResponse, isJsonRpcFailure } from "../rpc/types.js";
import { DEFAULT_MAX_BODY_BYTES, HttpBodyError, type JsonBody, readJsonBody } from "./body.js";
import { type HttpResponseLike, applySecurityHeaders, ensureRequestId, readHeader } from "./headers.js";
import { SseStream, escapeForSse, formatSseEvent } from "./sse.js";

const InvokeBodySchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).optional(),
  user_id: z.string().optional(),
  session_id: z.string().optional(),
});

type InvokeBody = z.infer<typeof InvokeBodySchema>;

const SSE_HEADERS: Record<string, string> = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
};

const ROUTE_METHODS: Record<string, string> = {
  "/health": "GET",
  "/tools": "GET",
  "/invoke": "POST",
  "/invoke/stream": "POST",
  "/mcp": "POST",
  "/sse": "GET",
  "/messages": "POST",
};

export interface HttpTransportOptions {
  readonly core: ProtocolCore;
  readonly deps: ProtocolDependencies;
  readonly logger?: Pick<StructuredLogger, "info" | "warn" | "error" | "debug">;
  readonly maxBodyBytes?: number;
  /** Generates SSE session identifiers; tests pin it for predictable endpoints. */
  readonly sessionIdFactory?: () => string;
}

interface SseSession {
  readonly id: string;
  readonly res: HttpResponseLike;
  readonly context: McpRequestContext;
}

/** HTTP status mirroring a JSON-RPC outcome on the one-shot endpoints. */
export function httpStatusForResponse(response: JsonRpcResponse): number {
  if (!isJsonRpcFailure(response)) {
    return 200;
  }
  switch (response.error.code) {
    case -32700:
    case -32600:
    case -32602:
      return 400;
    case -32601:
    case -32002:
      return 404;
    default:
      return 500;
  }
}

function writeJson(res: HttpResponseLike, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}

/**
 * Writes a JSON-RPC response. `status` maps the response actually sent, which
 * is an internal error when the original cannot be encoded.
 */
function writeResponse(res: HttpResponseLike, response: JsonRpcResponse, status: (sent: JsonRpcResponse) => number): void {
  const encoded = encodeJsonRpcResponse(response);
  res.statusCode = status(encoded.response);
  res.setHeader("Content-Type", "application/json");
  res.end(encoded.text);
}

/**
 * HTTP surface over the protocol core:
 *
 * - `GET /health`, `GET /tools`
 * - `POST /invoke` one-shot call, `POST /invoke/stream` SSE progress/result/error/done
 * - `POST /mcp` raw JSON-RPC
 * - `GET /sse` + `POST /messages?session_id=` MCP session over server-sent events
 *
 * Every tool call is funnelled through {@link ProtocolCore.handle}.
 */
export class HttpTransport {
  private readonly core: ProtocolCore;
  private readonly deps: ProtocolDependencies;
  private readonly logger?: HttpTransportOptions["logger"];
  private readonly maxBodyBytes: number;
  private readonly sessionIdFactory: () => string;
  private readonly sessions = new Map<string, SseSession>();

  constructor(options: HttpTransportOptions) {
    this.core = options.core;
    this.deps = options.deps;
    this.logger = options.logger;
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    this.sessionIdFactory = options.sessionIdFactory ?? randomUUID;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  async handle(req: IncomingMessage, res: HttpResponseLike): Promise<void> {
    const requestId = ensureRequestId(req, res);
    applySecurityHeaders(res);
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = (req.method ?? "GET").toUpperCase();

    await runWithRequestContext({ requestId, transport: "http" }, async () => {
      const allowed = ROUTE_METHODS[url.pathname];
      if (!allowed) {
        writeJson(res, 404, { error: "not_found", path: url.pathname });
        return;
      }
      if (allowed !== method) {
        res.setHeader("Allow", allowed);
        writeJson(res, 405, { error: "method_not_allowed", allow: allowed });
        return;
      }
      try {
        await this.route(url, req, res, requestId);
      } catch (error) {
        this.handleFailure(res, error);
      }
    });
  }

  /** Ends every open SSE session. */
  closeSessions(): void {
    for (const session of this.sessions.values()) {
      session.res.end();
    }
    this.sessions.clear();
  }

  private async route(url: URL, req: IncomingMessage, res: HttpResponseLike, requestId: string): Promise<void> {
    switch (url.pathname) {
      case "/health":
        writeJson(res, 200, {
          status: "ok",
          tools: this.deps.tools.listTools(this.contextFor(req, "http", requestId)).length,
          sessions: this.sessions.size,
        });
        return;
      case "/tools":
        writeJson(res, 200, { tools: this.deps.tools.listTools(this.contextFor(req, "http", requestId)) });
        return;
      case "/invoke":
        await this.handleInvoke(req, res, requestId);
        return;
      case "/invoke/stream":
        await this.handleStreamingInvoke(req, res, requestId);
        return;
      case "/mcp":
        await this.handleJsonRpc(req, res, requestId);
        return;
      case "/sse":
        this.openSession(req, res, requestId);
        return;
      case "/messages":
        await this.handleSessionMessage(url, req, res);
        return;
    }
  }

  private contextFor(
    req: IncomingMessage,
    transport: McpRequestContext["transport"],
    requestId: string,
    body?: Pick<InvokeBody, "user_id" | "session_id">,
  ): McpRequestContext {
    const sessionId = body?.session_id ?? readHeader(req, "mcp-session-id");
    return createRequestContext(transport, {
      userId: body?.user_id ?? readHeader(req, "x-user-id"),
      requestId,
      ...(sessionId !== undefined ? { sessionId } : {}),
    });
  }

  private async readBody(req: IncomingMessage, res: HttpResponseLike): Promise<JsonBody | null> {
    try {
      return await readJsonBody(req, this.maxBodyBytes);
    } catch (error) {
      if (error instanceof HttpBodyError) {
        this.logger?.warn("http_body_rejected", { status: error.status, message: error.message });
        const response =
          error.status === 413
            ? toJsonRpcError(null, new ProtocolError("INVALID_REQUEST", "Payload Too Large", { status: 413 }))
            : parseErrorResponse(error.message);
        writeJson(res, error.status, response);
        return null;
      }
      throw error;
    }
  }

  private async readInvokeBody(req: IncomingMessage, res: HttpResponseLike): Promise<InvokeBody | null> {
    const body = await this.readBody(req, res);
    if (!body) {
      return null;
    }
    const parsed = InvokeBodySchema.safeParse(body.parsed);
    if (!parsed.success) {
      writeJson(
        res,
        400,
        toJsonRpcError(
          null,
          new InvalidParamsError("invoke expects { name, arguments?, user_id?, session_id? }", {
            issues: parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
          }),
        ),
      );
      return null;
    }
    return parsed.data;
  }

  private toolCallRequest(requestId: string, body: InvokeBody): Record<string, unknown> {
    return {
      jsonrpc: "2.0",
      id: requestId,
      method: "tools/call",
      params: { name: body.name, arguments: body.arguments ?? {} },
    };
  }

  private async handleInvoke(req: IncomingMessage, res: HttpResponseLike, requestId: string): Promise<void> {
    const body = await this.readInvokeBody(req, res);
    if (!body) {
      return;
    }
    const context = this.contextFor(req, "http", requestId, body);
    const response = await this.core.handle(this.toolCallRequest(requestId, body), context, this.deps);
    if (!response) {
      res.statusCode = 204;
      res.end();
      return;
    }
    writeResponse(res, response, httpStatusForResponse);
  }

  private async handleStreamingInvoke(req: IncomingMessage, res: HttpResponseLike, requestId: string): Promise<void> {
    const body = await this.readInvokeBody(req, res);
    if (!body) {
      return;
    }
    const context = this.contextFor(req, "stream", requestId, body);
    res.writeHead(200, SSE_HEADERS);
    const stream = new SseStream(res);
    res.on("close", () => stream.detach());

    const response = await this.core.handle(this.toolCallRequest(requestId, body), context, this.deps, {
      onProgress: (update) => {
        if (stream.currentState !== "open") {
          this.logger?.debug("stream_progress_dropped", { tool: body.name, reason: "stream_terminated" });
          return;
        }
        try {
          stream.progress(update);
        } catch (error) {
          this.logger?.warn("stream_progress_dropped", {
            tool: body.name,
            reason: error instanceof Error ? error.message : String(error),
          });
        }
      },
    });
    const sent = response ? encodeJsonRpcResponse(response).response : null;
    if (sent && isJsonRpcFailure(sent)) {
      stream.error(sent.error);
    } else {
      stream.result(sent ? sent.result : null);
    }
    stream.done();
  }

  private async handleJsonRpc(req: IncomingMessage, res: HttpResponseLike, requestId: string): Promise<void> {
    const body = await this.readBody(req, res);
    if (!body) {
      return;
    }
    const response = await this.core.handle(body.parsed, this.contextFor(req, "http", requestId), this.deps);
    if (!response) {
      res.statusCode = 202;
      res.end();
      return;
    }
    writeResponse(res, response, () => 200);
  }

  private openSession(req: IncomingMessage, res: HttpResponseLike, requestId: string): void {
    const id = this.sessionIdFactory();
    const context = createRequestContext("sse", {
      userId: readHeader(req, "x-user-id"),
      sessionId: id,
      requestId,
    });
    res.writeHead(200, SSE_HEADERS);
    this.sessions.set(id, { id, res, context });
    res.on("close", () => {
      if (this.sessions.delete(id)) {
        this.logger?.info("sse_session_closed", { session_id: id });
      }
    });
    res.write(formatSseEvent("endpoint", `/messages?session_id=${encodeURIComponent(id)}`));
    this.logger?.info("sse_session_opened", { session_id: id });
  }

  private async handleSessionMessage(url: URL, req: IncomingMessage, res: HttpResponseLike): Promise<void> {
    const sessionId = url.searchParams.get("session_id") ?? "";
    const session = this.sessions.get(sessionId);
    if (!session) {
      writeJson(
        res,
        404,
        toJsonRpcError(null, new ProtocolError("INVALID_REQUEST", "Unknown session", { status: 404 })),
      );
      return;
    }
    const body = await this.readBody(req, res);
    if (!body) {
      return;
    }
    res.statusCode = 202;
    res.end("Accepted");
    const response = await this.core.handle(body.parsed, session.context, this.deps);
    if (response && this.sessions.has(session.id)) {
      session.res.write(formatSseEvent("message", escapeForSse(encodeJsonRpcResponse(response).text)));
    }
  }

  private handleFailure(res: HttpResponseLike, error: unknown): void {
    this.logger?.error("http_request_failed", {
      message: error instanceof Error ? error.message : String(error),
    });
    if (!res.headersSent) {
      writeJson(res, 500, toJsonRpcError(null, new InternalError(undefined, { status: 500 })));
      return;
    }
    res.end();
  }
}

export interface HttpServerHandle {
  readonly server: Server;
  readonly url: string;
  close(): Promise<void>;
}

/** Binds the transport to a Node HTTP server. */
export async function startHttpServer(
  transport: HttpTransport,
  options: { host: string; port: number; logger?: Pick<StructuredLogger, "info" | "error"> },
): Promise<HttpServerHandle> {
  const server = createServer((req, res) => {
    void transport.handle(req, res).catch((error: unknown) => {
      options.logger?.error("http_handler_crashed", {
        message: error instanceof Error ? error.message : String(error),
      });
      if (!res.headersSent) {
        res.statusCode = 500;
      }
      res.end();
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, options.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === "object" && address ? address.port : options.port;
  const url = `http://${options.host}:${port}`;
  options.logger?.info("http_listening", { url });

  return {
    server,
    url,
    close: async () => {
      transport.closeSessions();
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    },
  };
}
