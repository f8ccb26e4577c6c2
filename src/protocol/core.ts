import { z } from "zod";

import { ExecutionError, InvalidArgumentsError, NotFoundError, ResultEncodingError } from "../catalog/errors.js";
import { runWithRequestContext } from "../infra/requestContext.js";
import type { StructuredLogger } from "../logger.js";
import {
  InternalError,
  InvalidParamsError,
  JsonRpcError,
  ProtocolError,
  toJsonRpcError,
} from "../rpc/errors.js";
import {
  type JsonRpcEnvelope,
  JsonRpcEnvelopeSchema,
  type JsonRpcId,
  JsonRpcIdSchema,
  type JsonRpcResponse,
  isJsonRpcFailure,
} from "../rpc/types.js";
import type { McpRequestContext } from "./context.js";
import type { InvocationHooks, ProtocolDependencies } from "./deps.js";

const InitializeParamsSchema = z
  .object({
    protocolVersion: z.string().optional(),
  })
  .passthrough();

const ToolCallParamsSchema = z
  .object({
    name: z.string().min(1),
    arguments: z.record(z.unknown()).optional(),
  })
  .passthrough();

export interface ProtocolCoreOptions {
  readonly logger?: Pick<StructuredLogger, "info" | "warn" | "error" | "debug">;
  readonly clock?: () => number;
}

type EnvelopeCheck =
  | { readonly ok: true; readonly envelope: JsonRpcEnvelope }
  | { readonly ok: false; readonly response: JsonRpcResponse };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
}

/**
 * Stateless JSON-RPC router shared by every transport. Each request goes
 * through envelope validation, dispatch and completion; every failure becomes
 * a JSON-RPC error carrying the request id, and notifications never yield a
 * response.
 */
export class ProtocolCore {
  private readonly logger?: ProtocolCoreOptions["logger"];
  private readonly clock: () => number;

  constructor(options: ProtocolCoreOptions = {}) {
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
  }

  async handle(
    request: unknown,
    context: McpRequestContext,
    deps: ProtocolDependencies,
    hooks: InvocationHooks = {},
  ): Promise<JsonRpcResponse | null> {
    const check = this.checkEnvelope(request, context);
    if (!check.ok) {
      return check.response;
    }
    const { envelope } = check;
    const correlation = {
      requestId: envelope.id ?? null,
      method: envelope.method,
      transport: context.transport,
      userId: context.userId,
      ...(context.sessionId !== undefined ? { sessionId: context.sessionId } : {}),
    };

    const id = envelope.id;
    if (id === undefined) {
      runWithRequestContext(correlation, () => this.handleNotification(envelope));
      return null;
    }

    return runWithRequestContext(correlation, async () => {
      const started = this.clock();
      let response: JsonRpcResponse;
      try {
        const result = await this.dispatch(envelope, context, deps, hooks);
        response = { jsonrpc: "2.0", id, result };
      } catch (error) {
        response = toJsonRpcError(id, this.normaliseError(error, context));
      }
      this.logger?.info("jsonrpc_completed", {
        duration_ms: Math.max(0, this.clock() - started),
        ...(isJsonRpcFailure(response) ? { error_code: response.error.code } : {}),
      });
      return response;
    });
  }

  private checkEnvelope(request: unknown, context: McpRequestContext): EnvelopeCheck {
    if (!isRecord(request)) {
      this.logger?.warn("jsonrpc_invalid_envelope", { reason: Array.isArray(request) ? "batch" : "not_object" });
      const hint = Array.isArray(request) ? "batch requests are not supported" : "request must be a JSON object";
      return { ok: false, response: this.invalidRequest(null, hint, context) };
    }
    const idCheck = JsonRpcIdSchema.safeParse(request.id);
    const echoedId: JsonRpcId | null = idCheck.success ? idCheck.data : null;
    if ("id" in request && !idCheck.success) {
      this.logger?.warn("jsonrpc_invalid_envelope", { reason: "id_type" });
      return { ok: false, response: this.invalidRequest(null, "id must be a string or a number", context) };
    }
    const parsed = JsonRpcEnvelopeSchema.safeParse(request);
    if (!parsed.success) {
      this.logger?.warn("jsonrpc_invalid_envelope", { reason: "shape", issues: formatIssues(parsed.error) });
      return {
        ok: false,
        response: toJsonRpcError(
          echoedId,
          new ProtocolError("INVALID_REQUEST", undefined, {
            issues: formatIssues(parsed.error),
            ...(context.requestId !== undefined ? { requestId: context.requestId } : {}),
          }),
        ),
      };
    }
    return { ok: true, envelope: parsed.data };
  }

  private invalidRequest(id: JsonRpcId | null, hint: string, context: McpRequestContext): JsonRpcResponse {
    return toJsonRpcError(
      id,
      new ProtocolError("INVALID_REQUEST", undefined, {
        hint,
        ...(context.requestId !== undefined ? { requestId: context.requestId } : {}),
      }),
    );
  }

  private async dispatch(
    envelope: JsonRpcEnvelope,
    context: McpRequestContext,
    deps: ProtocolDependencies,
    hooks: InvocationHooks,
  ): Promise<unknown> {
    switch (envelope.method) {
      case "initialize": {
        const params = InitializeParamsSchema.safeParse(envelope.params ?? {});
        if (!params.success) {
          throw new InvalidParamsError(undefined, { issues: formatIssues(params.error) });
        }
        return deps.capabilities.describe(params.data, context);
      }
      case "ping":
        return {};
      case "tools/list":
        return { tools: deps.tools.listTools(context) };
      case "tools/call": {
        const params = ToolCallParamsSchema.safeParse(envelope.params);
        if (!params.success) {
          throw new InvalidParamsError("tools/call expects { name, arguments? }", {
            issues: formatIssues(params.error),
          });
        }
        return deps.invoker.callTool(params.data.name, params.data.arguments ?? {}, context, hooks);
      }
      default:
        throw new ProtocolError("METHOD_NOT_FOUND", `Method not found: ${envelope.method}`);
    }
  }

  private handleNotification(envelope: JsonRpcEnvelope): void {
    if (envelope.method === "notifications/initialized") {
      this.logger?.info("client_initialized");
      return;
    }
    if (envelope.method.startsWith("notifications/")) {
      this.logger?.debug("notification_received");
      return;
    }
    this.logger?.warn("notification_ignored", { reason: "not a notification method" });
  }

  /** Maps any thrown value to a JSON-RPC error without leaking stacks. */
  private normaliseError(error: unknown, context: McpRequestContext): JsonRpcError {
    const base = context.requestId !== undefined ? { requestId: context.requestId } : {};
    if (error instanceof JsonRpcError) {
      return error;
    }
    if (error instanceof InvalidArgumentsError) {
      return new InvalidParamsError(error.message, { ...base, tool: error.toolName, issues: error.issues });
    }
    if (error instanceof NotFoundError) {
      return new JsonRpcError("TOOL_NOT_FOUND", error.message, { ...base, tool: error.toolName });
    }
    if (error instanceof ExecutionError) {
      this.logger?.warn("tool_execution_failed", {
        tool: error.toolName,
        message: error.message,
      });
      return new JsonRpcError("TOOL_EXECUTION_FAILED", undefined, {
        ...base,
        tool: error.toolName,
        hint: error.causeMessage,
      });
    }
    if (error instanceof ResultEncodingError) {
      this.logger?.error("tool_result_unencodable", { tool: error.toolName, message: error.message });
      return new InternalError(undefined, { ...base, tool: error.toolName, hint: "result is not JSON-encodable" });
    }
    this.logger?.error("jsonrpc_internal_error", {
      message: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return new InternalError(undefined, base);
  }
}
