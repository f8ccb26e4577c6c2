import { LATEST_PROTOCOL_VERSION, SUPPORTED_PROTOCOL_VERSIONS } from "@modelcontextprotocol/sdk/types.js";

import type { Catalog, CatalogSpec } from "../catalog/catalog.js";
import { ResultEncodingError } from "../catalog/errors.js";
import type { McpRequestContext } from "../protocol/context.js";
import type {
  CapabilityProvider,
  InitializeParams,
  InvocationHooks,
  McpToolDescriptor,
  ProtocolDependencies,
  ToolCallResult,
  ToolInvoker,
  ToolSchemaProvider,
} from "../protocol/deps.js";
import { serialiseResult, toJsonValue } from "./serialise.js";

export interface ServerIdentity {
  readonly name: string;
  readonly version: string;
}

/** Echoes the client's protocol revision when supported, otherwise offers the latest. */
export function negotiateProtocolVersion(requested: string | undefined): string {
  return requested !== undefined && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)
    ? requested
    : LATEST_PROTOCOL_VERSION;
}

/** `initialize` result advertising the tools capability. */
export class CatalogCapabilityProvider implements CapabilityProvider {
  constructor(
    private readonly server: ServerIdentity,
    private readonly instructions?: string,
  ) {}

  describe(params: InitializeParams): Record<string, unknown> {
    return {
      protocolVersion: negotiateProtocolVersion(params.protocolVersion),
      capabilities: { tools: { listChanged: false } },
      serverInfo: { name: this.server.name, version: this.server.version },
      ...(this.instructions ? { instructions: this.instructions } : {}),
    };
  }
}

export function toMcpToolDescriptor(spec: CatalogSpec): McpToolDescriptor {
  return { name: spec.name, description: spec.description, inputSchema: spec.inputContract };
}

export type ToolVisibilityFilter = (spec: CatalogSpec, context: McpRequestContext) => boolean;

/** `tools/list` over a catalog snapshot, optionally filtered per request context. */
export class CatalogToolSchemaProvider implements ToolSchemaProvider {
  constructor(
    private readonly catalog: Catalog,
    private readonly filter?: ToolVisibilityFilter,
  ) {}

  listTools(context: McpRequestContext): McpToolDescriptor[] {
    const filter = this.filter;
    return this.catalog
      .list()
      .filter((spec) => (filter ? filter(spec, context) : true))
      .map(toMcpToolDescriptor);
  }
}

/**
 * Wraps a tool's return value in the MCP `CallToolResult` shape. The structured
 * copy is plain JSON data; cyclic values throw a `TypeError`.
 */
export function toToolCallResult(value: unknown): ToolCallResult {
  return {
    content: [{ type: "text", text: serialiseResult(value).text }],
    structuredContent: { result: toJsonValue(value) },
    isError: false,
  };
}

/** Invoker backed by {@link Catalog.execute}; catalog errors propagate to the core. */
export class CatalogToolInvoker implements ToolInvoker {
  constructor(private readonly catalog: Catalog) {}

  async callTool(
    name: string,
    args: Record<string, unknown>,
    context: McpRequestContext,
    hooks: InvocationHooks = {},
  ): Promise<ToolCallResult> {
    const result = await this.catalog.execute(name, args, {
      context,
      ...(hooks.onProgress ? { onProgress: hooks.onProgress } : {}),
    });
    try {
      return toToolCallResult(result.value);
    } catch (error) {
      throw new ResultEncodingError(name, error);
    }
  }
}

export interface CatalogDependenciesOptions {
  readonly catalog: Catalog;
  readonly server: ServerIdentity;
  readonly instructions?: string;
  readonly filter?: ToolVisibilityFilter;
}

/** Assembles the dependency bundle the protocol core needs for a catalog. */
export function createCatalogDependencies(options: CatalogDependenciesOptions): ProtocolDependencies {
  return {
    capabilities: new CatalogCapabilityProvider(options.server, options.instructions),
    tools: new CatalogToolSchemaProvider(options.catalog, options.filter),
    invoker: new CatalogToolInvoker(options.catalog),
  };
}
