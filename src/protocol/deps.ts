import type { ProgressListener } from "../catalog/catalog.js";
import type { CallContract } from "../schema/contract.js";
import type { McpRequestContext } from "./context.js";

/** Parameters of `initialize` the core looks at; everything else passes through. */
export interface InitializeParams {
  readonly protocolVersion?: string;
  readonly [key: string]: unknown;
}

/** Builds the `initialize` result (protocol version, capabilities, server info). */
export interface CapabilityProvider {
  describe(params: InitializeParams, context: McpRequestContext): Record<string, unknown>;
}

/** Entry of a `tools/list` result. */
export interface McpToolDescriptor {
  name: string;
  description: string;
  inputSchema: CallContract;
}

/** Produces the `tools/list` listing; implementations may filter per context. */
export interface ToolSchemaProvider {
  listTools(context: McpRequestContext): McpToolDescriptor[];
}

export interface TextContent {
  type: "text";
  text: string;
}

/** Result of `tools/call` in the MCP `CallToolResult` shape. */
export interface ToolCallResult {
  content: TextContent[];
  structuredContent?: { result: unknown };
  isError: boolean;
}

export interface InvocationHooks {
  /** Receives progress reported by the tool; streaming transports forward it. */
  readonly onProgress?: ProgressListener;
}

/** Runs a tool by name. Domain errors propagate for the core to map. */
export interface ToolInvoker {
  callTool(
    name: string,
    args: Record<string, unknown>,
    context: McpRequestContext,
    hooks?: InvocationHooks,
  ): Promise<ToolCallResult>;
}

/** Collaborators injected into every `ProtocolCore.handle` call. */
export interface ProtocolDependencies {
  readonly capabilities: CapabilityProvider;
  readonly tools: ToolSchemaProvider;
  readonly invoker: ToolInvoker;
}
