export * from "./schema/contract.js";
export * from "./schema/converters.js";
export * from "./schema/engine.js";
export * from "./schema/validate.js";

export * from "./catalog/catalog.js";
export * from "./catalog/errors.js";
export * from "./catalog/metadata.js";
export * from "./catalog/register.js";
export * from "./catalog/secrets.js";
export * from "./pipeline/context.js";
export * from "./session/store.js";

export * from "./reliability/log.js";
export * from "./selection/options.js";
export * from "./selection/relevance.js";
export * from "./selection/strategies.js";
export * from "./search/facade.js";
export * from "./search/searchTool.js";

export * from "./rpc/types.js";
export * from "./rpc/errors.js";
export * from "./protocol/context.js";
export * from "./protocol/deps.js";
export * from "./protocol/core.js";
export * from "./adapters/mcp.js";
export * from "./adapters/serialise.js";
export * from "./adapters/functionCalling.js";

export * from "./transports/lines.js";
export * from "./transports/http.js";
export * from "./transports/sse.js";
export * from "./transports/sdkBridge.js";

export * from "./tools/builtin.js";
export * from "./config/env.js";
export * from "./config/runtime.js";
export * from "./logger.js";
export { createRuntime, type RuntimeOverrides, type ToolbridgeRuntime } from "./server.js";
