#!/usr/bin/env node
import { pathToFileURL } from "node:url";
import process from "node:process";

import { type Catalog, getDefaultCatalog } from "./catalog/catalog.js";
import { createCatalogDependencies } from "./adapters/mcp.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./config/runtime.js";
import { StructuredLogger } from "./logger.js";
import { ProtocolCore } from "./protocol/core.js";
import type { ProtocolDependencies } from "./protocol/deps.js";
import { ReliabilityLog } from "./reliability/log.js";
import { ToolSearch } from "./search/facade.js";
import { registerSearchTool } from "./search/searchTool.js";
import { HybridStrategy, RuleBasedStrategy, type SelectionStrategy } from "./selection/strategies.js";
import { registerBuiltinTools } from "./tools/builtin.js";
import { HttpTransport, startHttpServer } from "./transports/http.js";
import { serveLines } from "./transports/lines.js";

/** Fully wired collaborators for one process. */
export interface ToolbridgeRuntime {
  readonly config: RuntimeConfig;
  readonly logger: StructuredLogger;
  readonly catalog: Catalog;
  readonly reliability: ReliabilityLog;
  readonly search: ToolSearch;
  readonly core: ProtocolCore;
  readonly deps: ProtocolDependencies;
}

export interface RuntimeOverrides {
  readonly logger?: StructuredLogger;
  /** Defaults to the process-wide catalog so `defineTool` calls made at import time are served. */
  readonly catalog?: Catalog;
  readonly clock?: () => number;
}

function createStrategy(config: RuntimeConfig): SelectionStrategy {
  const options = { failureWeight: config.search.failureWeight };
  return config.search.strategy === "hybrid" ? new HybridStrategy(options) : new RuleBasedStrategy(options);
}

/**
 * Assembles logger, reliability log, catalog, search and protocol core from a
 * runtime configuration, replaying the persisted reliability history and
 * registering the built-in tools.
 */
export async function createRuntime(config: RuntimeConfig, overrides: RuntimeOverrides = {}): Promise<ToolbridgeRuntime> {
  const logger =
    overrides.logger ??
    new StructuredLogger({
      level: config.logging.level,
      logFile: config.logging.file,
      redactionEnabled: config.logging.redact,
      // stdout carries the protocol on the line transport.
      stream: config.transport === "stdio" ? process.stderr : process.stdout,
    });
  const clock = overrides.clock ?? Date.now;

  const reliability = new ReliabilityLog({
    file: config.reliability.file,
    halfLifeMs: config.reliability.halfLifeMs,
    windowMs: config.reliability.windowMs,
    successDilution: config.reliability.successDilution,
    logger,
    clock,
  });
  const loaded = await reliability.load();

  const catalog = overrides.catalog ?? getDefaultCatalog();
  catalog.useReliability(reliability);

  const search = new ToolSearch({
    catalog,
    reliability,
    strategy: createStrategy(config),
    defaults: { topK: config.search.topK },
    logger,
    clock,
  });
  registerBuiltinTools(catalog, { logger });
  registerSearchTool(catalog, search, { logger });

  const core = new ProtocolCore({ logger, clock });
  const deps = createCatalogDependencies({ catalog, server: config.server });
  logger.info("runtime_ready", { tools: catalog.size, reliability_events: loaded, transport: config.transport });
  return { config, logger, catalog, reliability, search, core, deps };
}

function readConfigOrExit(): RuntimeConfig {
  try {
    return loadRuntimeConfig();
  } catch (error) {
    // The logger's level and sinks come from this configuration.
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    return process.exit(1);
  }
}

/**
 * Bootstraps the server when the module is executed directly: reads the
 * configuration from the environment, serves the selected transport and
 * flushes the reliability log and the logger on shutdown.
 */
async function main(): Promise<void> {
  const config = readConfigOrExit();
  const runtime = await createRuntime(config);
  const { logger, core, deps, reliability } = runtime;
  const cleanup: Array<() => Promise<void>> = [];

  const shutdown = async (reason: string): Promise<void> => {
    logger.warn("shutdown", { reason });
    for (const closer of cleanup) {
      try {
        await closer();
      } catch (error) {
        logger.error("transport_close_failed", { message: error instanceof Error ? error.message : String(error) });
      }
    }
    await reliability.flush();
    await logger.flush();
    process.exit(0);
  };

  if (config.transport === "http") {
    const transport = new HttpTransport({ core, deps, logger });
    try {
      const handle = await startHttpServer(transport, { host: config.http.host, port: config.http.port, logger });
      cleanup.push(handle.close);
    } catch (error) {
      logger.error("http_start_failed", { message: error instanceof Error ? error.message : String(error) });
      await logger.flush();
      process.exit(1);
    }
  } else {
    void serveLines({ input: process.stdin, output: process.stdout, core, deps, logger })
      .then(() => shutdown("stdin_closed"))
      .catch((error: unknown) => {
        logger.error("line_transport_failed", { message: error instanceof Error ? error.message : String(error) });
        process.exitCode = 1;
      });
  }

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  void main().catch((error: unknown) => {
    process.stderr.write(`toolbridge failed to start: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
  });
}
