import type { Catalog } from "../catalog/catalog.js";
import { defineTool, type RegistrationOptions } from "../catalog/register.js";

export const PING_TOOL_NAME = "system.ping";

export interface PingResult {
  ok: true;
  message: "pong";
}

/** Liveness probe reachable through every transport. */
export function registerBuiltinTools(catalog: Catalog, options: Omit<RegistrationOptions, "catalog"> = {}): void {
  defineTool(
    {
      name: PING_TOOL_NAME,
      description: "Health check returning pong",
      params: {},
      metadata: { cost: 0, latencyHintMs: 1, sideEffect: false, category: "system" },
      tags: ["health"],
    },
    (): PingResult => ({ ok: true, message: "pong" }),
    { ...options, catalog },
  );
}
