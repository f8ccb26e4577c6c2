import { describe, it } from "mocha";
import { expect } from "chai";

import { Catalog } from "../src/catalog/catalog.js";
import { loadRuntimeConfig } from "../src/config/runtime.js";
import { createRequestContext } from "../src/protocol/context.js";
import { SEARCH_TOOL_NAME } from "../src/search/searchTool.js";
import { createRuntime } from "../src/server.js";
import { PING_TOOL_NAME } from "../src/tools/builtin.js";
import { ManualClock } from "./helpers/clock.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("runtime assembly", () => {
  it("registers the built-in tools and serves them through the protocol core", async () => {
    const logger = new RecordingLogger();
    const clock = new ManualClock();
    const runtime = await createRuntime(loadRuntimeConfig({}), { logger, catalog: new Catalog({ clock: clock.now }), clock: clock.now });
    const context = createRequestContext("direct");

    expect(runtime.catalog.list().map((spec) => spec.name)).to.deep.equal([PING_TOOL_NAME, SEARCH_TOOL_NAME]);
    expect(logger.entries.find((entry) => entry.message === "runtime_ready")?.payload).to.deep.equal({
      tools: 2,
      reliability_events: 0,
      transport: "stdio",
    });

    const ping = await runtime.core.handle(
      { jsonrpc: "2.0", id: 1, method: "tools/call", params: { name: PING_TOOL_NAME } },
      context,
      runtime.deps,
    );
    expect(ping).to.deep.equal({
      jsonrpc: "2.0",
      id: 1,
      result: {
        content: [{ type: "text", text: '{"ok":true,"message":"pong"}' }],
        structuredContent: { result: { ok: true, message: "pong" } },
        isError: false,
      },
    });

    const found = await runtime.core.handle(
      {
        jsonrpc: "2.0",
        id: 2,
        method: "tools/call",
        params: { name: SEARCH_TOOL_NAME, arguments: { query: "health check", prefix: "system." } },
      },
      context,
      runtime.deps,
    );
    expect(found).to.have.deep.nested.property("result.structuredContent.result", [
      {
        name: "system.ping",
        description: "Health check returning pong",
        tags: ["health"],
        cost: 0,
        latency_hint_ms: 1,
        side_effect: false,
        category: "system",
        score: 1,
      },
    ]);
    expect(runtime.reliability.events(PING_TOOL_NAME)).to.deep.equal([
      { tool: PING_TOOL_NAME, timestamp: clock.now(), outcome: "success" },
    ]);
  });

  it("advertises the configured server identity", async () => {
    const runtime = await createRuntime(
      loadRuntimeConfig({ TOOLBRIDGE_SERVER_NAME: "bridge-a", TOOLBRIDGE_SEARCH_STRATEGY: "hybrid" }),
      { logger: new RecordingLogger(), catalog: new Catalog() },
    );

    const response = await runtime.core.handle(
      { jsonrpc: "2.0", id: 1, method: "initialize", params: {} },
      createRequestContext("direct"),
      runtime.deps,
    );

    expect(response).to.have.deep.nested.property("result.serverInfo", { name: "bridge-a", version: "0.1.0" });
    expect(runtime.search.search("pong").map((hit) => hit.spec.name)[0]).to.equal(PING_TOOL_NAME);
  });
});
