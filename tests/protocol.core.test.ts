import { beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { LATEST_PROTOCOL_VERSION } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { Catalog } from "../src/catalog/catalog.js";
import { defineTool } from "../src/catalog/register.js";
import { createCatalogDependencies } from "../src/adapters/mcp.js";
import { createRequestContext, type McpRequestContext } from "../src/protocol/context.js";
import { ProtocolCore } from "../src/protocol/core.js";
import type { ProtocolDependencies } from "../src/protocol/deps.js";
import { ReliabilityLog } from "../src/reliability/log.js";
import { encodeJsonRpcResponse } from "../src/rpc/errors.js";
import { TEST_SERVER, createProtocolFixture } from "./helpers/catalog.js";
import { ManualClock } from "./helpers/clock.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("protocol core", () => {
  let logger: RecordingLogger;
  let reliability: ReliabilityLog;
  let catalog: Catalog;
  let core: ProtocolCore;
  let deps: ProtocolDependencies;
  let context: McpRequestContext;

  beforeEach(() => {
    logger = new RecordingLogger();
    reliability = new ReliabilityLog();
    ({ catalog, core, deps } = createProtocolFixture({ logger, reliability }));
    // Registration entries are not under test here.
    logger.entries.splice(0);
    context = createRequestContext("direct");
  });

  describe("dispatch", () => {
    it("answers tools/call with the result and echoes the request id", async () => {
      const response = await core.handle(
        { jsonrpc: "2.0", id: "call-1", method: "tools/call", params: { name: "calculator.add", arguments: { a: 1, b: 2 } } },
        context,
        deps,
      );

      expect(response).to.deep.equal({
        jsonrpc: "2.0",
        id: "call-1",
        result: { content: [{ type: "text", text: "3" }], structuredContent: { result: 3 }, isError: false },
      });
    });

    it("lists the catalog with derived input schemas", async () => {
      const response = await core.handle({ jsonrpc: "2.0", id: 1, method: "tools/list" }, context, deps);

      expect(response).to.deep.equal({
        jsonrpc: "2.0",
        id: 1,
        result: {
          tools: [
            {
              name: "calculator.add",
              description: "Adds two integers",
              inputSchema: {
                type: "object",
                properties: { a: { type: "integer" }, b: { type: "integer" } },
                required: ["a", "b"],
                additionalProperties: false,
              },
            },
            {
              name: "diagnostics.fail",
              description: "Always fails",
              inputSchema: { type: "object", properties: {}, required: [], additionalProperties: false },
            },
          ],
        },
      });
    });

    it("negotiates the protocol version during initialize", async () => {
      const supported = await core.handle(
        { jsonrpc: "2.0", id: 1, method: "initialize", params: { protocolVersion: "2024-11-05", capabilities: {} } },
        context,
        deps,
      );
      const unknown = await core.handle(
        { jsonrpc: "2.0", id: 2, method: "initialize", params: { protocolVersion: "1999-01-01" } },
        context,
        deps,
      );

      expect(supported).to.deep.equal({
        jsonrpc: "2.0",
        id: 1,
        result: {
          protocolVersion: "2024-11-05",
          capabilities: { tools: { listChanged: false } },
          serverInfo: { name: "toolbridge-test", version: "0.0.0-test" },
        },
      });
      expect(unknown).to.have.nested.property("result.protocolVersion", LATEST_PROTOCOL_VERSION);
    });

    it("advertises instructions when the provider carries them", async () => {
      const withInstructions = createCatalogDependencies({ catalog, server: TEST_SERVER, instructions: "Search first." });

      const response = await core.handle({ jsonrpc: "2.0", id: 1, method: "initialize" }, context, withInstructions);

      expect(response).to.have.nested.property("result.instructions", "Search first.");
    });

    it("answers ping with an empty result", async () => {
      expect(await core.handle({ jsonrpc: "2.0", id: 9, method: "ping" }, context, deps)).to.deep.equal({
        jsonrpc: "2.0",
        id: 9,
        result: {},
      });
    });

    it("logs completion with the correlation of the request", async () => {
      const clock = new ManualClock();
      const timed = new ProtocolCore({ logger, clock: clock.now });

      await timed.handle({ jsonrpc: "2.0", id: 4, method: "tools/call", params: { name: "nope" } }, context, deps);

      const completed = logger.entries.filter((entry) => entry.message === "jsonrpc_completed");
      expect(completed).to.deep.equal([
        { level: "info", message: "jsonrpc_completed", payload: { duration_ms: 0, error_code: -32002 } },
      ]);
    });
  });

  describe("notifications", () => {
    it("never produces a response", async () => {
      expect(await core.handle({ jsonrpc: "2.0", method: "notifications/initialized" }, context, deps)).to.equal(null);
      expect(await core.handle({ jsonrpc: "2.0", method: "notifications/cancelled", params: {} }, context, deps)).to.equal(null);
      expect(logger.messages()).to.deep.equal(["client_initialized", "notification_received"]);
    });

    it("ignores requests sent without an id and never runs the tool", async () => {
      const response = await core.handle(
        { jsonrpc: "2.0", method: "tools/call", params: { name: "calculator.add", arguments: { a: 1, b: 2 } } },
        context,
        deps,
      );

      expect(response).to.equal(null);
      expect(logger.messages("warn")).to.deep.equal(["notification_ignored"]);
      expect(reliability.events()).to.deep.equal([]);
    });
  });

  describe("errors", () => {
    it("maps invalid tool arguments to -32602 with the offending path", async () => {
      const response = await core.handle(
        { jsonrpc: "2.0", id: 2, method: "tools/call", params: { name: "calculator.add", arguments: { a: 1 } } },
        context,
        deps,
      );

      expect(response).to.deep.equal({
        jsonrpc: "2.0",
        id: 2,
        error: {
          code: -32602,
          message: 'invalid arguments for "calculator.add": b is required',
          data: {
            category: "INVALID_PARAMS",
            tool: "calculator.add",
            issues: [{ path: "b", message: "is required" }],
          },
        },
      });
    });

    it("maps unknown tools to -32002", async () => {
      const response = await core.handle(
        { jsonrpc: "2.0", id: 5, method: "tools/call", params: { name: "nope", arguments: {} } },
        context,
        deps,
      );

      expect(response).to.deep.equal({
        jsonrpc: "2.0",
        id: 5,
        error: { code: -32002, message: 'tool "nope" is not registered', data: { category: "TOOL_NOT_FOUND", tool: "nope" } },
      });
    });

    it("maps handler failures to -32001 without leaking stacks", async () => {
      const response = await core.handle(
        { jsonrpc: "2.0", id: 6, method: "tools/call", params: { name: "diagnostics.fail" } },
        createRequestContext("http", { requestId: "req-6" }),
        deps,
      );

      expect(response).to.deep.equal({
        jsonrpc: "2.0",
        id: 6,
        error: {
          code: -32001,
          message: "Tool execution failed",
          data: { category: "TOOL_EXECUTION_FAILED", tool: "diagnostics.fail", request_id: "req-6", hint: "boom" },
        },
      });
      expect(logger.messages("warn")).to.deep.equal(["tool_execution_failed"]);
    });

    it("reports unknown methods with -32601 and the request id", async () => {
      const response = await core.handle({ jsonrpc: "2.0", id: 3, method: "resources/list" }, context, deps);

      expect(response).to.deep.equal({
        jsonrpc: "2.0",
        id: 3,
        error: { code: -32601, message: "Method not found: resources/list", data: { category: "METHOD_NOT_FOUND" } },
      });
    });

    it("rejects malformed tools/call params", async () => {
      const response = await core.handle(
        { jsonrpc: "2.0", id: 8, method: "tools/call", params: { arguments: {} } },
        context,
        deps,
      );

      expect(response).to.have.nested.property("error.code", -32602);
      expect(response).to.have.nested.property("error.message", "tools/call expects { name, arguments? }");
    });

    it("rejects batches and non-object payloads with a null id", async () => {
      const batch = await core.handle([{ jsonrpc: "2.0", id: 1, method: "ping" }], context, deps);
      const scalar = await core.handle("ping", context, deps);

      expect(batch).to.deep.equal({
        jsonrpc: "2.0",
        id: null,
        error: {
          code: -32600,
          message: "Invalid Request",
          data: { category: "INVALID_REQUEST", hint: "batch requests are not supported" },
        },
      });
      expect(scalar).to.have.nested.property("error.data.hint", "request must be a JSON object");
    });

    it("rejects ids that are neither strings nor numbers", async () => {
      const response = await core.handle({ jsonrpc: "2.0", id: { nested: true }, method: "ping" }, context, deps);

      expect(response).to.deep.equal({
        jsonrpc: "2.0",
        id: null,
        error: {
          code: -32600,
          message: "Invalid Request",
          data: { category: "INVALID_REQUEST", hint: "id must be a string or a number" },
        },
      });
    });

    it("echoes a valid id when the rest of the envelope is malformed", async () => {
      const response = await core.handle({ jsonrpc: "1.0", id: 7, method: "ping" }, context, deps);

      expect(response).to.have.property("id", 7);
      expect(response).to.have.nested.property("error.code", -32600);
      expect(response).to.have.nested.property("error.data.issues[0].path", "jsonrpc");
    });

    it("encodes bigint results as decimal strings", async () => {
      defineTool({ name: "ledger.total", description: "Returns a bigint total", params: {} }, () => 10n, { catalog });

      const response = await core.handle({ jsonrpc: "2.0", id: 11, method: "tools/call", params: { name: "ledger.total" } }, context, deps);

      expect(response).to.deep.equal({
        jsonrpc: "2.0",
        id: 11,
        result: { content: [{ type: "text", text: "10" }], structuredContent: { result: "10" }, isError: false },
      });
      expect(JSON.parse(JSON.stringify(response))).to.deep.equal(response);
    });

    it("maps results that cannot be encoded to -32603 and keeps the id", async () => {
      defineTool(
        { name: "graph.cycle", description: "Returns a cyclic object", params: { label: z.string() } },
        ({ label }) => {
          const node: Record<string, unknown> = { label };
          node.self = node;
          return node;
        },
        { catalog },
      );

      const response = await core.handle(
        { jsonrpc: "2.0", id: 12, method: "tools/call", params: { name: "graph.cycle", arguments: { label: "a" } } },
        context,
        deps,
      );

      expect(response).to.deep.equal({
        jsonrpc: "2.0",
        id: 12,
        error: {
          code: -32603,
          message: "Internal error",
          data: { category: "INTERNAL", tool: "graph.cycle", hint: "result is not JSON-encodable" },
        },
      });
      expect(logger.messages("error")).to.deep.equal(["tool_result_unencodable"]);
    });

    it("turns unexpected invoker failures into a generic internal error", async () => {
      const broken: ProtocolDependencies = {
        ...deps,
        invoker: {
          callTool: () => Promise.reject(new TypeError("secret internals")),
        },
      };

      const response = await core.handle(
        { jsonrpc: "2.0", id: 10, method: "tools/call", params: { name: "calculator.add" } },
        context,
        broken,
      );

      expect(response).to.deep.equal({
        jsonrpc: "2.0",
        id: 10,
        error: { code: -32603, message: "Internal error", data: { category: "INTERNAL" } },
      });
      expect(logger.messages("error")).to.deep.equal(["jsonrpc_internal_error"]);
    });
  });
});

describe("response encoding", () => {
  it("replaces a response that cannot be encoded with an internal error under the same id", () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    const encoded = encodeJsonRpcResponse({ jsonrpc: "2.0", id: "r-1", result: cyclic });
    const decoded: unknown = JSON.parse(encoded.text);

    expect(decoded).to.deep.equal(encoded.response);
    expect(decoded).to.have.property("id", "r-1");
    expect(decoded).to.have.nested.property("error.code", -32603);
    expect(decoded).to.have.nested.property("error.data.hint").that.matches(/^response is not JSON-encodable: /);
  });

  it("passes encodable responses through unchanged", () => {
    const response = { jsonrpc: "2.0" as const, id: 1, result: {} };

    expect(encodeJsonRpcResponse(response)).to.deep.equal({ response, text: '{"jsonrpc":"2.0","id":1,"result":{}}' });
  });
});
