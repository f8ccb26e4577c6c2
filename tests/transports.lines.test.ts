import { describe, it } from "mocha";
import { expect } from "chai";
import { PassThrough } from "node:stream";

import type { Catalog } from "../src/catalog/catalog.js";
import { defineTool } from "../src/catalog/register.js";
import { serveLines } from "../src/transports/lines.js";
import { assertPlainObject } from "./helpers/assertions.js";
import { createProtocolFixture } from "./helpers/catalog.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

/** Feeds `lines` through the line transport and returns the parsed response lines. */
async function exchange(
  lines: string[],
  logger = new RecordingLogger(),
  setup?: (catalog: Catalog) => void,
): Promise<unknown[]> {
  const { catalog, core, deps } = createProtocolFixture();
  setup?.(catalog);
  const input = new PassThrough();
  const output = new PassThrough();
  let written = "";
  output.on("data", (chunk: Buffer) => {
    written += chunk.toString("utf8");
  });

  const serving = serveLines({ input, output, core, deps, logger });
  input.end(lines.map((line) => `${line}\n`).join(""));
  await serving;

  return written
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line): unknown => JSON.parse(line));
}

describe("line transport", () => {
  it("runs the initialize, list and call handshake with one line per request", async () => {
    const responses = await exchange([
      JSON.stringify({ jsonrpc: "2.0", id: 1, method: "initialize", params: { protocolVersion: "2024-11-05" } }),
      JSON.stringify({ jsonrpc: "2.0", method: "notifications/initialized" }),
      JSON.stringify({ jsonrpc: "2.0", id: 2, method: "tools/list" }),
      JSON.stringify({
        jsonrpc: "2.0",
        id: 3,
        method: "tools/call",
        params: { name: "calculator.add", arguments: { a: 1, b: 2 } },
      }),
    ]);

    expect(responses.map((response) => (typeof response === "object" && response !== null && "id" in response ? response.id : undefined))).to.deep.equal([1, 2, 3]);
    const last = responses[2];
    assertPlainObject(last, "tools/call response");
    expect(last.result).to.deep.equal({
      content: [{ type: "text", text: "3" }],
      structuredContent: { result: 3 },
      isError: false,
    });
  });

  it("answers unparsable lines with a parse error and keeps serving", async () => {
    const logger = new RecordingLogger();
    const responses = await exchange(["{oops", "", JSON.stringify({ jsonrpc: "2.0", id: 7, method: "ping" })], logger);

    expect(responses).to.deep.equal([
      { jsonrpc: "2.0", id: null, error: { code: -32700, message: "Parse error", data: { category: "PARSE_ERROR" } } },
      { jsonrpc: "2.0", id: 7, result: {} },
    ]);
    expect(logger.messages()).to.deep.equal(["line_transport_started", "line_transport_parse_error", "line_transport_closed"]);
    expect(logger.entries[2]?.payload).to.deep.equal({ lines: 3 });
  });

  it("keeps serving after a tool returns a value JSON cannot encode", async () => {
    const responses = await exchange(
      [
        JSON.stringify({ jsonrpc: "2.0", id: 1, method: "tools/call", params: { name: "ledger.total" } }),
        JSON.stringify({ jsonrpc: "2.0", id: 2, method: "tools/call", params: { name: "ledger.loop" } }),
        JSON.stringify({ jsonrpc: "2.0", id: 3, method: "ping" }),
      ],
      new RecordingLogger(),
      (catalog) => {
        defineTool({ name: "ledger.total", description: "Returns a bigint total", params: {} }, () => 10n, { catalog });
        defineTool(
          { name: "ledger.loop", description: "Returns a cyclic list", params: {} },
          () => {
            const entries: unknown[] = [];
            entries.push(entries);
            return entries;
          },
          { catalog },
        );
      },
    );

    expect(responses).to.deep.equal([
      {
        jsonrpc: "2.0",
        id: 1,
        result: { content: [{ type: "text", text: "10" }], structuredContent: { result: "10" }, isError: false },
      },
      {
        jsonrpc: "2.0",
        id: 2,
        error: {
          code: -32603,
          message: "Internal error",
          data: { category: "INTERNAL", tool: "ledger.loop", hint: "result is not JSON-encodable" },
        },
      },
      { jsonrpc: "2.0", id: 3, result: {} },
    ]);
  });

  it("keeps responses in request order", async () => {
    const responses = await exchange(
      [5, 4, 3, 2, 1].map((id) =>
        JSON.stringify({ jsonrpc: "2.0", id, method: "tools/call", params: { name: "calculator.add", arguments: { a: id, b: 0 } } }),
      ),
    );

    expect(
      responses.map((response) => {
        assertPlainObject(response, "response");
        return response.id;
      }),
    ).to.deep.equal([5, 4, 3, 2, 1]);
  });
});
