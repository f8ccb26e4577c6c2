import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { runWithRequestContext } from "../src/infra/requestContext.js";
import { type LogEntry, StructuredLogger } from "../src/logger.js";
import { assertPlainObject } from "./helpers/assertions.js";

function parseLine(line: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(line);
  assertPlainObject(parsed, "log line");
  return parsed;
}

class LineSink {
  public readonly lines: string[] = [];

  write(chunk: string): boolean {
    this.lines.push(chunk);
    return true;
  }

  /** Parsed entries without their timestamp. */
  entries(): Array<Record<string, unknown>> {
    return this.lines.map((line) => {
      const { timestamp: _timestamp, ...rest } = parseLine(line);
      return rest;
    });
  }
}

describe("structured logger", () => {
  it("writes one JSON line per entry at or above the configured level", () => {
    const sink = new LineSink();
    const logger = new StructuredLogger({ stream: sink, level: "warn" });

    logger.debug("noise");
    logger.info("noise");
    logger.warn("slow_tool", { tool: "weather.query" });
    logger.error("boom");

    expect(sink.lines.every((line) => line.endsWith("\n"))).to.equal(true);
    expect(sink.entries()).to.deep.equal([
      { level: "warn", message: "slow_tool", payload: { tool: "weather.query" } },
      { level: "error", message: "boom" },
    ]);
  });

  it("redacts sensitive keys at any depth when enabled", () => {
    const sink = new LineSink();
    const logger = new StructuredLogger({ stream: sink, redactionEnabled: true });

    logger.info("request", { headers: { Authorization: "Bearer test-secret" }, items: [{ password: "test-secret", id: 1 }] });

    expect(sink.entries()[0]?.payload).to.deep.equal({
      headers: { Authorization: "[REDACTED]" },
      items: [{ password: "[REDACTED]", id: 1 }],
    });
  });

  it("attaches the correlation of the active request", async () => {
    const seen: LogEntry[] = [];
    const logger = new StructuredLogger({ stream: null, onEntry: (entry) => seen.push(entry) });

    await runWithRequestContext({ requestId: 7, transport: "stdio", userId: "alice" }, async () => {
      await Promise.resolve();
      runWithRequestContext({ method: "tools/call" }, () => logger.info("inside"));
    });
    logger.info("outside");

    expect(seen.map(({ timestamp: _timestamp, ...rest }) => rest)).to.deep.equal([
      { level: "info", message: "inside", request_id: 7, method: "tools/call", transport: "stdio", user_id: "alice" },
      { level: "info", message: "outside" },
    ]);
  });

  describe("file mirror", () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(path.join(tmpdir(), "toolbridge-logger-"));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it("appends entries to the log file in order", async () => {
      const logFile = path.join(directory, "logs", "toolbridge.log");
      const logger = new StructuredLogger({ stream: null, logFile });

      logger.info("first");
      logger.info("second");
      await logger.flush();

      const lines = (await readFile(logFile, "utf8")).trim().split("\n");
      expect(lines.map((line) => parseLine(line).message)).to.deep.equal(["first", "second"]);
    });

    it("rotates files beyond the size limit and keeps the configured count", async () => {
      const logFile = path.join(directory, "toolbridge.log");
      const logger = new StructuredLogger({ stream: null, logFile, maxFileSizeBytes: 120, maxFileCount: 2 });

      for (let index = 0; index < 6; index += 1) {
        logger.info("rotating_entry", { index });
      }
      await logger.flush();

      expect((await readdir(directory)).sort()).to.deep.equal(["toolbridge.log", "toolbridge.log.1"]);
      const active = (await readFile(logFile, "utf8")).trim().split("\n");
      expect(active.map((line) => parseLine(line).payload)).to.deep.equal([{ index: 5 }]);
    });
  });
});
