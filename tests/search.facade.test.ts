import { beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { z } from "zod";

import { Catalog } from "../src/catalog/catalog.js";
import { defineTool } from "../src/catalog/register.js";
import { ReliabilityLog } from "../src/reliability/log.js";
import { ToolSearch } from "../src/search/facade.js";
import { SEARCH_TOOL_NAME, registerSearchTool } from "../src/search/searchTool.js";
import { captureRejection } from "./helpers/assertions.js";
import { ManualClock } from "./helpers/clock.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("search facade", () => {
  let clock: ManualClock;
  let reliability: ReliabilityLog;
  let catalog: Catalog;
  let logger: RecordingLogger;
  let search: ToolSearch;

  beforeEach(() => {
    clock = new ManualClock();
    reliability = new ReliabilityLog({ clock: clock.now });
    catalog = new Catalog({ reliability, clock: clock.now });
    logger = new RecordingLogger();
    search = new ToolSearch({ catalog, reliability, logger, clock: clock.now });

    defineTool(
      { name: "weather.alpha", description: "Reports current weather", params: { city: z.string() } },
      () => {
        throw new Error("upstream timeout");
      },
      { catalog },
    );
    defineTool(
      { name: "weather.beta", description: "Reports current weather", params: { city: z.string() } },
      ({ city }) => ({ city, sky: "clear" }),
      { catalog },
    );
  });

  it("ranks a never-failing tool above an equally relevant tool that just failed twice", async () => {
    expect(search.search("current weather").map((hit) => hit.spec.name)).to.deep.equal(["weather.alpha", "weather.beta"]);

    await captureRejection(() => catalog.execute("weather.alpha", { city: "Lyon" }));
    await captureRejection(() => catalog.execute("weather.alpha", { city: "Lyon" }));
    clock.advance(1_000);

    const hits = search.search("current weather");
    expect(hits.map((hit) => hit.spec.name)).to.deep.equal(["weather.beta", "weather.alpha"]);
    expect(hits[0]?.relevance).to.equal(hits[1]?.relevance);
    expect(hits[1]?.failureScore).to.be.greaterThan(1.9);
  });

  it("turns on metadata ranking when a constraint is given", () => {
    defineTool(
      { name: "convert.slow", description: "Converts currencies", params: {}, metadata: { cost: 1 } },
      () => 1,
      { catalog },
    );
    defineTool(
      { name: "convert.zippy", description: "Converts currencies", params: {}, metadata: { cost: 0.1 } },
      () => 1,
      { catalog },
    );

    expect(search.search("currencies", { prefix: "convert." }).map((hit) => hit.spec.name)).to.deep.equal([
      "convert.slow",
      "convert.zippy",
    ]);
    expect(search.search("currencies", { prefix: "convert.", maxCost: 5 }).map((hit) => hit.spec.name)).to.deep.equal([
      "convert.zippy",
      "convert.slow",
    ]);
    expect(
      search.search("currencies", { prefix: "convert.", allowSideEffects: true }).map((hit) => hit.spec.name),
    ).to.deep.equal(["convert.zippy", "convert.slow"]);
    expect(
      search
        .search("currencies", { prefix: "convert.", maxCost: 5, useMetadataRanking: false })
        .map((hit) => hit.spec.name),
    ).to.deep.equal(["convert.slow", "convert.zippy"]);
  });

  it("keeps configured defaults when callers pass undefined options", () => {
    const limited = new ToolSearch({ catalog, reliability, defaults: { topK: 1 } });

    expect(limited.search("current weather", { topK: undefined })).to.have.length(1);
    expect(limited.search("current weather", { topK: 2 })).to.have.length(2);
  });

  it("logs a completion entry per search", () => {
    search.search("weather");

    expect(logger.entries).to.deep.equal([
      {
        level: "info",
        message: "tool_search_completed",
        payload: { strategy: "rule-based", query_length: 7, candidates: 2, returned: 2 },
      },
    ]);
  });

  it("exposes the search as the catalog.search tool with snake_case summaries", async () => {
    registerSearchTool(catalog, search);
    await captureRejection(() => catalog.execute("weather.alpha", { city: "Lyon" }));
    await captureRejection(() => catalog.execute("weather.alpha", { city: "Lyon" }));

    const result = await catalog.execute(SEARCH_TOOL_NAME, { query: "current weather", prefix: "weather.", top_k: 5 });

    expect(result.value).to.deep.equal([
      {
        name: "weather.beta",
        description: "Reports current weather",
        tags: [],
        cost: null,
        latency_hint_ms: null,
        side_effect: null,
        category: null,
        score: 1,
      },
      {
        name: "weather.alpha",
        description: "Reports current weather",
        tags: [],
        cost: null,
        latency_hint_ms: null,
        side_effect: null,
        category: null,
        score: 0.5,
      },
    ]);
    expect(catalog.get(SEARCH_TOOL_NAME).spec.metadata).to.include({ cost: 0, sideEffect: false, category: "catalog" });
  });
});
