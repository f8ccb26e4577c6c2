import { type Catalog, getDefaultCatalog } from "../catalog/catalog.js";
import type { StructuredLogger } from "../logger.js";
import type { ReliabilityLog } from "../reliability/log.js";
import { hasMetadataConstraints, type SelectionOptions } from "../selection/options.js";
import { type RankedTool, RuleBasedStrategy, type SelectionStrategy } from "../selection/strategies.js";

export interface ToolSearchOptions {
  readonly catalog?: Catalog;
  /** Source of failure scores; every entry scores 0 without one. */
  readonly reliability?: Pick<ReliabilityLog, "failureScore">;
  readonly strategy?: SelectionStrategy;
  readonly defaults?: SelectionOptions;
  readonly logger?: Pick<StructuredLogger, "info">;
  readonly clock?: () => number;
}

function withoutUndefined(options: SelectionOptions): SelectionOptions {
  return Object.fromEntries(Object.entries(options).filter(([, value]) => value !== undefined));
}

/**
 * Ranks catalog entries for a free-text query. Each call works on its own
 * snapshot of the catalog and evaluates every failure score at a single
 * instant, so concurrent registrations never produce a torn result.
 */
export class ToolSearch {
  private readonly catalog: Catalog;
  private readonly reliability?: Pick<ReliabilityLog, "failureScore">;
  private readonly strategy: SelectionStrategy;
  private readonly defaults: SelectionOptions;
  private readonly logger?: Pick<StructuredLogger, "info">;
  private readonly clock: () => number;

  constructor(options: ToolSearchOptions = {}) {
    this.catalog = options.catalog ?? getDefaultCatalog();
    this.reliability = options.reliability;
    this.strategy = options.strategy ?? new RuleBasedStrategy();
    this.defaults = options.defaults ?? {};
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
  }

  search(query: string, options: SelectionOptions = {}): RankedTool[] {
    const merged: SelectionOptions = { ...this.defaults, ...withoutUndefined(options) };
    // Constrained searches favour cheap and fast entries among equals unless
    // the caller opted out explicitly.
    const resolved: SelectionOptions =
      merged.useMetadataRanking === undefined && hasMetadataConstraints(merged)
        ? { ...merged, useMetadataRanking: true }
        : merged;

    const started = this.clock();
    const candidates = this.catalog.list();
    const reliability = this.reliability;
    const results = this.strategy.select({
      query,
      candidates,
      options: resolved,
      failureScore: reliability ? (name, now) => reliability.failureScore(name, now) : () => 0,
      now: started,
    });
    this.logger?.info("tool_search_completed", {
      strategy: this.strategy.name,
      query_length: query.length,
      candidates: candidates.length,
      returned: results.length,
    });
    return results;
  }
}
