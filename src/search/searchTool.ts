import { z } from "zod";

import type { Catalog } from "../catalog/catalog.js";
import { defineTool, type RegistrationOptions } from "../catalog/register.js";
import type { ToolSearch } from "./facade.js";

export const SEARCH_TOOL_NAME = "catalog.search";

const SearchParams = {
  query: z.string().describe("Free-text description of the capability wanted"),
  top_k: z.number().int().min(1).max(100).optional(),
  max_cost: z.number().min(0).optional(),
  latency_budget_ms: z.number().int().min(0).optional(),
  allow_side_effects: z.boolean().optional(),
  categories: z.array(z.string()).optional(),
  tags: z.array(z.string()).optional(),
  prefix: z.string().optional(),
  sort_by_failure: z.boolean().optional(),
};

/** Wire summary of a search hit; unknown metadata is reported as `null`. */
export interface SearchHitSummary {
  name: string;
  description: string;
  tags: string[];
  cost: number | null;
  latency_hint_ms: number | null;
  side_effect: boolean | null;
  category: string | null;
  score: number;
}

/**
 * Registers `catalog.search`, letting protocol clients discover tools by
 * relevance, constraints and recent reliability instead of exact name.
 */
export function registerSearchTool(
  catalog: Catalog,
  search: ToolSearch,
  options: Omit<RegistrationOptions, "catalog"> = {},
): void {
  defineTool(
    {
      name: SEARCH_TOOL_NAME,
      description: "Search the tool catalog by relevance, cost, latency and recent reliability",
      params: SearchParams,
      metadata: { cost: 0, latencyHintMs: 5, sideEffect: false, category: "catalog" },
      tags: ["search", "discovery"],
    },
    (args): SearchHitSummary[] =>
      search
        .search(args.query, {
          topK: args.top_k,
          maxCost: args.max_cost,
          latencyBudgetMs: args.latency_budget_ms,
          allowSideEffects: args.allow_side_effects,
          categories: args.categories,
          tags: args.tags,
          prefix: args.prefix,
          sortByFailure: args.sort_by_failure,
        })
        .map(({ spec, score }) => ({
          name: spec.name,
          description: spec.description,
          tags: [...spec.metadata.tags],
          cost: spec.metadata.cost ?? null,
          latency_hint_ms: spec.metadata.latencyHintMs ?? null,
          side_effect: spec.metadata.sideEffect ?? null,
          category: spec.metadata.category ?? null,
          score,
        })),
    { ...options, catalog },
  );
}
