import type { CatalogSpec } from "../catalog/catalog.js";
import { DEFAULT_FAILURE_WEIGHT } from "../config/runtime.js";
import { matchesConstraints, resolveTopK, type SelectionOptions } from "./options.js";
import {
  combineScorers,
  lexicalScorer,
  type RelevanceScorer,
  ruleBasedScorer,
  termVectorScorer,
  type WeightedScorer,
} from "./relevance.js";

export interface SelectionInput {
  readonly query: string;
  readonly candidates: readonly CatalogSpec[];
  readonly options: SelectionOptions;
  readonly failureScore: (name: string, now: number) => number;
  readonly now: number;
}

export interface RankedTool {
  readonly spec: CatalogSpec;
  /** `relevance − failureWeight × failureScore`. */
  readonly score: number;
  readonly relevance: number;
  readonly failureScore: number;
}

/** Pluggable ranking policy. Implementations must be pure over their input. */
export interface SelectionStrategy {
  readonly name: string;
  select(input: SelectionInput): RankedTool[];
}

export interface ScoringStrategyOptions {
  /** Penalty applied per unit of failure score. */
  readonly failureWeight?: number;
}

/** Unknown values sort after every known one. */
function compareKnownFirst(left: number | undefined, right: number | undefined): number {
  if (left === right) {
    return 0;
  }
  if (left === undefined) {
    return 1;
  }
  if (right === undefined) {
    return -1;
  }
  return left - right;
}

function compareNames(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

/**
 * Shared filter → score → sort → truncate pipeline. Subclasses only supply
 * the relevance function.
 */
abstract class ScoringStrategy implements SelectionStrategy {
  abstract readonly name: string;
  protected readonly failureWeight: number;

  protected constructor(options: ScoringStrategyOptions) {
    this.failureWeight = Math.max(0, options.failureWeight ?? DEFAULT_FAILURE_WEIGHT);
  }

  protected abstract relevance(query: string, spec: CatalogSpec): number;

  select(input: SelectionInput): RankedTool[] {
    const { options } = input;
    const ranked = input.candidates
      .filter((spec) => matchesConstraints(spec, options))
      .map((spec): RankedTool => {
        const relevance = this.relevance(input.query, spec);
        const failureScore = input.failureScore(spec.name, input.now);
        return { spec, relevance, failureScore, score: relevance - this.failureWeight * failureScore };
      });

    ranked.sort(
      (left, right) =>
        right.score - left.score ||
        (options.sortByFailure ? left.failureScore - right.failureScore : 0) ||
        (options.useMetadataRanking
          ? compareKnownFirst(left.spec.metadata.cost, right.spec.metadata.cost) ||
            compareKnownFirst(left.spec.metadata.latencyHintMs, right.spec.metadata.latencyHintMs)
          : 0) ||
        compareNames(left.spec.name, right.spec.name),
    );
    return ranked.slice(0, resolveTopK(options));
  }
}

/**
 * Verbatim-substring or token-coverage relevance, penalised by recent
 * failures.
 */
export class RuleBasedStrategy extends ScoringStrategy {
  readonly name = "rule-based";
  private readonly scorer: RelevanceScorer;

  constructor(options: ScoringStrategyOptions & { scorer?: RelevanceScorer } = {}) {
    super(options);
    this.scorer = options.scorer ?? ruleBasedScorer;
  }

  protected relevance(query: string, spec: CatalogSpec): number {
    return this.scorer.score(query, spec);
  }
}

export const DEFAULT_HYBRID_SCORERS: readonly WeightedScorer[] = [
  { scorer: lexicalScorer, weight: 0.6 },
  { scorer: termVectorScorer, weight: 0.4 },
];

/** Weighted blend of several relevance scorers (lexical and term-vector by default). */
export class HybridStrategy extends ScoringStrategy {
  readonly name = "hybrid";
  private readonly scorer: RelevanceScorer;

  constructor(options: ScoringStrategyOptions & { scorers?: readonly WeightedScorer[] } = {}) {
    super(options);
    this.scorer = combineScorers(options.scorers ?? DEFAULT_HYBRID_SCORERS);
  }

  protected relevance(query: string, spec: CatalogSpec): number {
    return this.scorer.score(query, spec);
  }
}
