import type { CatalogSpec } from "../catalog/catalog.js";
import { DEFAULT_TOP_K } from "../config/runtime.js";

/**
 * Constraints and ranking switches for a search. Every constraint skips
 * entries whose corresponding metadata is unknown rather than excluding them.
 */
export interface SelectionOptions {
  readonly topK?: number;
  readonly maxCost?: number;
  readonly latencyBudgetMs?: number;
  /** `false` excludes entries declaring side effects. */
  readonly allowSideEffects?: boolean;
  /** OR-matched against the entry category. */
  readonly categories?: readonly string[];
  /** Every listed tag must be present. */
  readonly tags?: readonly string[];
  /** Restricts results to names starting with this prefix. */
  readonly prefix?: string;
  /** Among equal scores, prefer the entry with the lower failure score. */
  readonly sortByFailure?: boolean;
  /** Among equal scores, prefer lower cost, then lower latency hint. */
  readonly useMetadataRanking?: boolean;
}

export function resolveTopK(options: SelectionOptions): number {
  const topK = options.topK ?? DEFAULT_TOP_K;
  return Number.isFinite(topK) ? Math.max(0, Math.floor(topK)) : DEFAULT_TOP_K;
}

/**
 * Whether any metadata constraint (as opposed to a ranking switch) is set.
 * An explicit `allowSideEffects`, `true` included, counts as one.
 */
export function hasMetadataConstraints(options: SelectionOptions): boolean {
  return (
    options.maxCost !== undefined ||
    options.latencyBudgetMs !== undefined ||
    options.allowSideEffects !== undefined ||
    (options.categories?.length ?? 0) > 0
  );
}

/** Returns `true` when `spec` violates none of the defined constraints. */
export function matchesConstraints(spec: CatalogSpec, options: SelectionOptions): boolean {
  const { metadata } = spec;
  if (options.prefix && !spec.name.startsWith(options.prefix)) {
    return false;
  }
  if (options.tags && !options.tags.every((tag) => metadata.tags.includes(tag))) {
    return false;
  }
  if (options.maxCost !== undefined && metadata.cost !== undefined && metadata.cost > options.maxCost) {
    return false;
  }
  if (
    options.latencyBudgetMs !== undefined &&
    metadata.latencyHintMs !== undefined &&
    metadata.latencyHintMs > options.latencyBudgetMs
  ) {
    return false;
  }
  if (options.allowSideEffects === false && metadata.sideEffect === true) {
    return false;
  }
  if (
    options.categories &&
    options.categories.length > 0 &&
    metadata.category !== undefined &&
    !options.categories.includes(metadata.category)
  ) {
    return false;
  }
  return true;
}
