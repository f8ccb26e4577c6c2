import { distance as levenshteinDistance } from "fastest-levenshtein";

import type { CatalogSpec } from "../catalog/catalog.js";

/**
 * Scores how well a catalog entry answers a free-text query, in `[0, 1]`.
 * Strategies only rely on the score being totally ordered.
 */
export interface RelevanceScorer {
  readonly name: string;
  score(query: string, spec: CatalogSpec): number;
}

/** Bounds the fuzzy comparisons made per query token. */
const MAX_FUZZY_CANDIDATES = 64;

/** Searchable text of an entry: name, description and tags. */
export function searchableText(spec: CatalogSpec): string {
  return [spec.name, spec.description, ...spec.metadata.tags].join(" ");
}

export function tokenise(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .map((token) => token.trim())
    .filter((token) => token.length > 1);
}

function clampScore(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.min(1, value));
}

/** Maps a normalised edit similarity onto a bounded contribution. */
function scoreForSimilarity(similarity: number): number {
  if (similarity >= 0.97) {
    return 1;
  }
  if (similarity >= 0.9) {
    return 0.75;
  }
  if (similarity >= 0.8) {
    return 0.5;
  }
  if (similarity >= 0.7) {
    return 0.3;
  }
  if (similarity >= 0.6) {
    return 0.1;
  }
  return 0;
}

function bestTokenSimilarity(token: string, candidates: readonly string[]): number {
  let best = 0;
  for (const candidate of candidates.slice(0, MAX_FUZZY_CANDIDATES)) {
    const maxLength = Math.max(token.length, candidate.length);
    const similarity = 1 - levenshteinDistance(token, candidate) / maxLength;
    if (similarity > best) {
      best = similarity;
    }
  }
  return best;
}

/**
 * Share of query tokens found in the text. Exact token hits count fully,
 * near misses (typos, inflections) count partially via edit distance.
 */
export function lexicalCoverage(queryTokens: readonly string[], text: string): number {
  if (queryTokens.length === 0) {
    return 0;
  }
  const tokens = tokenise(text);
  if (tokens.length === 0) {
    return 0;
  }
  const unique = new Set(tokens);
  let contribution = 0;
  for (const token of queryTokens) {
    contribution += unique.has(token) ? 1 : scoreForSimilarity(bestTokenSimilarity(token, tokens));
  }
  return clampScore(contribution / queryTokens.length);
}

/**
 * Rule-based relevance: 0 for a blank query, 1 when the query appears
 * verbatim (case-insensitively) in the searchable text, token coverage
 * otherwise.
 */
export const ruleBasedScorer: RelevanceScorer = {
  name: "rule-based",
  score(query, spec) {
    const needle = query.trim().toLowerCase();
    if (!needle) {
      return 0;
    }
    const haystack = searchableText(spec).toLowerCase();
    if (haystack.includes(needle)) {
      return 1;
    }
    return lexicalCoverage(tokenise(needle), haystack);
  },
};

/** Token coverage without the verbatim shortcut. */
export const lexicalScorer: RelevanceScorer = {
  name: "lexical",
  score(query, spec) {
    return lexicalCoverage(tokenise(query), searchableText(spec));
  },
};

type TermVector = ReadonlyMap<string, number>;

/** Term-frequency vector normalised by token count. */
export function termFrequencies(tokens: readonly string[]): TermVector {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  const frequencies = new Map<string, number>();
  for (const [token, count] of counts) {
    frequencies.set(token, count / tokens.length);
  }
  return frequencies;
}

function norm(vector: TermVector): number {
  let sum = 0;
  for (const value of vector.values()) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

export function cosineSimilarity(left: TermVector, right: TermVector): number {
  const leftNorm = norm(left);
  const rightNorm = norm(right);
  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }
  let dot = 0;
  for (const [token, weight] of left) {
    dot += weight * (right.get(token) ?? 0);
  }
  return clampScore(dot / (leftNorm * rightNorm));
}

/** Bag-of-words cosine similarity between the query and the searchable text. */
export const termVectorScorer: RelevanceScorer = {
  name: "term-vector",
  score(query, spec) {
    return cosineSimilarity(termFrequencies(tokenise(query)), termFrequencies(tokenise(searchableText(spec))));
  },
};

export interface WeightedScorer {
  readonly scorer: RelevanceScorer;
  readonly weight: number;
}

/** Weighted average of several scorers; weights need not sum to one. */
export function combineScorers(parts: readonly WeightedScorer[]): RelevanceScorer {
  const totalWeight = parts.reduce((sum, part) => sum + Math.max(0, part.weight), 0);
  return {
    name: parts.map((part) => part.scorer.name).join("+"),
    score(query, spec) {
      if (totalWeight === 0) {
        return 0;
      }
      let sum = 0;
      for (const part of parts) {
        sum += Math.max(0, part.weight) * part.scorer.score(query, spec);
      }
      return clampScore(sum / totalWeight);
    },
  };
}
