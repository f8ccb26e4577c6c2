import { z } from "zod";

import { InvalidMetadataError } from "./errors.js";

/**
 * Normalised descriptive metadata attached to every catalog entry. Unset
 * fields stay `undefined`, meaning "unknown"; constrained searches never
 * exclude an entry because of an unknown value.
 */
export interface ToolMetadata {
  readonly cost?: number;
  readonly latencyHintMs?: number;
  readonly sideEffect?: boolean;
  readonly category?: string;
  readonly tags: readonly string[];
  /** Keys the catalog does not interpret, preserved for forward compatibility. */
  readonly extra: Readonly<Record<string, unknown>>;
}

/** Metadata as accepted at registration, before normalisation. */
export interface ToolMetadataInput {
  readonly cost?: number | string | null;
  readonly latencyHintMs?: number | string | null;
  readonly sideEffect?: boolean | null;
  readonly category?: string | null;
  readonly tags?: readonly string[];
  readonly [key: string]: unknown;
}

const KNOWN_KEYS = new Set(["cost", "latencyHintMs", "sideEffect", "category", "tags"]);

const numericInput = z.union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())]).nullish();

const MetadataInputSchema = z.object({
  cost: numericInput.pipe(z.number().nonnegative().nullish()),
  latencyHintMs: numericInput.pipe(z.number().nonnegative().nullish()),
  sideEffect: z.boolean().nullish(),
  category: z.string().nullish(),
  tags: z.array(z.string()).optional(),
});

/**
 * Trims tag entries, drops blanks and duplicates, and sorts the result so two
 * registrations with the same tags in a different order normalise equally.
 */
export function sanitiseTags(tags?: readonly string[] | null): string[] {
  if (!tags || tags.length === 0) {
    return [];
  }
  const seen = new Set<string>();
  for (const raw of tags) {
    const trimmed = raw.trim();
    if (trimmed) {
      seen.add(trimmed);
    }
  }
  return [...seen].sort();
}

/**
 * Normalises registration metadata. Numeric strings are accepted for cost and
 * latency (latency is rounded to whole milliseconds), `tags` passed separately
 * are merged with `raw.tags`, and unknown keys move to `extra`.
 */
export function normaliseMetadata(raw: ToolMetadataInput = {}, tags: readonly string[] = []): ToolMetadata {
  const known: Record<string, unknown> = {};
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (KNOWN_KEYS.has(key)) {
      known[key] = value;
    } else if (value !== undefined) {
      extra[key] = value;
    }
  }

  const parsed = MetadataInputSchema.safeParse(known);
  if (!parsed.success) {
    throw new InvalidMetadataError(
      `invalid tool metadata: ${parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")}`,
      { issues: parsed.error.issues },
    );
  }

  const { cost, latencyHintMs, sideEffect, category } = parsed.data;
  const trimmedCategory = category?.trim();
  return {
    ...(cost != null ? { cost } : {}),
    ...(latencyHintMs != null ? { latencyHintMs: Math.round(latencyHintMs) } : {}),
    ...(sideEffect != null ? { sideEffect } : {}),
    ...(trimmedCategory ? { category: trimmedCategory } : {}),
    tags: sanitiseTags([...(parsed.data.tags ?? []), ...tags]),
    extra,
  };
}
