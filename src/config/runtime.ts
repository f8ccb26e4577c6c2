import { z } from "zod";

import { LOG_LEVELS } from "../logger.js";
import {
  type EnvSource,
  readBool,
  readEnum,
  readInt,
  readNumber,
  readOptionalString,
  readString,
} from "./env.js";

export const TRANSPORT_KINDS = ["stdio", "http"] as const;
export const SEARCH_STRATEGIES = ["rule", "hybrid"] as const;

const RuntimeConfigSchema = z
  .object({
    transport: z.enum(TRANSPORT_KINDS),
    server: z.object({
      name: z.string().min(1),
      version: z.string().min(1),
    }),
    http: z.object({
      host: z.string().min(1),
      port: z.number().int().min(0).max(65_535),
    }),
    logging: z.object({
      level: z.enum(LOG_LEVELS),
      file: z.string().min(1).nullable(),
      redact: z.boolean(),
    }),
    reliability: z.object({
      file: z.string().min(1).nullable(),
      halfLifeMs: z.number().positive(),
      windowMs: z.number().positive(),
      successDilution: z.number().min(0),
    }),
    search: z.object({
      strategy: z.enum(SEARCH_STRATEGIES),
      failureWeight: z.number().min(0),
      topK: z.number().int().positive(),
    }),
  })
  .strict();

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

/** Default reliability decay: failures halve in weight every ten minutes. */
export const DEFAULT_HALF_LIFE_MS = 10 * 60_000;
/** Failures older than an hour no longer contribute to the score. */
export const DEFAULT_WINDOW_MS = 60 * 60_000;
export const DEFAULT_SUCCESS_DILUTION = 0.5;
export const DEFAULT_FAILURE_WEIGHT = 0.25;
export const DEFAULT_TOP_K = 10;

/**
 * Builds the runtime configuration from `TOOLBRIDGE_*` environment variables.
 * Malformed individual values fall back to their defaults; the assembled
 * object is then validated as a whole so cross-field mistakes (e.g. a window
 * shorter than the half-life) surface at startup.
 */
export function loadRuntimeConfig(env: EnvSource = process.env): RuntimeConfig {
  const halfLifeMs = readNumber("TOOLBRIDGE_RELIABILITY_HALF_LIFE_MS", DEFAULT_HALF_LIFE_MS, { min: 1 }, env);
  const windowMs = readNumber("TOOLBRIDGE_RELIABILITY_WINDOW_MS", DEFAULT_WINDOW_MS, { min: 1 }, env);

  const candidate = {
    transport: readEnum("TOOLBRIDGE_TRANSPORT", TRANSPORT_KINDS, "stdio", env),
    server: {
      name: readString("TOOLBRIDGE_SERVER_NAME", "toolbridge", env),
      version: readString("TOOLBRIDGE_SERVER_VERSION", "0.1.0", env),
    },
    http: {
      host: readString("TOOLBRIDGE_HTTP_HOST", "127.0.0.1", env),
      port: readInt("TOOLBRIDGE_HTTP_PORT", 8765, { min: 0, max: 65_535 }, env),
    },
    logging: {
      level: readEnum("TOOLBRIDGE_LOG_LEVEL", LOG_LEVELS, "info", env),
      file: readOptionalString("TOOLBRIDGE_LOG_FILE", env) ?? null,
      redact: readBool("TOOLBRIDGE_LOG_REDACT", false, env),
    },
    reliability: {
      file: readOptionalString("TOOLBRIDGE_RELIABILITY_FILE", env) ?? null,
      halfLifeMs,
      windowMs,
      successDilution: readNumber("TOOLBRIDGE_RELIABILITY_DILUTION", DEFAULT_SUCCESS_DILUTION, { min: 0 }, env),
    },
    search: {
      strategy: readEnum("TOOLBRIDGE_SEARCH_STRATEGY", SEARCH_STRATEGIES, "rule", env),
      failureWeight: readNumber("TOOLBRIDGE_SEARCH_FAILURE_WEIGHT", DEFAULT_FAILURE_WEIGHT, { min: 0 }, env),
      topK: readInt("TOOLBRIDGE_SEARCH_TOP_K", DEFAULT_TOP_K, { min: 1 }, env),
    },
  };

  const parsed = RuntimeConfigSchema.superRefine((config, ctx) => {
    if (config.reliability.windowMs < config.reliability.halfLifeMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["reliability", "windowMs"],
        message: "reliability window must be at least one half-life long",
      });
    }
  }).safeParse(candidate);

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`invalid runtime configuration: ${details}`);
  }
  return parsed.data;
}
