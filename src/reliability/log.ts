import { appendFile, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { z } from "zod";

import { PersistenceError } from "../catalog/errors.js";
import { DEFAULT_HALF_LIFE_MS, DEFAULT_SUCCESS_DILUTION, DEFAULT_WINDOW_MS } from "../config/runtime.js";
import { AsyncMutex } from "../infra/asyncMutex.js";
import type { StructuredLogger } from "../logger.js";

export type ReliabilityOutcome = "success" | "failure";

export interface ReliabilityEvent {
  readonly tool: string;
  /** Completion time in epoch milliseconds. */
  readonly timestamp: number;
  readonly outcome: ReliabilityOutcome;
}

/** Constants shaping {@link ReliabilityLog.failureScore}. */
export interface DecayPolicy {
  /** Age at which a failure counts half as much as a fresh one. */
  readonly halfLifeMs: number;
  /** Failures older than this contribute nothing. */
  readonly windowMs: number;
  /** How strongly each later success dilutes an earlier failure. */
  readonly successDilution: number;
}

export interface ReliabilityLogOptions extends Partial<DecayPolicy> {
  /** JSON Lines file mirroring the log. Omit for a memory-only log. */
  readonly file?: string | null;
  /** Events retained per tool; the oldest are dropped beyond this. */
  readonly maxEventsPerTool?: number;
  readonly logger?: Pick<StructuredLogger, "warn" | "error" | "debug">;
  readonly clock?: () => number;
}

const DEFAULT_MAX_EVENTS_PER_TOOL = 500;

const EventSchema = z.object({
  tool: z.string().min(1),
  timestamp: z.number().finite(),
  outcome: z.enum(["success", "failure"]),
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Append-only record of invocation outcomes with a time-decayed failure score.
 *
 * Events land in memory synchronously so scores reflect a `record` call
 * immediately; file appends are serialised through a mutex so lines never
 * interleave. An event waiting for its append is left out of compaction
 * rewrites, so every event reaches the file once. Storage failures surface as
 * logged {@link PersistenceError}s and never reject.
 */
export class ReliabilityLog {
  readonly policy: DecayPolicy;
  private readonly file: string | null;
  private readonly maxEventsPerTool: number;
  private readonly logger?: Pick<StructuredLogger, "warn" | "error" | "debug">;
  private readonly clock: () => number;
  private readonly byTool = new Map<string, ReliabilityEvent[]>();
  private readonly mutex = new AsyncMutex();
  /** Events recorded in memory whose file append has not run yet. */
  private readonly pendingAppends = new Set<ReliabilityEvent>();
  private directoryReady = false;

  constructor(options: ReliabilityLogOptions = {}) {
    this.policy = Object.freeze({
      halfLifeMs: options.halfLifeMs ?? DEFAULT_HALF_LIFE_MS,
      windowMs: options.windowMs ?? DEFAULT_WINDOW_MS,
      successDilution: options.successDilution ?? DEFAULT_SUCCESS_DILUTION,
    });
    this.file = options.file ?? null;
    this.maxEventsPerTool = Math.max(1, options.maxEventsPerTool ?? DEFAULT_MAX_EVENTS_PER_TOOL);
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
  }

  /** Appends one outcome. The promise settles once the event is persisted (or the failure logged). */
  record(tool: string, outcome: ReliabilityOutcome, timestamp: number = this.clock()): Promise<void> {
    const event: ReliabilityEvent = Object.freeze({ tool, timestamp, outcome });
    this.insert(event);
    const file = this.file;
    if (!file) {
      return Promise.resolve();
    }
    this.pendingAppends.add(event);
    return this.mutex.runExclusive(async () => {
      try {
        await this.ensureDirectory(file);
        await appendFile(file, `${JSON.stringify(event)}\n`, "utf8");
      } catch (error) {
        this.reportPersistenceError(new PersistenceError("append", file, error));
      } finally {
        this.pendingAppends.delete(event);
      }
    });
  }

  /**
   * Decay-weighted failure count at `now`:
   * `Σ 0.5^(age / halfLife) / (1 + dilution × successesSince)` over failures
   * younger than the window. Adding a failure never lowers the score and
   * letting time pass never raises it.
   */
  failureScore(tool: string, now: number = this.clock()): number {
    const events = this.byTool.get(tool);
    if (!events) {
      return 0;
    }
    const { halfLifeMs, windowMs, successDilution } = this.policy;
    let score = 0;
    for (const failure of events) {
      if (failure.outcome !== "failure") {
        continue;
      }
      const age = Math.max(0, now - failure.timestamp);
      if (age > windowMs) {
        continue;
      }
      let successesSince = 0;
      for (const event of events) {
        if (event.outcome === "success" && event.timestamp > failure.timestamp && event.timestamp <= now) {
          successesSince += 1;
        }
      }
      score += 0.5 ** (age / halfLifeMs) / (1 + successDilution * successesSince);
    }
    return score;
  }

  /** Snapshot of the retained events, for one tool or all of them, oldest first. */
  events(tool?: string): ReliabilityEvent[] {
    if (tool !== undefined) {
      return [...(this.byTool.get(tool) ?? [])];
    }
    return [...this.byTool.values()].flat().sort((a, b) => a.timestamp - b.timestamp);
  }

  /**
   * Replays the persisted file into memory. Malformed lines are skipped;
   * a missing file is an empty log. Returns the number of events loaded.
   */
  async load(): Promise<number> {
    const file = this.file;
    if (!file) {
      return 0;
    }
    let content: string;
    try {
      content = await readFile(file, "utf8");
    } catch (error) {
      if (!isMissingFile(error)) {
        this.reportPersistenceError(new PersistenceError("load", file, error));
      }
      return 0;
    }

    let loaded = 0;
    const lines = content.split("\n");
    for (let index = 0; index < lines.length; index += 1) {
      const line = lines[index]?.trim();
      if (!line) {
        continue;
      }
      const event = parseEventLine(line);
      if (!event) {
        this.logger?.warn("reliability_log_line_skipped", { file, line: index + 1 });
        continue;
      }
      this.insert(Object.freeze(event));
      loaded += 1;
    }
    this.logger?.debug("reliability_log_loaded", { file, events: loaded });
    return loaded;
  }

  /**
   * Drops events that can no longer influence any score at `now` and
   * rewrites the file with the survivors.
   */
  async compact(now: number = this.clock()): Promise<number> {
    await this.mutex.runExclusive(async () => {
      for (const [tool, events] of this.byTool) {
        const kept = events.filter((event) => now - event.timestamp <= this.policy.windowMs);
        if (kept.length === 0) {
          this.byTool.delete(tool);
        } else {
          this.byTool.set(tool, kept);
        }
      }
      const file = this.file;
      if (!file) {
        return;
      }
      const body = this.events()
        .filter((event) => !this.pendingAppends.has(event))
        .map((event) => `${JSON.stringify(event)}\n`)
        .join("");
      const temporary = `${file}.tmp`;
      try {
        await this.ensureDirectory(file);
        await writeFile(temporary, body, "utf8");
        await rename(temporary, file);
      } catch (error) {
        this.reportPersistenceError(new PersistenceError("compact", file, error));
      }
    });
    return this.events().length;
  }

  /** Resolves once every pending file write has completed. */
  async flush(): Promise<void> {
    await this.mutex.runExclusive(() => undefined);
  }

  private insert(event: ReliabilityEvent): void {
    let events = this.byTool.get(event.tool);
    if (!events) {
      events = [];
      this.byTool.set(event.tool, events);
    }
    events.push(event);
    const previous = events[events.length - 2];
    if (previous && previous.timestamp > event.timestamp) {
      events.sort((a, b) => a.timestamp - b.timestamp);
    }
    if (events.length > this.maxEventsPerTool) {
      events.splice(0, events.length - this.maxEventsPerTool);
    }
  }

  private async ensureDirectory(file: string): Promise<void> {
    if (this.directoryReady) {
      return;
    }
    await mkdir(dirname(file), { recursive: true });
    this.directoryReady = true;
  }

  private reportPersistenceError(error: PersistenceError): void {
    this.logger?.error("reliability_log_persistence_failed", {
      operation: error.operation,
      path: error.path,
      message: error.message,
    });
  }
}

function parseEventLine(line: string): ReliabilityEvent | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = EventSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
