import type { ContractNode, CallContract } from "../schema/contract.js";
import { validateArguments } from "../schema/validate.js";
import type { StructuredLogger } from "../logger.js";
import type { ReliabilityLog, ReliabilityOutcome } from "../reliability/log.js";
import { createRequestContext, type McpRequestContext } from "../protocol/context.js";
import { InMemorySessionStore, type SessionStore } from "../session/store.js";
import {
  DuplicateNameError,
  ExecutionError,
  InvalidArgumentsError,
  InvalidMetadataError,
  NotFoundError,
} from "./errors.js";
import type { ToolMetadata } from "./metadata.js";
import { maskSecrets } from "./secrets.js";

/** Dotted-segment identifiers such as `weather.query`. */
const TOOL_NAME_PATTERN = /^[A-Za-z0-9_-]+(\.[A-Za-z0-9_-]+)*$/;

interface SpecBase {
  readonly name: string;
  readonly description: string;
  readonly inputContract: CallContract;
  readonly outputContract?: ContractNode;
  readonly metadata: ToolMetadata;
}

export interface ToolSpec extends SpecBase {
  readonly kind: "tool";
}

/** Composite flow whose body chains catalog lookups through a pipeline context. */
export interface PipelineSpec extends SpecBase {
  readonly kind: "pipeline";
}

export type CatalogSpec = ToolSpec | PipelineSpec;

export interface ProgressUpdate {
  readonly progress: number;
  readonly total?: number;
  readonly message?: string;
}

export type ProgressListener = (update: ProgressUpdate) => void;

/** Second argument handed to every invocable. */
export interface InvocationExtras {
  readonly context: McpRequestContext;
  /** Forwards progress to streaming transports; a no-op elsewhere. */
  reportProgress(update: ProgressUpdate): void;
}

/** Invocables receive arguments that already satisfy the input contract. */
export type Invocable = (args: Record<string, unknown>, extras: InvocationExtras) => unknown;

export interface CatalogEntry {
  readonly spec: CatalogSpec;
  readonly invocable: Invocable;
}

export interface ExecuteOptions {
  readonly context?: McpRequestContext;
  readonly onProgress?: ProgressListener;
}

export interface ExecutionResult {
  readonly tool: string;
  readonly value: unknown;
  readonly durationMs: number;
}

export interface CatalogOptions {
  readonly logger?: Pick<StructuredLogger, "info" | "warn" | "error" | "debug">;
  /** Receives one outcome per execution of a registered entry. */
  readonly reliability?: Pick<ReliabilityLog, "record">;
  /** Store pipelines use for per-user state. */
  readonly sessionStore?: SessionStore;
  readonly clock?: () => number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Registry of tools and pipelines keyed by unique name. Registration is
 * synchronous and listing returns a copy, so concurrent searches always see a
 * consistent snapshot.
 */
export class Catalog {
  readonly sessionStore: SessionStore;
  private readonly entries = new Map<string, CatalogEntry>();
  private readonly logger?: CatalogOptions["logger"];
  private reliability?: Pick<ReliabilityLog, "record">;
  private readonly clock: () => number;

  constructor(options: CatalogOptions = {}) {
    this.logger = options.logger;
    this.reliability = options.reliability;
    this.sessionStore = options.sessionStore ?? new InMemorySessionStore();
    this.clock = options.clock ?? Date.now;
  }

  /** Attaches the reliability sink after construction (used by the lazily created default catalog). */
  useReliability(reliability: Pick<ReliabilityLog, "record">): void {
    this.reliability = reliability;
  }

  register(spec: CatalogSpec, invocable: Invocable): void {
    if (!TOOL_NAME_PATTERN.test(spec.name)) {
      throw new InvalidMetadataError(`tool name "${spec.name}" must be dot-separated segments of letters, digits, "_" or "-"`, {
        name: spec.name,
      });
    }
    if (!spec.description.trim()) {
      throw new InvalidMetadataError(`tool "${spec.name}" requires a description`, { name: spec.name });
    }
    if (this.entries.has(spec.name)) {
      throw new DuplicateNameError(spec.name);
    }
    this.entries.set(spec.name, Object.freeze({ spec: Object.freeze(spec), invocable }));
    this.logger?.debug("catalog_entry_registered", { name: spec.name, kind: spec.kind });
  }

  /** Removes an entry, returning whether one was present. */
  unregister(name: string): boolean {
    const removed = this.entries.delete(name);
    if (removed) {
      this.logger?.debug("catalog_entry_removed", { name });
    }
    return removed;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): CatalogEntry {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new NotFoundError(name);
    }
    return entry;
  }

  /** Registered specs in registration order. */
  list(): readonly CatalogSpec[] {
    return Object.freeze(Array.from(this.entries.values(), (entry) => entry.spec));
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Validates `args` against the entry's input contract, runs it and records
   * exactly one reliability outcome. Rejected arguments count as a failure;
   * unknown names are not recorded since there is no entry to attribute them to.
   */
  async execute(name: string, args: unknown, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    const entry = this.get(name);
    const context = options.context ?? createRequestContext("direct");
    const onProgress = options.onProgress;
    const extras: InvocationExtras = {
      context,
      reportProgress: (update) => onProgress?.(update),
    };
    const started = this.clock();
    let outcome: ReliabilityOutcome = "failure";

    try {
      const issues = validateArguments(entry.spec.inputContract, args);
      if (issues.length > 0 || !isRecord(args)) {
        throw new InvalidArgumentsError(name, issues);
      }
      this.logger?.debug("catalog_execute_started", { name, arguments: maskSecrets(args) });
      const value = await entry.invocable(args, extras);
      outcome = "success";
      return { tool: name, value, durationMs: Math.max(0, this.clock() - started) };
    } catch (error) {
      if (error instanceof InvalidArgumentsError && error.toolName === name) {
        throw error;
      }
      throw new ExecutionError(name, error);
    } finally {
      const finished = this.clock();
      this.logger?.info("catalog_execute_completed", { name, outcome, duration_ms: Math.max(0, finished - started) });
      await this.recordOutcome(name, outcome, finished);
    }
  }

  private async recordOutcome(name: string, outcome: ReliabilityOutcome, timestamp: number): Promise<void> {
    if (!this.reliability) {
      return;
    }
    try {
      await this.reliability.record(name, outcome, timestamp);
    } catch (error) {
      this.logger?.error("catalog_reliability_record_failed", {
        name,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

let defaultCatalog: Catalog | null = null;

/** Process-wide catalog created on first use, for zero-configuration setups. */
export function getDefaultCatalog(): Catalog {
  if (!defaultCatalog) {
    defaultCatalog = new Catalog();
  }
  return defaultCatalog;
}

/** Replaces (or discards) the process-wide catalog. Tests call it between cases. */
export function resetDefaultCatalog(next: Catalog | null = null): void {
  defaultCatalog = next;
}
