import type { Catalog, InvocationExtras, ProgressUpdate } from "../catalog/catalog.js";
import type { McpRequestContext } from "../protocol/context.js";
import type { SessionStore } from "../session/store.js";

/** One catalog call made by a pipeline body. */
export interface PipelineStep {
  readonly tool: string;
  readonly ok: boolean;
  readonly durationMs: number;
}

export interface PipelineContextOptions {
  readonly catalog: Catalog;
  readonly sessionStore: SessionStore;
  readonly extras: InvocationExtras;
}

/**
 * Mutable context passed by reference through every step of one pipeline
 * execution. `state` lives only as long as the run; session values persist
 * in the store under the caller's user/session scope.
 */
export class PipelineContext {
  /** Scratch values shared between steps of this run. */
  readonly state = new Map<string, unknown>();
  private readonly catalog: Catalog;
  private readonly sessionStore: SessionStore;
  private readonly extras: InvocationExtras;
  private readonly history: PipelineStep[] = [];

  constructor(options: PipelineContextOptions) {
    this.catalog = options.catalog;
    this.sessionStore = options.sessionStore;
    this.extras = options.extras;
  }

  get request(): McpRequestContext {
    return this.extras.context;
  }

  get userId(): string {
    return this.extras.context.userId;
  }

  /** Steps executed so far, in order. */
  get steps(): readonly PipelineStep[] {
    return [...this.history];
  }

  getSession(key: string): unknown {
    return this.sessionStore.get(this.request, key);
  }

  setSession(key: string, value: unknown): void {
    this.sessionStore.set(this.request, key, value);
  }

  reportProgress(update: ProgressUpdate): void {
    this.extras.reportProgress(update);
  }

  /**
   * Runs another catalog entry with the same request context. The step is
   * recorded whether it succeeds or not and errors propagate unchanged.
   */
  async invoke(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
    try {
      const result = await this.catalog.execute(name, args, {
        context: this.extras.context,
        onProgress: (update) => this.extras.reportProgress(update),
      });
      this.history.push({ tool: name, ok: true, durationMs: result.durationMs });
      return result.value;
    } catch (error) {
      this.history.push({ tool: name, ok: false, durationMs: 0 });
      throw error;
    }
  }
}
