/**
 * Server-Sent Events framing plus the per-connection ordering guard used by
 * the streaming invoke endpoint.
 */

/**
 * Serialises a payload onto a single `data:` line. JSON leaves U+2028/U+2029
 * untouched, and some SSE parsers treat them as record delimiters, so they are
 * escaped along with any stray carriage returns or line feeds.
 */
export function serialiseForSse(payload: unknown): string {
  return escapeForSse(JSON.stringify(payload ?? null));
}

/** Escapes already-encoded JSON so it fits on a single `data:` line. */
export function escapeForSse(json: string): string {
  return json
    .replace(/\r/g, "\\r")
    .replace(/\n/g, "\\n")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

/** Formats one SSE record. `data` must already be a single line. */
export function formatSseEvent(event: string, data: string, id?: string): string {
  return `${id !== undefined ? `id: ${id}\n` : ""}event: ${event}\ndata: ${data}\n\n`;
}

export type StreamEventName = "progress" | "result" | "error" | "done";

/** Raised when a stream would emit events out of the `progress* → result|error → done` order. */
export class StreamOrderError extends Error {
  readonly code = "E_STREAM_ORDER" as const;

  constructor(
    readonly attempted: StreamEventName,
    readonly state: SseStreamState,
  ) {
    super(`cannot emit "${attempted}" while the stream is ${state}`);
    this.name = "StreamOrderError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type SseStreamState = "open" | "terminated" | "closed";

/** Writable surface the stream needs from an HTTP response. */
export interface SseSink {
  write(chunk: string): unknown;
  end(): unknown;
}

/**
 * Enforces the streaming contract for one connection: zero or more `progress`
 * events, exactly one terminal `result` or `error`, then `done`, after which
 * the sink is ended. Violations throw {@link StreamOrderError}. When the peer
 * disconnects, later writes are dropped but ordering is still checked.
 */
export class SseStream {
  private state: SseStreamState = "open";
  private sequence = 0;
  private detached = false;

  constructor(private readonly sink: SseSink) {}

  get currentState(): SseStreamState {
    return this.state;
  }

  progress(payload: unknown): void {
    this.assertState("progress", "open");
    this.emit("progress", payload);
  }

  result(payload: unknown): void {
    this.assertState("result", "open");
    this.emit("result", payload);
    this.state = "terminated";
  }

  error(payload: unknown): void {
    this.assertState("error", "open");
    this.emit("error", payload);
    this.state = "terminated";
  }

  /** Emits the closing `done` event and ends the sink. */
  done(): void {
    this.assertState("done", "terminated");
    this.state = "closed";
    this.emit("done", {});
    if (!this.detached) {
      this.sink.end();
    }
  }

  /** Marks the peer as gone; subsequent events are no longer written. */
  detach(): void {
    this.detached = true;
  }

  private assertState(event: StreamEventName, expected: SseStreamState): void {
    if (this.state !== expected) {
      throw new StreamOrderError(event, this.state);
    }
  }

  private emit(event: StreamEventName, payload: unknown): void {
    const data = serialiseForSse(payload);
    this.sequence += 1;
    if (!this.detached) {
      this.sink.write(formatSseEvent(event, data, String(this.sequence)));
    }
  }
}
