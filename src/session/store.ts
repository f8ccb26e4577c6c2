/**
 * Per-user key/value state shared across requests. The protocol core never
 * owns this state; pipelines reach it through their context using the
 * caller's `(userId, sessionId)` scope, so concurrent sessions never observe
 * each other's values.
 */
export interface SessionScope {
  readonly userId: string;
  readonly sessionId?: string | null;
}

export interface SessionStore {
  get(scope: SessionScope, key: string): unknown;
  set(scope: SessionScope, key: string, value: unknown): void;
  delete(scope: SessionScope, key: string): boolean;
  /** Drops every value recorded for the scope. */
  clear(scope: SessionScope): void;
}

function scopeKey(scope: SessionScope): string {
  return `${scope.userId}\u0000${scope.sessionId ?? ""}`;
}

/** Process-local {@link SessionStore} backed by nested maps. */
export class InMemorySessionStore implements SessionStore {
  private readonly scopes = new Map<string, Map<string, unknown>>();

  get(scope: SessionScope, key: string): unknown {
    return this.scopes.get(scopeKey(scope))?.get(key);
  }

  set(scope: SessionScope, key: string, value: unknown): void {
    const id = scopeKey(scope);
    let values = this.scopes.get(id);
    if (!values) {
      values = new Map();
      this.scopes.set(id, values);
    }
    values.set(key, value);
  }

  delete(scope: SessionScope, key: string): boolean {
    return this.scopes.get(scopeKey(scope))?.delete(key) ?? false;
  }

  clear(scope: SessionScope): void {
    this.scopes.delete(scopeKey(scope));
  }

  /** Number of scopes currently holding at least one value. */
  get size(): number {
    return this.scopes.size;
  }
}
