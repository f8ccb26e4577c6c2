import { AsyncLocalStorage } from "node:async_hooks";

/**
 * Correlation fields attached to every log entry emitted while a request is
 * being handled. Transports and the protocol core populate the store so tool
 * handlers and the catalog do not have to thread identifiers manually.
 */
export interface RequestCorrelation {
  readonly requestId?: string | number | null;
  readonly method?: string;
  readonly transport?: string;
  readonly userId?: string;
  readonly sessionId?: string | null;
}

const storage = new AsyncLocalStorage<RequestCorrelation>();

/**
 * Executes the callback with the supplied correlation exposed through
 * AsyncLocalStorage. Fields already present in an enclosing scope are kept
 * unless the new correlation overrides them.
 */
export function runWithRequestContext<T>(correlation: RequestCorrelation, callback: () => T): T {
  const parent = storage.getStore();
  return storage.run(parent ? { ...parent, ...correlation } : correlation, callback);
}

/** Retrieves the correlation associated with the current async execution. */
export function getRequestContext(): RequestCorrelation | undefined {
  return storage.getStore();
}
