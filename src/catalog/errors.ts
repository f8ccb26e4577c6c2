/**
 * Domain errors raised by the schema engine, the catalog and the reliability
 * log. Each carries a stable string `code` so callers (the protocol core in
 * particular) can map them without inspecting messages.
 */
export abstract class CatalogError extends Error {
  abstract readonly code: string;
  readonly details?: unknown;

  protected constructor(message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Non-fatal notice emitted when a declared type has no converter and the
 * schema engine fell back to a free-form string. Never thrown; the catalog
 * logs it at registration.
 */
export class SchemaDegradedWarning extends Error {
  readonly code = "W_SCHEMA_DEGRADED" as const;

  constructor(
    readonly path: readonly string[],
    readonly declaredType: string,
  ) {
    super(`no contract rule for ${declaredType} at ${path.length > 0 ? path.join(".") : "<root>"}; using string`);
    this.name = "SchemaDegradedWarning";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised when a tool or pipeline is registered under a name already in use. */
export class DuplicateNameError extends CatalogError {
  readonly code = "E_DUPLICATE_NAME" as const;

  constructor(readonly toolName: string) {
    super(`tool "${toolName}" is already registered`, { name: toolName });
  }
}

/** Raised when a lookup targets a name the catalog does not know. */
export class NotFoundError extends CatalogError {
  readonly code = "E_NOT_FOUND" as const;

  constructor(readonly toolName: string) {
    super(`tool "${toolName}" is not registered`, { name: toolName });
  }
}

/** Raised when registration metadata or a definition is malformed. */
export class InvalidMetadataError extends CatalogError {
  readonly code = "E_INVALID_METADATA" as const;

  constructor(message: string, details?: unknown) {
    super(message, details);
  }
}

/** Single contract violation reported by the argument validator. */
export interface ContractIssue {
  /** Dotted path of the offending value, empty for the argument object itself. */
  readonly path: string;
  readonly message: string;
}

/** Raised when arguments do not satisfy the tool's input contract. */
export class InvalidArgumentsError extends CatalogError {
  readonly code = "E_INVALID_ARGUMENTS" as const;

  constructor(
    readonly toolName: string,
    readonly issues: readonly ContractIssue[],
  ) {
    super(
      `invalid arguments for "${toolName}": ${issues
        .map((issue) => (issue.path ? `${issue.path} ${issue.message}` : issue.message))
        .join("; ")}`,
      { name: toolName, issues },
    );
  }
}

/** Wraps a failure raised by a tool or pipeline body. The original error is kept as `cause`. */
export class ExecutionError extends CatalogError {
  readonly code = "E_EXECUTION_FAILED" as const;
  /** Message of the underlying failure, reported apart from the error's own message. */
  readonly causeMessage: string;

  constructor(
    readonly toolName: string,
    cause: unknown,
  ) {
    const causeMessage = cause instanceof Error ? cause.message : String(cause);
    super(`tool "${toolName}" failed: ${causeMessage}`, { name: toolName }, { cause });
    this.causeMessage = causeMessage;
  }
}

/** A tool returned a value that cannot be encoded as JSON, such as a cyclic object. */
export class ResultEncodingError extends CatalogError {
  readonly code = "E_RESULT_ENCODING" as const;

  constructor(
    readonly toolName: string,
    cause: unknown,
  ) {
    super(
      `result of tool "${toolName}" cannot be encoded as JSON: ${cause instanceof Error ? cause.message : String(cause)}`,
      { name: toolName },
      { cause },
    );
  }
}

/** Reliability log storage could not be read or written. Logged, never fatal. */
export class PersistenceError extends CatalogError {
  readonly code = "E_PERSISTENCE" as const;

  constructor(
    readonly operation: "load" | "append" | "compact",
    readonly path: string,
    cause: unknown,
  ) {
    super(
      `reliability log ${operation} failed for ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { operation, path },
      { cause },
    );
  }
}
