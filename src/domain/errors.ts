export class IngestionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = "IngestionError";
  }
}

export class ConfigError extends IngestionError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class EmbeddingUninitializedError extends IngestionError {
  constructor() {
    super("Embedding client used before initialize() succeeded.");
    this.name = "EmbeddingUninitializedError";
  }
}

/**
 * Raised once a provider call has failed on every attempt the retry policy allows.
 */
export class ProviderUnavailableError extends IngestionError {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(
      `Embedding provider failed after ${attempts} attempts: ${describeError(cause)}`,
      { cause },
    );
    this.name = "ProviderUnavailableError";
    this.attempts = attempts;
  }
}

export class EmbeddingUnavailableError extends IngestionError {
  constructor() {
    super("Embedding service not available");
    this.name = "EmbeddingUnavailableError";
  }
}

export class EmbeddingDimensionError extends IngestionError {
  constructor(expected: number, actual: number) {
    super(`Expected ${expected} embedding dimensions, got ${actual}.`);
    this.name = "EmbeddingDimensionError";
  }
}

export class RateLimitError extends IngestionError {
  readonly retryAfterSeconds: number | null;

  constructor(message: string, retryAfterSeconds: number | null = null) {
    super(message);
    this.name = "RateLimitError";
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class ProviderRequestError extends IngestionError {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "ProviderRequestError";
    this.status = status;
  }
}

// Lost race on a unique key. Recovered by ProvenanceStore, never surfaced to callers.
export class UniqueViolationError extends IngestionError {
  readonly constraint: string;

  constructor(constraint: string, options?: { cause?: unknown }) {
    super(`duplicate key value violates unique constraint "${constraint}"`, options);
    this.name = "UniqueViolationError";
    this.constraint = constraint;
  }
}

/**
 * A unique-key conflict was reported but the row could not be found afterwards.
 * The unique-constraint assumption no longer holds, so the run must stop.
 */
export class ProvenanceInvariantViolationError extends IngestionError {
  constructor(table: string, key: string) {
    super(`Conflict on ${table} for "${key}" but no existing row was found on re-lookup.`);
    this.name = "ProvenanceInvariantViolationError";
  }
}

export class RowProcessingError extends IngestionError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super(describeError(cause), { cause });
    this.name = "RowProcessingError";
    this.url = url;
  }
}

/**
 * The row failed and undoing it failed too; the transaction state is unknown, so
 * the run stops. `cause` is the row's own error.
 */
export class RowRollbackError extends IngestionError {
  readonly url: string;

  readonly rollbackError: unknown;

  constructor(url: string, rollbackError: unknown, cause: unknown) {
    super(`Rollback of row ${url} failed: ${describeError(rollbackError)}`, { cause });
    this.name = "RowRollbackError";
    this.url = url;
    this.rollbackError = rollbackError;
  }
}

export class CommitError extends IngestionError {
  constructor(processed: number, cause: unknown) {
    super(`Commit failed after ${processed} rows: ${describeError(cause)}`, { cause });
    this.name = "CommitError";
  }
}

export class IngestionAbortedError extends IngestionError {
  readonly processed: number;

  constructor(processed: number) {
    super(`Ingestion aborted after ${processed} rows; uncommitted work was rolled back.`);
    this.name = "IngestionAbortedError";
    this.processed = processed;
  }
}

export class DatasetFormatError extends IngestionError {
  readonly line: number;

  constructor(source: string, line: number, reason: string) {
    super(`Invalid record in ${source} at line ${line}: ${reason}`);
    this.name = "DatasetFormatError";
    this.line = line;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
