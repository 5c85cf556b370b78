/**
 * Error types for the assignment sync pipeline.
 *
 * Only configuration problems and an unreachable dataset at run start ever
 * leave the pipeline as exceptions; everything else is folded into the
 * structured run, batch and rollback results.
 */

export type ErrorContext = Readonly<Record<string, unknown>>;

export class SyncError extends Error {
  constructor(
    message: string,
    public readonly context: ErrorContext = {},
  ) {
    super(message);
    this.name = "SyncError";
  }
}

export class ConfigurationError extends SyncError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = "ConfigurationError";
  }
}

/** The target or a boundary dataset could not be read at run start. */
export class DatasetUnavailableError extends SyncError {
  constructor(
    public readonly datasetId: string,
    cause: unknown,
  ) {
    super(`Dataset ${datasetId} is unavailable: ${errorMessage(cause)}`, { datasetId });
    this.name = "DatasetUnavailableError";
  }
}

/** A record store call failed after the retry policy gave up. */
export class RecordStoreError extends SyncError {
  constructor(
    public readonly operation: string,
    cause: unknown,
  ) {
    super(`Record store ${operation} failed: ${errorMessage(cause)}`, { operation });
    this.name = "RecordStoreError";
  }
}

export class InvalidBatchTransitionError extends SyncError {
  constructor(from: string, to: string) {
    super(`Invalid batch state transition ${from} -> ${to}`, { from, to });
    this.name = "InvalidBatchTransitionError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorName(error: unknown): string {
  return error instanceof Error ? error.name : typeof error;
}
