/**
 * Error taxonomy for export and import runs.
 *
 * Run-fatal: AuthorizationError, SnapshotReadError, MalformedRecordError.
 * Everything else is recorded against the single record that hit it.
 */

export class TransferError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A snapshot row that cannot be turned into a record */
export class MalformedRecordError extends TransferError {
  readonly row: number;
  readonly column: string;

  constructor(row: number, column: string, problem: string) {
    super(`row ${row}, column "${column}": ${problem}`);
    this.row = row;
    this.column = column;
  }
}

export class SnapshotReadError extends TransferError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`cannot read snapshot file ${path}`, { cause });
    this.path = path;
  }
}

/** Credentials missing, invalid or expired. No further call can succeed. */
export class AuthorizationError extends TransferError {}

export class RateLimitExceededError extends TransferError {
  readonly attempts: number;

  constructor(label: string, attempts: number, cause?: unknown) {
    super(`${label} still rate limited after ${attempts} attempts`, { cause });
    this.attempts = attempts;
  }
}

export class TransientCallFailedError extends TransferError {
  readonly attempts: number;

  constructor(label: string, attempts: number, cause?: unknown) {
    super(`${label} kept failing after ${attempts} attempts`, { cause });
    this.attempts = attempts;
  }
}

/** The destination refused the request (not eligible, not found, bad request) */
export class MutationRejectedError extends TransferError {
  readonly statusCode: number;

  constructor(label: string, statusCode: number, cause?: unknown) {
    super(`${label} rejected with HTTP ${statusCode}`, { cause });
    this.statusCode = statusCode;
  }
}

export interface CatalogApiErrorDetails {
  statusCode?: number;
  code?: string;
  retryAfterSeconds?: number;
}

/**
 * Raw failure reported by a catalog client, before classification by the
 * rate-limited invoker.
 */
export class CatalogApiError extends TransferError {
  readonly statusCode?: number;
  readonly code?: string;
  readonly retryAfterSeconds?: number;

  constructor(message: string, details: CatalogApiErrorDetails = {}, cause?: unknown) {
    super(message, { cause });
    this.statusCode = details.statusCode;
    this.code = details.code;
    this.retryAfterSeconds = details.retryAfterSeconds;
  }
}

/** Text recorded as an outcome reason */
export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
};
