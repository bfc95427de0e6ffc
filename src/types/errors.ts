// ====================
// Error Types
// ====================

export type ErrorDetails = Record<string, unknown>;

export class TriageError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: ErrorDetails
  ) {
    super(message);
    this.name = 'TriageError';
  }
}

/**
 * No usable credential. Raised before any network call is attempted.
 */
export class AuthError extends TriageError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'AUTH_ERROR', details);
    this.name = 'AuthError';
  }
}

/**
 * Upstream request budget exhausted. Fetching stops; committed data stays.
 */
export class RateLimitedError extends TriageError {
  constructor(
    message: string,
    public resetAt: Date | null,
    public retryAfterSeconds: number | null,
    details?: ErrorDetails
  ) {
    super(message, 'RATE_LIMITED', details);
    this.name = 'RateLimitedError';
  }
}

/**
 * One node or item inside a batch could not be resolved (deleted, private, ...).
 * Returned as a value inside batch results, never thrown across the batch.
 */
export class PartialFetchError extends TriageError {
  constructor(
    message: string,
    public itemId: string,
    details?: ErrorDetails
  ) {
    super(message, 'PARTIAL_FETCH', details);
    this.name = 'PartialFetchError';
  }
}

export class RemoteMutationError extends TriageError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'REMOTE_MUTATION_ERROR', details);
    this.name = 'RemoteMutationError';
  }
}

export class RemoteRequestError extends TriageError {
  constructor(
    message: string,
    public status: number,
    public url: string,
    details?: ErrorDetails
  ) {
    super(message, 'REMOTE_REQUEST_ERROR', details);
    this.name = 'RemoteRequestError';
  }
}

export class CacheError extends TriageError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'CACHE_ERROR', details);
    this.name = 'CacheError';
  }
}

export class ConfigError extends TriageError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends TriageError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class SqlWriteBlockedError extends TriageError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'SQL_WRITE_BLOCKED', details);
    this.name = 'SqlWriteBlockedError';
  }
}

/**
 * Human-readable cause for any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ====================
// Result Type
// ====================

export type Result<T, E = TriageError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
