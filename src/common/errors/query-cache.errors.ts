/**
 * Query Cache Error Definitions
 *
 * Every error that leaves the service carries a machine-checkable kind
 * and a human-readable message. Some kinds add a suggestion for the caller.
 */

export enum QueryCacheErrorKind {
  // Cache backend unreachable - degrade to compute-always
  TRANSIENT_STORE = 'TRANSIENT_STORE',

  // External collaborator failed (embedding, completion, search, execution)
  COMPUTE = 'COMPUTE',

  // Generated statement rejected by the safety classifier
  UNSAFE_STATEMENT = 'UNSAFE_STATEMENT',

  // approve/reject/get on an unknown or already decided pending unit
  INVALID_PENDING_STATE = 'INVALID_PENDING_STATE',

  // Execution exceeded its bound (not retried)
  TIMEOUT = 'TIMEOUT',

  // Content hash or artifact bundle does not match its bytes
  ARTIFACT_INTEGRITY = 'ARTIFACT_INTEGRITY',

  // Caller input rejected before any work started
  VALIDATION = 'VALIDATION',
}

/**
 * Base error class
 */
export class QueryCacheError extends Error {
  constructor(
    public readonly kind: QueryCacheErrorKind,
    message: string,
    public readonly suggestion?: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'QueryCacheError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class TransientStoreError extends QueryCacheError {
  constructor(
    public readonly operation: string,
    message: string,
    originalError?: Error,
  ) {
    super(
      QueryCacheErrorKind.TRANSIENT_STORE,
      `Cache store unavailable during ${operation}: ${message}`,
      undefined,
      originalError,
    );
    this.name = 'TransientStoreError';
  }
}

export class ComputeError extends QueryCacheError {
  constructor(
    public readonly collaborator: string,
    message: string,
    originalError?: Error,
  ) {
    super(
      QueryCacheErrorKind.COMPUTE,
      `${collaborator} failed: ${message}`,
      undefined,
      originalError,
    );
    this.name = 'ComputeError';
  }
}

export class UnsafeStatementError extends QueryCacheError {
  constructor(
    public readonly statement: string,
    public readonly violations: string[],
  ) {
    super(
      QueryCacheErrorKind.UNSAFE_STATEMENT,
      `Statement rejected: ${violations.join('; ')}`,
      'Only read-only questions can be answered. Rephrase it as a lookup, for example "How many orders were placed last month?"',
    );
    this.name = 'UnsafeStatementError';
  }
}

export type PendingStateFailure = 'not_found' | 'invalid_state';

export class InvalidPendingStateError extends QueryCacheError {
  constructor(
    public readonly pendingId: string,
    public readonly reason: PendingStateFailure,
    message: string,
  ) {
    super(QueryCacheErrorKind.INVALID_PENDING_STATE, message);
    this.name = 'InvalidPendingStateError';
  }
}

export class ExecutionTimeoutError extends QueryCacheError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(
      QueryCacheErrorKind.TIMEOUT,
      `${operation} timed out after ${timeoutMs}ms`,
      'Narrow the question, for example by adding a date range or a limit.',
    );
    this.name = 'ExecutionTimeoutError';
  }
}

export class ArtifactIntegrityError extends QueryCacheError {
  constructor(
    public readonly contentHash: string,
    message: string,
  ) {
    super(QueryCacheErrorKind.ARTIFACT_INTEGRITY, message);
    this.name = 'ArtifactIntegrityError';
  }
}

export class InputValidationError extends QueryCacheError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(QueryCacheErrorKind.VALIDATION, message);
    this.name = 'InputValidationError';
  }
}

/**
 * Describe an unknown thrown value for log lines
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
