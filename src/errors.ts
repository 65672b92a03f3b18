/**
 * Error codes and result types shared by every core component
 *
 * Core operations never throw for expected rejections. They return a
 * `Result`, and only programmer errors propagate as exceptions.
 */

/**
 * Error codes surfaced by the core
 */
export enum CoreErrorCode {
  /** Token unknown, malformed, or bound to another election */
  INVALID_TOKEN = 'INVALID_TOKEN',
  /** Token presented after its expiry */
  EXPIRED = 'EXPIRED',
  /** Single-use token already consumed */
  ALREADY_USED = 'ALREADY_USED',
  /** Voter already holds a committed vote */
  ALREADY_VOTED = 'ALREADY_VOTED',
  /** Audit chain recomputation failed */
  CHAIN_BROKEN = 'CHAIN_BROKEN',
  /** Storage fault; the unit of work was rolled back and may be retried */
  STORAGE_UNAVAILABLE = 'STORAGE_UNAVAILABLE',
  ELECTION_NOT_FOUND = 'ELECTION_NOT_FOUND',
  ELECTION_NOT_OPEN = 'ELECTION_NOT_OPEN',
  ELECTION_NOT_CLOSED = 'ELECTION_NOT_CLOSED',
  SECOND_FACTOR_MISMATCH = 'SECOND_FACTOR_MISMATCH',
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  INVALID_INPUT = 'INVALID_INPUT',
}

/**
 * A rejected operation
 */
export interface CoreFailure {
  code: CoreErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Storage fault; the unit of work was rolled back
 */
export interface StorageUnavailableFailure extends CoreFailure {
  code: CoreErrorCode.STORAGE_UNAVAILABLE;
}

export type Result<T, E extends CoreFailure = CoreFailure> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail(
  code: CoreErrorCode,
  message: string,
  details?: Record<string, unknown>
): { ok: false; error: CoreFailure } {
  return {
    ok: false,
    error: details ? { code, message, details } : { code, message },
  };
}

export function storageUnavailable(
  operation: string,
  sqliteCode: string
): { ok: false; error: StorageUnavailableFailure } {
  return {
    ok: false,
    error: {
      code: CoreErrorCode.STORAGE_UNAVAILABLE,
      message: `Storage unavailable during ${operation}`,
      details: { sqliteCode },
    },
  };
}

/**
 * Thrown by `unwrap` when a caller insists on a successful result
 */
export class CoreError extends Error {
  constructor(
    message: string,
    public readonly code: CoreErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CoreError';
  }
}

/**
 * Return the value of a successful result or throw its failure
 *
 * Meant for scripts and setup code where a rejection is a bug.
 */
export function unwrap<T, E extends CoreFailure>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw new CoreError(result.error.message, result.error.code, result.error.details);
}
