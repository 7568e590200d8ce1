/**
 * Shared Error Handling
 *
 * Closed error taxonomy for the settlement core. Every error raised by the
 * upstream client, the account pool or the retry loop is a SettlementError
 * tagged with a `kind`; retryability is decided by `isRetryable()` and by
 * nothing else.
 *
 * Retryable: NetworkError, RateLimitError, SessionExpiredError, AntiBotBlockError
 * Fatal:     ValidationError, AuthError, DuplicateAccountError, NotFoundError
 * Control:   RetryExhaustedError, OperationCancelledError, PersistenceError
 */

// =============================================================================
// Error Codes
// =============================================================================

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  NOT_FOUND = 1002,
  ALREADY_EXISTS = 1003,
  OPERATION_CANCELLED = 1006,

  // Upstream errors (2000-2999)
  NETWORK_ERROR = 2000,
  RATE_LIMITED = 2001,
  SESSION_EXPIRED = 2002,
  ANTI_BOT_BLOCKED = 2003,
  AUTH_FAILED = 2004,
  RETRY_EXHAUSTED = 2005,

  // Persistence errors (3000-3999)
  PERSISTENCE_FAILED = 3000,

  // Validation errors (6000-6999)
  VALIDATION_FAILED = 6000,
}

export enum ErrorSeverity {
  /** Expected outcomes that don't require action */
  INFO = 'info',
  /** Unexpected but recoverable */
  WARNING = 'warning',
  /** Failures that may impact functionality */
  ERROR = 'error',
  /** Requires immediate attention */
  CRITICAL = 'critical'
}

export type SettlementErrorKind =
  | 'network'
  | 'rate_limit'
  | 'session_expired'
  | 'anti_bot'
  | 'validation'
  | 'auth'
  | 'duplicate_account'
  | 'not_found'
  | 'retry_exhausted'
  | 'cancelled'
  | 'persistence';

export interface SettlementErrorOptions {
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
  cause?: unknown;
}

// =============================================================================
// Base Class
// =============================================================================

/**
 * Base class for all settlement errors.
 * Carries structured information for logging and monitoring.
 */
export abstract class SettlementError extends Error {
  abstract readonly kind: SettlementErrorKind;
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, options: SettlementErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.severity = options.severity ?? ErrorSeverity.ERROR;
    this.timestamp = Date.now();
    this.context = options.context;

    Error.captureStackTrace?.(this, new.target);
  }

  /**
   * Whether the failed operation may succeed if attempted again.
   */
  abstract isRetryable(): boolean;

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      code: this.code,
      severity: this.severity,
      timestamp: this.timestamp,
      context: this.context,
      cause: this.cause === undefined ? undefined : getErrorMessage(this.cause),
      stack: this.stack
    };
  }
}

// =============================================================================
// Retryable Errors
// =============================================================================

/**
 * Transport failure talking to an upstream exchange.
 */
export class NetworkError extends SettlementError {
  readonly kind = 'network' as const;

  constructor(message: string, options: SettlementErrorOptions = {}) {
    super(message, ErrorCode.NETWORK_ERROR, { severity: ErrorSeverity.WARNING, ...options });
  }

  isRetryable(): boolean {
    return true;
  }
}

/**
 * Upstream throttled the request. `retryAfterMs` is the server's hint, if any.
 */
export class RateLimitError extends SettlementError {
  readonly kind = 'rate_limit' as const;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    options: SettlementErrorOptions & { retryAfterMs?: number } = {}
  ) {
    super(message, ErrorCode.RATE_LIMITED, {
      severity: ErrorSeverity.WARNING,
      ...options,
      context: { ...options.context, retryAfterMs: options.retryAfterMs }
    });
    this.retryAfterMs = options.retryAfterMs;
  }

  isRetryable(): boolean {
    return true;
  }
}

/**
 * Gate session cookie expired; the client re-authenticates on the next attempt.
 */
export class SessionExpiredError extends SettlementError {
  readonly kind = 'session_expired' as const;

  constructor(message: string, options: SettlementErrorOptions = {}) {
    super(message, ErrorCode.SESSION_EXPIRED, { severity: ErrorSeverity.WARNING, ...options });
  }

  isRetryable(): boolean {
    return true;
  }
}

/**
 * Request was challenged by upstream anti-bot protection.
 */
export class AntiBotBlockError extends SettlementError {
  readonly kind = 'anti_bot' as const;

  constructor(message: string, options: SettlementErrorOptions = {}) {
    super(message, ErrorCode.ANTI_BOT_BLOCKED, { severity: ErrorSeverity.WARNING, ...options });
  }

  isRetryable(): boolean {
    return true;
  }
}

// =============================================================================
// Fatal Errors
// =============================================================================

export class ValidationError extends SettlementError {
  readonly kind = 'validation' as const;
  readonly field?: string;

  constructor(
    message: string,
    options: SettlementErrorOptions & { field?: string } = {}
  ) {
    super(message, ErrorCode.VALIDATION_FAILED, {
      severity: ErrorSeverity.WARNING,
      ...options,
      context: { ...options.context, field: options.field }
    });
    this.field = options.field;
  }

  isRetryable(): boolean {
    return false;
  }
}

export class AuthError extends SettlementError {
  readonly kind = 'auth' as const;

  constructor(message: string, options: SettlementErrorOptions = {}) {
    super(message, ErrorCode.AUTH_FAILED, options);
  }

  isRetryable(): boolean {
    return false;
  }
}

export class DuplicateAccountError extends SettlementError {
  readonly kind = 'duplicate_account' as const;

  constructor(message: string, options: SettlementErrorOptions = {}) {
    super(message, ErrorCode.ALREADY_EXISTS, { severity: ErrorSeverity.WARNING, ...options });
  }

  isRetryable(): boolean {
    return false;
  }
}

export class NotFoundError extends SettlementError {
  readonly kind = 'not_found' as const;

  constructor(message: string, options: SettlementErrorOptions = {}) {
    super(message, ErrorCode.NOT_FOUND, { severity: ErrorSeverity.INFO, ...options });
  }

  isRetryable(): boolean {
    return false;
  }
}

// =============================================================================
// Control Errors
// =============================================================================

/**
 * Every attempt failed with a retryable error. `cause` is the last one.
 */
export class RetryExhaustedError extends SettlementError {
  readonly kind = 'retry_exhausted' as const;

  constructor(
    readonly operation: string,
    readonly attempts: number,
    lastError: unknown
  ) {
    super(
      `${operation} failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${getErrorMessage(lastError)}`,
      ErrorCode.RETRY_EXHAUSTED,
      { cause: lastError, context: { operation, attempts } }
    );
  }

  isRetryable(): boolean {
    return false;
  }
}

/**
 * The caller's AbortSignal fired while the operation was suspended.
 */
export class OperationCancelledError extends SettlementError {
  readonly kind = 'cancelled' as const;

  constructor(message = 'Operation cancelled', options: SettlementErrorOptions = {}) {
    super(message, ErrorCode.OPERATION_CANCELLED, { severity: ErrorSeverity.INFO, ...options });
  }

  isRetryable(): boolean {
    return false;
  }
}

/**
 * Loading or saving the account pool snapshot failed.
 */
export class PersistenceError extends SettlementError {
  readonly kind = 'persistence' as const;

  constructor(message: string, options: SettlementErrorOptions = {}) {
    super(message, ErrorCode.PERSISTENCE_FAILED, { severity: ErrorSeverity.CRITICAL, ...options });
  }

  isRetryable(): boolean {
    return false;
  }
}

// =============================================================================
// Error Classification
// =============================================================================

/**
 * Socket-level error codes that indicate a transient transport failure.
 */
const TRANSIENT_SOCKET_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'ECONNREFUSED',
  'EAI_AGAIN',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
]);

/**
 * String `code` of a thrown value, read structurally so errors raised in
 * another realm still match.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Single classification point used by the retry loop.
 * Taxonomy errors answer for themselves; errors from outside the taxonomy
 * are retryable only when they carry a transient socket code.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof SettlementError) {
    return error.isRetryable();
  }
  const code = getErrorCode(error);
  return code !== undefined && TRANSIENT_SOCKET_CODES.has(code);
}

export function isSettlementError(error: unknown): error is SettlementError {
  return error instanceof SettlementError;
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Message of any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Structured form of any thrown value, for log metadata.
 */
export function formatErrorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof SettlementError) {
    return error.toJSON();
  }
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      code: getErrorCode(error),
      stack: error.stack
    };
  }
  return { message: getErrorMessage(error) };
}
