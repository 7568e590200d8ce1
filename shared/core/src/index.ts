/**
 * @p2p-settle/core
 *
 * Settlement core: rate limiting, retry policy, account pool and
 * transaction cache, plus the logging, error and clock primitives they
 * share.
 *
 * @module core
 */

// Errors
export {
  ErrorCode,
  ErrorSeverity,
  SettlementError,
  NetworkError,
  RateLimitError,
  SessionExpiredError,
  AntiBotBlockError,
  ValidationError,
  AuthError,
  DuplicateAccountError,
  NotFoundError,
  RetryExhaustedError,
  OperationCancelledError,
  PersistenceError,
  isRetryableError,
  isSettlementError,
  getErrorCode,
  getErrorMessage,
  formatErrorForLog,
} from './error-handling';
export type { SettlementErrorKind, SettlementErrorOptions } from './error-handling';

// Logging
export { createLogger } from './logger';
export type { Logger } from './logger';
export * from './logging';

// Time and async primitives
export { SystemClock, systemClock } from './clock';
export type { Clock } from './clock';
export * from './async';

// Decimal strings
export { normalizeDecimal, isDecimalString } from './utils/decimal-utils';

// Components
export * from './rate-limiting';
export * from './resilience';
export * from './accounts';
export * from './caching';
