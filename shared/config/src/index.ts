/**
 * Shared configuration for the settlement service.
 *
 * @module config
 */

export {
  loadServiceConfig,
  readRawServiceConfig,
  describeAccountStore,
  DEFAULT_GATE_RPM,
  DEFAULT_BYBIT_RPM,
  DEFAULT_BURST_SIZE,
  DEFAULT_UNKNOWN_SERVICE_RPM,
  DEFAULT_UNKNOWN_SERVICE_BURST,
  DEFAULT_RETRY_MAX_ATTEMPTS,
  DEFAULT_RETRY_INITIAL_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  DEFAULT_RETRY_EXPONENTIAL_BASE,
  DEFAULT_ACCOUNT_STORE_PATH,
  DEFAULT_REDIS_URL,
  DEFAULT_ACCOUNT_STORE_KEY,
  DEFAULT_TRANSACTION_CACHE_TTL_MS,
  DEFAULT_WORKER_CONCURRENCY,
} from './service-config';

export {
  ServiceConfigSchema,
  RateLimitSchema,
  RetrySchema,
  AccountStoreSchema,
  ConfigValidationError,
  validateWithDetails,
  validateOrThrow,
} from './schemas';
export type {
  ServiceConfig,
  RateLimitSettings,
  RateLimitsSettings,
  RetrySettings,
  AllocationPolicyName,
  AccountStoreSettings,
  AccountPoolSettings,
  TransactionCacheSettings,
  WorkerSettings,
  ConfigIssue,
  ValidationResult,
} from './schemas';

export { readEnvNumber, readEnvString } from './utils/env-parsing';
export type { EnvSource } from './utils/env-parsing';
