/**
 * Service Configuration
 *
 * Builds the settlement service configuration from environment variables.
 * Every setting has a default; a malformed value fails the whole load with
 * a ConfigValidationError that names each offending path.
 */

import {
  ServiceConfigSchema,
  validateOrThrow,
  type AccountStoreSettings,
  type ServiceConfig,
} from './schemas';
import { readEnvNumber, readEnvString, type EnvSource } from './utils/env-parsing';
import { DEFAULT_COMPLETED_STATUS, DEFAULT_MAX_ADS_PER_ACCOUNT } from '@p2p-settle/types';

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_GATE_RPM = 240;
export const DEFAULT_BYBIT_RPM = 120;
export const DEFAULT_BURST_SIZE = 10;

/** Applied to services with no explicit limit. */
export const DEFAULT_UNKNOWN_SERVICE_RPM = 30;
export const DEFAULT_UNKNOWN_SERVICE_BURST = 5;

export const DEFAULT_RETRY_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_INITIAL_DELAY_MS = 1000;
export const DEFAULT_RETRY_MAX_DELAY_MS = 60_000;
export const DEFAULT_RETRY_EXPONENTIAL_BASE = 2;

export const DEFAULT_ACCOUNT_STORE_PATH = 'data/accounts.json';
export const DEFAULT_REDIS_URL = 'redis://localhost:6379';
export const DEFAULT_ACCOUNT_STORE_KEY = 'p2p:accounts:snapshot';

export const DEFAULT_TRANSACTION_CACHE_TTL_MS = 5 * 60 * 1000;

export const DEFAULT_WORKER_CONCURRENCY = 5;

// =============================================================================
// LOADING
// =============================================================================

function readStoreSettings(env: EnvSource): Record<string, unknown> {
  const kind = readEnvString(env, 'ACCOUNT_STORE') ?? 'file';
  if (kind === 'redis') {
    return {
      kind,
      url: readEnvString(env, 'REDIS_URL') ?? DEFAULT_REDIS_URL,
      key: readEnvString(env, 'ACCOUNT_STORE_KEY') ?? DEFAULT_ACCOUNT_STORE_KEY,
    };
  }
  // Unknown kinds are passed through so the schema reports them.
  return {
    kind,
    path: readEnvString(env, 'ACCOUNT_STORE_PATH') ?? DEFAULT_ACCOUNT_STORE_PATH,
  };
}

/**
 * Assemble the raw (unvalidated) configuration object from the environment.
 * Exposed for diagnostics; use loadServiceConfig in application code.
 */
export function readRawServiceConfig(env: EnvSource = process.env): Record<string, unknown> {
  const burst = readEnvNumber(env, 'RATE_LIMIT_BURST_SIZE') ?? DEFAULT_BURST_SIZE;

  return {
    rateLimits: {
      gate: {
        requestsPerMinute: readEnvNumber(env, 'RATE_LIMIT_GATE_RPM') ?? DEFAULT_GATE_RPM,
        burstSize: burst,
      },
      bybit: {
        requestsPerMinute: readEnvNumber(env, 'RATE_LIMIT_BYBIT_RPM') ?? DEFAULT_BYBIT_RPM,
        burstSize: burst,
      },
      default: {
        requestsPerMinute: DEFAULT_UNKNOWN_SERVICE_RPM,
        burstSize: DEFAULT_UNKNOWN_SERVICE_BURST,
      },
    },
    retry: {
      maxAttempts: readEnvNumber(env, 'RETRY_MAX_ATTEMPTS') ?? DEFAULT_RETRY_MAX_ATTEMPTS,
      initialDelayMs: readEnvNumber(env, 'RETRY_INITIAL_DELAY_MS') ?? DEFAULT_RETRY_INITIAL_DELAY_MS,
      maxDelayMs: readEnvNumber(env, 'RETRY_MAX_DELAY_MS') ?? DEFAULT_RETRY_MAX_DELAY_MS,
      exponentialBase: readEnvNumber(env, 'RETRY_EXPONENTIAL_BASE') ?? DEFAULT_RETRY_EXPONENTIAL_BASE,
    },
    accountPool: {
      maxAdsPerAccount: readEnvNumber(env, 'MAX_ADS_PER_ACCOUNT') ?? DEFAULT_MAX_ADS_PER_ACCOUNT,
      allocationPolicy: readEnvString(env, 'ACCOUNT_ALLOCATION_POLICY') ?? 'most-free-slots',
      store: readStoreSettings(env),
    },
    transactionCache: {
      ttlMs: readEnvNumber(env, 'TRANSACTION_CACHE_TTL_MS') ?? DEFAULT_TRANSACTION_CACHE_TTL_MS,
      completedStatus:
        readEnvNumber(env, 'TRANSACTION_COMPLETED_STATUS') ?? DEFAULT_COMPLETED_STATUS,
    },
    worker: {
      concurrency: readEnvNumber(env, 'WORKER_CONCURRENCY') ?? DEFAULT_WORKER_CONCURRENCY,
    },
  };
}

/**
 * Load and validate the service configuration.
 *
 * @throws ConfigValidationError when any value is malformed or out of range
 *
 * @example
 * ```typescript
 * const config = loadServiceConfig();
 * config.rateLimits.gate.requestsPerMinute; // 240 unless RATE_LIMIT_GATE_RPM is set
 * ```
 */
export function loadServiceConfig(env: EnvSource = process.env): ServiceConfig {
  return validateOrThrow(ServiceConfigSchema, readRawServiceConfig(env), 'service config');
}

export function describeAccountStore(store: AccountStoreSettings): string {
  return store.kind === 'file' ? `file:${store.path}` : `redis:${store.key}`;
}
