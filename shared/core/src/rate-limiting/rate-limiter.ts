/**
 * Per-service rate limiter for upstream exchange calls.
 *
 * One token bucket per service name. Known services (gate, bybit) get their
 * configured limits; any other name gets its own bucket with the default
 * limit. acquire() never fails except through its AbortSignal.
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter({ limits: { gate: { requestsPerMinute: 240, burstSize: 10 } } });
 * const permit = await limiter.acquire('gate', signal);
 * await gateApi.fetch(id);
 * ```
 */

import { systemClock, type Clock } from '../clock';
import { createLogger } from '../logger';
import type { ILogger } from '../logging/types';
import { TokenBucket, type TokenBucketConfig, type TokenBucketStats } from './token-bucket';

/**
 * Proof of a granted request. Permits are never returned.
 */
export interface Permit {
  service: string;
  /** Clock time the token was consumed */
  grantedAt: number;
  /** Time the caller was suspended before the grant */
  waitedMs: number;
}

export interface RateLimiterOptions {
  /** Limits keyed by service name */
  limits?: Record<string, TokenBucketConfig>;
  /** Limit for services with no entry in `limits` */
  defaultLimit?: TokenBucketConfig;
  clock?: Clock;
  logger?: ILogger;
}

/**
 * Limits documented for the exchanges this service talks to.
 */
export const DEFAULT_SERVICE_LIMITS: Readonly<Record<string, TokenBucketConfig>> = {
  gate: { requestsPerMinute: 240, burstSize: 10 },
  bybit: { requestsPerMinute: 120, burstSize: 10 },
};

export const DEFAULT_UNKNOWN_SERVICE_LIMIT: TokenBucketConfig = {
  requestsPerMinute: 30,
  burstSize: 5,
};

export class RateLimiter {
  private readonly buckets = new Map<string, TokenBucket>();
  private readonly limits: Map<string, TokenBucketConfig>;
  private readonly defaultLimit: TokenBucketConfig;
  private readonly clock: Clock;
  private readonly logger: ILogger;

  constructor(options: RateLimiterOptions = {}) {
    this.limits = new Map(
      Object.entries(options.limits ?? DEFAULT_SERVICE_LIMITS).map(
        ([service, limit]) => [normalizeService(service), limit]
      )
    );
    this.defaultLimit = options.defaultLimit ?? DEFAULT_UNKNOWN_SERVICE_LIMIT;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('rate-limiter');
  }

  /**
   * Suspend until a token for `service` is available, then consume it.
   *
   * @throws OperationCancelledError if `signal` aborts while waiting
   */
  async acquire(service: string, signal?: AbortSignal): Promise<Permit> {
    const bucket = this.getBucket(service);
    const waitedMs = await bucket.acquire(signal);
    if (waitedMs > 0) {
      this.logger.debug('Rate limit wait', { service, waitedMs });
    }
    return { service, grantedAt: this.clock.now(), waitedMs };
  }

  /**
   * Grant immediately or return undefined.
   */
  tryAcquire(service: string): Permit | undefined {
    if (!this.getBucket(service).tryAcquire()) {
      return undefined;
    }
    return { service, grantedAt: this.clock.now(), waitedMs: 0 };
  }

  /**
   * Limit applied to `service`.
   */
  getLimit(service: string): TokenBucketConfig {
    return this.limits.get(normalizeService(service)) ?? this.defaultLimit;
  }

  /**
   * Statistics for every service that has been used.
   */
  getStats(): Map<string, TokenBucketStats> {
    const stats = new Map<string, TokenBucketStats>();
    for (const [service, bucket] of this.buckets) {
      stats.set(service, bucket.getStats());
    }
    return stats;
  }

  private getBucket(service: string): TokenBucket {
    const key = normalizeService(service);
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = new TokenBucket(this.getLimit(key), this.clock);
      this.buckets.set(key, bucket);
    }
    return bucket;
  }
}

function normalizeService(service: string): string {
  return service.trim().toLowerCase();
}
