/**
 * Token bucket for one upstream service.
 *
 * Algorithm:
 * - Tokens refill continuously at `requestsPerMinute / 60` per second
 * - Tokens cap at `burstSize`; the bucket starts full
 * - Each grant consumes one token
 * - A caller finding less than one token sleeps exactly until one accrues
 *
 * Refill-and-consume runs under a FIFO mutex, so concurrent callers are
 * granted in arrival order and a sleeping caller keeps its place.
 */

import { AsyncMutex } from '../async/async-mutex';
import type { Clock } from '../clock';

export interface TokenBucketConfig {
  /** Sustained request rate */
  requestsPerMinute: number;
  /** Bucket capacity */
  burstSize: number;
}

export interface TokenBucketStats {
  /** Grants issued */
  granted: number;
  /** Grants that had to wait (mutex queue or refill sleep) */
  waited: number;
  /** Sum of all wait times */
  totalWaitMs: number;
  /** Tokens available right now (fractional) */
  availableTokens: number;
}

const MS_PER_MINUTE = 60_000;

export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private readonly mutex: AsyncMutex;
  private granted = 0;
  private waited = 0;
  private totalWaitMs = 0;

  constructor(
    readonly config: TokenBucketConfig,
    private readonly clock: Clock
  ) {
    if (!(config.requestsPerMinute > 0) || !(config.burstSize >= 1)) {
      throw new RangeError(
        `Invalid token bucket config: ${config.requestsPerMinute} rpm, burst ${config.burstSize}`
      );
    }
    this.tokens = config.burstSize;
    this.lastRefill = clock.now();
    this.mutex = new AsyncMutex(() => clock.now());
  }

  /**
   * Wait for and consume one token.
   *
   * @returns Milliseconds the caller was suspended
   * @throws OperationCancelledError if `signal` aborts; no token is consumed
   */
  async acquire(signal?: AbortSignal): Promise<number> {
    const startedAt = this.clock.now();
    const release = await this.mutex.acquire(signal);
    try {
      for (;;) {
        this.refill();
        if (this.tokens >= 1) {
          this.tokens -= 1;
          return this.recordGrant(this.clock.now() - startedAt);
        }
        await this.clock.sleep(this.msUntilNextToken(), signal);
      }
    } finally {
      release();
    }
  }

  /**
   * Consume a token only if one is available now and nobody is queued.
   */
  tryAcquire(): boolean {
    const release = this.mutex.tryAcquire();
    if (!release) return false;
    try {
      this.refill();
      if (this.tokens < 1) return false;
      this.tokens -= 1;
      this.recordGrant(0);
      return true;
    } finally {
      release();
    }
  }

  getAvailableTokens(): number {
    // Only refresh when no caller owns the bucket.
    if (!this.mutex.isLocked()) {
      this.refill();
    }
    return this.tokens;
  }

  getStats(): TokenBucketStats {
    return {
      granted: this.granted,
      waited: this.waited,
      totalWaitMs: this.totalWaitMs,
      availableTokens: this.getAvailableTokens(),
    };
  }

  /**
   * Sleep needed for the bucket to reach one token.
   */
  private msUntilNextToken(): number {
    const deficit = 1 - this.tokens;
    return Math.max(1, Math.ceil((deficit * MS_PER_MINUTE) / this.config.requestsPerMinute));
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsedMs = now - this.lastRefill;
    if (elapsedMs > 0) {
      const tokensToAdd = (elapsedMs * this.config.requestsPerMinute) / MS_PER_MINUTE;
      this.tokens = Math.min(this.config.burstSize, this.tokens + tokensToAdd);
      this.lastRefill = now;
    }
  }

  private recordGrant(waitedMs: number): number {
    this.granted++;
    if (waitedMs > 0) {
      this.waited++;
      this.totalWaitMs += waitedMs;
    }
    return waitedMs;
  }
}
