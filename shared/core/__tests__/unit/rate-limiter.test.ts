/**
 * RateLimiter Unit Tests
 *
 * Time is driven by FakeClock: refill waits show up in `clock.sleeps` and
 * complete only when the test advances the clock.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  DEFAULT_UNKNOWN_SERVICE_LIMIT,
  OperationCancelledError,
  RateLimiter,
  RecordingLogger,
  TokenBucket,
} from '@p2p-settle/core';
import { FakeClock } from '@p2p-settle/test-utils';

describe('RateLimiter', () => {
  let clock: FakeClock;
  let logger: RecordingLogger;

  beforeEach(() => {
    clock = new FakeClock(0);
    logger = new RecordingLogger();
  });

  function createLimiter(requestsPerMinute: number, burstSize: number): RateLimiter {
    return new RateLimiter({
      limits: {
        gate: { requestsPerMinute, burstSize },
        bybit: { requestsPerMinute: 60, burstSize: 1 },
      },
      clock,
      logger,
    });
  }

  // ===========================================================================
  // Bursts and Waits
  // ===========================================================================

  describe('bursts and waits', () => {
    it('should grant the burst immediately and then wait for refill', async () => {
      const limiter = createLimiter(60, 2);

      const first = await limiter.acquire('gate');
      const second = await limiter.acquire('gate');
      expect(first.waitedMs).toBe(0);
      expect(second.waitedMs).toBe(0);

      const third = limiter.acquire('gate');
      await clock.advance(1000);

      await expect(third).resolves.toEqual({ service: 'gate', grantedAt: 1000, waitedMs: 1000 });
      expect(clock.sleeps).toEqual([1000]);
    });

    it('should log the wait at debug level', async () => {
      const limiter = createLimiter(60, 1);
      await limiter.acquire('gate');

      const pending = limiter.acquire('gate');
      await clock.advance(1000);
      await pending;

      expect(logger.hasLogWithMeta('debug', { service: 'gate', waitedMs: 1000 })).toBe(true);
    });

    it('should never exceed burst plus refill over a long window', async () => {
      const limiter = createLimiter(120, 10);

      const requests = Array.from({ length: 70 }, () => limiter.acquire('gate'));
      const elapsed = await clock.runAll();
      const permits = await Promise.all(requests);

      expect(elapsed).toBe(30_000);
      const grantTimes = permits.map((p) => p.grantedAt).sort((a, b) => a - b);
      grantTimes.forEach((grantedAt, index) => {
        expect(index + 1).toBeLessThanOrEqual(10 + (grantedAt * 120) / 60_000);
      });
    });

    it('should grant waiters in arrival order', async () => {
      const limiter = createLimiter(60, 1);
      await limiter.acquire('gate');

      const order: number[] = [];
      const waiters = [1, 2, 3].map((n) => limiter.acquire('gate').then(() => order.push(n)));
      await clock.runAll();
      await Promise.all(waiters);

      expect(order).toEqual([1, 2, 3]);
    });
  });

  // ===========================================================================
  // Services
  // ===========================================================================

  describe('services', () => {
    it('should keep independent buckets per service', async () => {
      const limiter = createLimiter(60, 1);
      await limiter.acquire('gate');

      expect(limiter.tryAcquire('gate')).toBeUndefined();
      expect(limiter.tryAcquire('bybit')).toEqual({ service: 'bybit', grantedAt: 0, waitedMs: 0 });
    });

    it('should give unknown services the default limit', () => {
      const limiter = createLimiter(60, 1);
      expect(limiter.getLimit('kraken')).toEqual(DEFAULT_UNKNOWN_SERVICE_LIMIT);
    });

    it('should match service names case-insensitively', () => {
      const limiter = createLimiter(240, 10);
      expect(limiter.getLimit('GATE')).toEqual({ requestsPerMinute: 240, burstSize: 10 });
    });

    it('should report statistics per used service', async () => {
      const limiter = createLimiter(60, 1);
      await limiter.acquire('gate');
      const pending = limiter.acquire('gate');
      await clock.advance(1000);
      await pending;

      const stats = limiter.getStats();
      expect([...stats.keys()]).toEqual(['gate']);
      expect(stats.get('gate')).toEqual({
        granted: 2,
        waited: 1,
        totalWaitMs: 1000,
        availableTokens: 0,
      });
    });
  });

  // ===========================================================================
  // Cancellation
  // ===========================================================================

  describe('cancellation', () => {
    it('should consume no token when a waiting acquire is aborted', async () => {
      const limiter = createLimiter(60, 1);
      await limiter.acquire('gate');

      const controller = new AbortController();
      const pending = limiter.acquire('gate', controller.signal);
      await clock.advance(500);
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
      expect(clock.pendingTimerCount()).toBe(0);

      await clock.advance(500);
      expect(limiter.tryAcquire('gate')).toBeDefined();
      expect(limiter.tryAcquire('gate')).toBeUndefined();
    });

    it('should reject at once when the signal is already aborted', async () => {
      const limiter = createLimiter(60, 1);
      const controller = new AbortController();
      controller.abort();

      await expect(limiter.acquire('gate', controller.signal)).rejects.toBeInstanceOf(
        OperationCancelledError
      );
      expect(limiter.tryAcquire('gate')).toBeDefined();
    });

    it('should refuse tryAcquire while another caller is waiting', async () => {
      const limiter = createLimiter(60, 1);
      await limiter.acquire('gate');
      const pending = limiter.acquire('gate');
      await clock.advance(0);

      expect(limiter.tryAcquire('gate')).toBeUndefined();

      await clock.advance(1000);
      await pending;
    });
  });
});

describe('TokenBucket', () => {
  it('should reject invalid configuration', () => {
    const clock = new FakeClock(0);
    expect(() => new TokenBucket({ requestsPerMinute: 0, burstSize: 1 }, clock)).toThrow(RangeError);
    expect(() => new TokenBucket({ requestsPerMinute: 60, burstSize: 0 }, clock)).toThrow(RangeError);
  });

  it('should cap refill at the burst size', () => {
    const clock = new FakeClock(0);
    const bucket = new TokenBucket({ requestsPerMinute: 60, burstSize: 3 }, clock);

    expect(bucket.tryAcquire()).toBe(true);
    clock.setTime(600_000);

    expect(bucket.getAvailableTokens()).toBe(3);
  });

  it('should sleep only for the missing fraction of a token', async () => {
    const clock = new FakeClock(0);
    const bucket = new TokenBucket({ requestsPerMinute: 60, burstSize: 1 }, clock);
    expect(bucket.tryAcquire()).toBe(true);
    clock.setTime(400);

    const pending = bucket.acquire();
    await clock.advance(600);

    await expect(pending).resolves.toBe(600);
    expect(clock.sleeps).toEqual([600]);
  });
});
