/**
 * RetryPolicy Unit Tests
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import {
  AntiBotBlockError,
  AuthError,
  NetworkError,
  OperationCancelledError,
  RateLimitError,
  RecordingLogger,
  RetryExhaustedError,
  RetryPolicy,
  SessionExpiredError,
  ValidationError,
  type RetryConfig,
} from '@p2p-settle/core';
import { FakeClock } from '@p2p-settle/test-utils';

const FAST: RetryConfig = { maxAttempts: 3, initialDelayMs: 10, maxDelayMs: 100, exponentialBase: 2 };

/**
 * Operation that throws the given errors in order, then returns `value`.
 */
function failingThen<T>(value: T, ...errors: unknown[]): jest.Mock<(attempt: number) => Promise<T>> {
  return jest.fn(async (_attempt: number) => {
    const next = errors.shift();
    if (next !== undefined) throw next;
    return value;
  });
}

describe('RetryPolicy', () => {
  let clock: FakeClock;
  let logger: RecordingLogger;
  let policy: RetryPolicy;

  beforeEach(() => {
    clock = new FakeClock(0);
    logger = new RecordingLogger();
    policy = new RetryPolicy({ clock, logger });
  });

  // ===========================================================================
  // Backoff
  // ===========================================================================

  describe('backoff', () => {
    it('should retry transient failures with exponential sleeps', async () => {
      const operation = failingThen(42, new NetworkError('reset'), new NetworkError('reset'));

      const pending = policy.execute(FAST, 'fetch', operation);
      await clock.runAll();

      await expect(pending).resolves.toEqual({
        success: true,
        data: 42,
        attempts: 3,
        totalDelayMs: 30,
      });
      expect(clock.sleeps).toEqual([10, 20]);
      expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    });

    it('should cap the backoff at maxDelayMs', async () => {
      const config: RetryConfig = { maxAttempts: 5, initialDelayMs: 40, maxDelayMs: 100, exponentialBase: 2 };
      const operation = failingThen(
        'ok',
        new NetworkError('a'),
        new NetworkError('b'),
        new NetworkError('c'),
        new NetworkError('d')
      );

      const pending = policy.retry(config, 'fetch', operation);
      await clock.runAll();

      await expect(pending).resolves.toBe('ok');
      expect(clock.sleeps).toEqual([40, 80, 100, 100]);
    });

    it('should use the same delay for fixed-delay retries', async () => {
      const operation = failingThen('done', new SessionExpiredError('expired'), new SessionExpiredError('expired'));

      const pending = policy.retryWithFixedDelay(3, 25, 'login', operation);
      await clock.runAll();

      await expect(pending).resolves.toBe('done');
      expect(clock.sleeps).toEqual([25, 25]);
    });

    it('should report each retry through onRetry', async () => {
      const onRetry = jest.fn();
      const error = new NetworkError('reset');
      const pending = policy.execute(FAST, 'fetch', failingThen(1, error), { onRetry });
      await clock.runAll();
      await pending;

      expect(onRetry).toHaveBeenCalledWith(1, error, 10);
      expect(logger.hasLogMatching('warn', 'fetch: attempt 1 failed, retrying in 10ms')).toBe(true);
    });
  });

  // ===========================================================================
  // Error Hints
  // ===========================================================================

  describe('error hints', () => {
    it('should wait at least the server retry hint', async () => {
      const operation = failingThen('ok', new RateLimitError('slow down', { retryAfterMs: 70 }));

      const pending = policy.retry(FAST, 'approve', operation);
      await clock.runAll();

      await expect(pending).resolves.toBe('ok');
      expect(clock.sleeps).toEqual([70]);
    });

    it('should cap the server retry hint at maxDelayMs', () => {
      const delay = policy.calculateSleep(FAST, 10, new RateLimitError('x', { retryAfterMs: 5000 }));
      expect(delay).toBe(100);
    });

    it('should slow down after an anti-bot block without changing the sequence', async () => {
      const operation = failingThen('ok', new AntiBotBlockError('challenge'), new NetworkError('reset'));

      const pending = policy.retry(FAST, 'fetch', operation);
      await clock.runAll();

      await expect(pending).resolves.toBe('ok');
      expect(clock.sleeps).toEqual([20, 20]);
    });

    it('should apply a configured anti-bot multiplier', () => {
      const delay = policy.calculateSleep(
        { ...FAST, antiBotDelayMultiplier: 3 },
        10,
        new AntiBotBlockError('challenge')
      );
      expect(delay).toBe(30);
    });

    it('should add jitter from the injected random source', () => {
      const jittered = new RetryPolicy({ clock, logger, random: () => 0.5 });
      const delay = jittered.calculateSleep({ ...FAST, jitterRatio: 0.2 }, 50, new NetworkError('x'));
      expect(delay).toBe(55);
    });
  });

  // ===========================================================================
  // Terminal Outcomes
  // ===========================================================================

  describe('terminal outcomes', () => {
    it('should return a fatal error after the first attempt', async () => {
      const error = new AuthError('bad credentials');
      const operation = failingThen('never', error);

      const result = await policy.execute(FAST, 'login', operation);

      expect(result).toEqual({ success: false, error, attempts: 1, totalDelayMs: 0 });
      expect(operation).toHaveBeenCalledTimes(1);
      expect(clock.sleeps).toEqual([]);
    });

    it('should not retry foreign errors without a transient code', async () => {
      const error = new TypeError('undefined is not a function');
      const operation = failingThen('never', error);

      await expect(policy.retry(FAST, 'parse', operation)).rejects.toBe(error);
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should surface RetryExhaustedError carrying the last error', async () => {
      const last = new NetworkError('third');
      const operation = failingThen('never', new NetworkError('first'), new NetworkError('second'), last);

      const pending = policy.execute(FAST, 'fetch tx-1', operation);
      await clock.runAll();
      const result = await pending;

      expect(result.success).toBe(false);
      expect(result.attempts).toBe(3);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(RetryExhaustedError);
      expect(result.error).toMatchObject({
        message: 'fetch tx-1 failed after 3 attempts: third',
        cause: last,
      });
      expect(clock.sleeps).toEqual([10, 20]);
    });

    it('should make a single attempt when maxAttempts is 1', async () => {
      const operation = failingThen('never', new NetworkError('down'));

      await expect(policy.retry({ ...FAST, maxAttempts: 1 }, 'fetch', operation)).rejects.toBeInstanceOf(
        RetryExhaustedError
      );
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should return a fatal error raised on a later attempt', async () => {
      const fatal = new ValidationError('malformed response');
      const operation = failingThen('never', new NetworkError('reset'), fatal);

      const outcome = expect(policy.retry(FAST, 'fetch', operation)).rejects.toBe(fatal);
      await clock.runAll();

      await outcome;
      expect(operation).toHaveBeenCalledTimes(2);
    });
  });

  // ===========================================================================
  // Cancellation
  // ===========================================================================

  describe('cancellation', () => {
    it('should stop during a backoff sleep when the signal aborts', async () => {
      const controller = new AbortController();
      const operation = failingThen('never', new NetworkError('a'), new NetworkError('b'));

      const pending = policy.execute(FAST, 'fetch', operation, { signal: controller.signal });
      await clock.advance(5);
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
      expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should not start an attempt with an aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();
      const operation = failingThen('never');

      await expect(
        policy.execute(FAST, 'fetch', operation, { signal: controller.signal })
      ).rejects.toThrow('fetch cancelled before attempt 1');
      expect(operation).not.toHaveBeenCalled();
    });
  });
});
