/**
 * Clock abstraction.
 *
 * Every time-dependent component (rate limiter refill, retry backoff, cache
 * expiry, account timestamps) reads time and sleeps through a Clock, so tests
 * can drive time with FakeClock from @p2p-settle/test-utils.
 */

import { sleep } from './async/async-utils';

export interface Clock {
  /** Milliseconds since the epoch. */
  now(): number;

  /**
   * Resolve after `ms` milliseconds of clock time.
   * Rejects with OperationCancelledError when `signal` aborts.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return sleep(ms, signal);
  }
}

export const systemClock: Clock = new SystemClock();
