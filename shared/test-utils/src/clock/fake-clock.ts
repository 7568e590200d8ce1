/**
 * Fake Clock
 *
 * Manual time source for settlement components. `sleep()` registers a timer
 * that fires only when the test advances time past it, so backoff and
 * refill waits are asserted exactly, without real delays or Jest fake timers.
 *
 * @example
 * ```typescript
 * const clock = new FakeClock();
 * const limiter = new RateLimiter({ clock });
 * const pending = limiter.acquire('gate');
 * await clock.advance(250);
 * const permit = await pending;
 * ```
 */

import { OperationCancelledError, type Clock } from '@p2p-settle/core';

interface PendingTimer {
  dueAt: number;
  seq: number;
  resolve: () => void;
}

/** Default start: an arbitrary fixed epoch so timestamps are stable. */
export const FAKE_CLOCK_START = 1_700_000_000_000;

/**
 * Let queued promise continuations run. Several macrotask turns cover
 * chains that hop through more than one await.
 */
export async function flushPromises(rounds = 5): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export class FakeClock implements Clock {
  private current: number;
  private seq = 0;
  private timers: PendingTimer[] = [];
  /** Every duration passed to sleep(), in call order */
  readonly sleeps: number[] = [];

  constructor(start: number = FAKE_CLOCK_START) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms);
    if (signal?.aborted) {
      return Promise.reject(new OperationCancelledError('Sleep cancelled'));
    }
    if (ms <= 0) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const timer: PendingTimer = {
        dueAt: this.current + ms,
        seq: this.seq++,
        resolve: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
      };
      const onAbort = (): void => {
        this.timers = this.timers.filter((t) => t !== timer);
        reject(new OperationCancelledError('Sleep cancelled'));
      };
      this.timers.push(timer);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Move time forward by `ms`, firing due timers in order. Continuations
   * of each fired timer run before the next one fires, so timers they
   * register within the window fire too.
   */
  async advance(ms: number): Promise<void> {
    const target = this.current + ms;
    await flushPromises();
    for (;;) {
      const next = this.nextTimer();
      if (!next || next.dueAt > target) break;
      this.fire(next);
      await flushPromises();
    }
    this.current = target;
    await flushPromises();
  }

  /**
   * Fire timers until none are pending, jumping time to each due point.
   *
   * @returns total time advanced
   */
  async runAll(maxTimers = 1000): Promise<number> {
    const start = this.current;
    await flushPromises();
    for (let fired = 0; fired < maxTimers; fired++) {
      const next = this.nextTimer();
      if (!next) break;
      this.fire(next);
      await flushPromises();
    }
    return this.current - start;
  }

  /** Move time without firing anything (e.g. to age cache entries). */
  setTime(now: number): void {
    this.current = now;
  }

  pendingTimerCount(): number {
    return this.timers.length;
  }

  private nextTimer(): PendingTimer | undefined {
    let best: PendingTimer | undefined;
    for (const timer of this.timers) {
      if (!best || timer.dueAt < best.dueAt || (timer.dueAt === best.dueAt && timer.seq < best.seq)) {
        best = timer;
      }
    }
    return best;
  }

  private fire(timer: PendingTimer): void {
    this.timers = this.timers.filter((t) => t !== timer);
    if (timer.dueAt > this.current) {
      this.current = timer.dueAt;
    }
    timer.resolve();
  }
}
