/**
 * AsyncMutex
 *
 * FIFO mutual exclusion for async critical sections. The rate limiter holds
 * one per service bucket and the account pool holds one around every
 * mutation, so waiters are served strictly in arrival order.
 *
 * @example
 * ```ts
 * const mutex = new AsyncMutex();
 *
 * await mutex.runExclusive(async () => {
 *   await saveSnapshot();
 * });
 *
 * const release = await mutex.acquire(signal);
 * try {
 *   await doSomething();
 * } finally {
 *   release();
 * }
 * ```
 */

import { OperationCancelledError } from '../error-handling';

export interface MutexStats {
  /** Number of times the mutex was acquired */
  acquireCount: number;
  /** Number of times callers had to wait (contention) */
  contentionCount: number;
  /** Number of waits abandoned through an AbortSignal */
  cancelledCount: number;
  /** Total time spent waiting in milliseconds */
  totalWaitTimeMs: number;
  /** Whether the mutex is currently held */
  isLocked: boolean;
  /** Number of callers currently waiting */
  waitingCount: number;
}

interface Waiter {
  resolve: () => void;
  reject: (err: Error) => void;
}

export class AsyncMutex {
  private locked = false;
  private readonly waitQueue: Waiter[] = [];
  private stats = {
    acquireCount: 0,
    contentionCount: 0,
    cancelledCount: 0,
    totalWaitTimeMs: 0,
  };

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Acquire the mutex, waiting behind earlier callers if it is held.
   * An aborted wait leaves the queue and rejects with OperationCancelledError.
   *
   * @returns A release function that MUST be called when done
   */
  async acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      throw new OperationCancelledError('Mutex acquire cancelled');
    }

    if (this.locked) {
      const startTime = this.now();
      this.stats.contentionCount++;
      await this.enqueue(signal);
      this.stats.totalWaitTimeMs += this.now() - startTime;
    }

    // A waiter that wakes up already owns the lock through handoff.
    this.locked = true;
    this.stats.acquireCount++;
    return this.createRelease();
  }

  /**
   * Acquire without waiting.
   *
   * @returns Release function if acquired, null if the mutex is held
   */
  tryAcquire(): (() => void) | null {
    if (this.locked) {
      return null;
    }
    this.locked = true;
    this.stats.acquireCount++;
    return this.createRelease();
  }

  /**
   * Run `fn` with exclusive access. The mutex is released when fn settles.
   */
  async runExclusive<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  getStats(): MutexStats {
    return {
      ...this.stats,
      isLocked: this.locked,
      waitingCount: this.waitQueue.length,
    };
  }

  /**
   * Reject every queued waiter with `reason`.
   *
   * @returns The number of waiters that were cancelled
   */
  cancelWaiters(reason: Error): number {
    const waiters = this.waitQueue.splice(0);
    for (const waiter of waiters) {
      waiter.reject(reason);
    }
    return waiters.length;
  }

  private enqueue(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waitQueue.indexOf(waiter);
        if (index !== -1) {
          this.waitQueue.splice(index, 1);
          this.stats.cancelledCount++;
          reject(new OperationCancelledError('Mutex acquire cancelled'));
        }
      };
      const waiter: Waiter = {
        resolve: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
        reject: (err) => {
          signal?.removeEventListener('abort', onAbort);
          reject(err);
        },
      };
      this.waitQueue.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      // Direct handoff: the lock stays held while the next waiter wakes,
      // so no newcomer can slip in between release and wake-up.
      const next = this.waitQueue.shift();
      if (next) {
        next.resolve();
      } else {
        this.locked = false;
      }
    };
  }
}
