/**
 * Shared Async Utilities
 *
 * Abortable sleep and waits, deferred promises and bounded-concurrency mapping.
 */

import { OperationCancelledError } from '../error-handling';

// =============================================================================
// Sleep
// =============================================================================

/**
 * Sleep for `ms` milliseconds. Rejects with OperationCancelledError if
 * `signal` aborts first; the timer is cleared in that case.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new OperationCancelledError('Sleep cancelled'));
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new OperationCancelledError('Sleep cancelled'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settle with `promise`, or reject with OperationCancelledError as soon as
 * `signal` aborts. Aborting does not stop the underlying work.
 */
export function raceWithSignal<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  message = 'Operation cancelled'
): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new OperationCancelledError(message));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new OperationCancelledError(message));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

// =============================================================================
// Deferred
// =============================================================================

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason?: unknown) => void;
}

/**
 * Create a promise with external resolve/reject controls.
 */
export function createDeferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason?: unknown) => void = () => undefined;

  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
}

// =============================================================================
// Concurrency Utilities
// =============================================================================

/**
 * Hands out each index exactly once. The check-and-increment runs
 * synchronously, so workers sharing it on one event loop never collide.
 */
function createIndexGenerator(length: number): () => number | null {
  let currentIndex = 0;

  return (): number | null => {
    if (currentIndex >= length) {
      return null;
    }
    return currentIndex++;
  };
}

/**
 * Map `items` through `fn` with at most `concurrency` calls in flight.
 * Results keep the input order. The first rejection rejects the whole call.
 */
export async function mapConcurrent<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const getNextIndex = createIndexGenerator(items.length);

  async function worker(): Promise<void> {
    let index: number | null;
    while ((index = getNextIndex()) !== null) {
      results[index] = await fn(items[index], index);
    }
  }

  const workers: Promise<void>[] = [];
  const workerCount = Math.min(Math.max(1, concurrency), items.length);
  for (let i = 0; i < workerCount; i++) {
    workers.push(worker());
  }

  await Promise.all(workers);
  return results;
}
