/**
 * Async Module
 *
 * - AsyncMutex: FIFO mutual exclusion with cancellable waits
 * - sleep, createDeferred, mapConcurrent
 *
 * @module async
 */

export { AsyncMutex } from './async-mutex';
export type { MutexStats } from './async-mutex';

export { sleep, raceWithSignal, createDeferred, mapConcurrent } from './async-utils';
export type { Deferred } from './async-utils';
