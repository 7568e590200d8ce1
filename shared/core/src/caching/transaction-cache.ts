/**
 * Transaction Cache
 *
 * Read-through TTL cache in front of the upstream transaction source.
 *
 * Features:
 * - Fresh entries are served without an outbound call
 * - Not-found outcomes are cached like records
 * - Single-flight per id: concurrent misses share one fetch
 * - Fetch failures are never cached and reach every coalesced caller
 * - Invalidation wins over an in-flight fetch: its result is dropped
 * - Each caller may cancel its own wait; the shared fetch is aborted once
 *   no caller is left waiting on it, or when the cache is cleared
 *
 * An entry read when `now - insertedAt >= ttlMs` is treated as absent.
 */

import {
  DEFAULT_COMPLETED_STATUS,
  type TransactionRecord,
  type TransactionSource,
  type TransactionStatusCode,
} from '@p2p-settle/types';
import { raceWithSignal } from '../async/async-utils';
import { systemClock, type Clock } from '../clock';
import { NotFoundError, OperationCancelledError, getErrorMessage } from '../error-handling';
import { createLogger } from '../logger';
import type { ILogger } from '../logging/types';

// =============================================================================
// Types
// =============================================================================

export interface TransactionCacheConfig {
  /** Entry lifetime (default: 300000 = 5 min) */
  ttlMs: number;
  /** Upstream status code meaning "completed" (default: 5) */
  completedStatus: TransactionStatusCode;
}

export interface TransactionCacheDeps {
  clock?: Clock;
  logger?: ILogger;
}

export interface TransactionCacheStats {
  /** Served from a fresh entry */
  hits: number;
  /** Started an upstream fetch */
  misses: number;
  /** Joined a fetch already in flight */
  coalesced: number;
  /** Entries currently stored (fresh or not yet pruned) */
  size: number;
  /** Fetches currently in flight */
  inFlight: number;
}

interface CacheEntry {
  /** null records an upstream not-found */
  value: TransactionRecord | null;
  insertedAt: number;
}

interface InFlightFetch {
  /** Identity of this fetch, and the signal handed to the source */
  controller: AbortController;
  promise: Promise<TransactionRecord | null>;
  /** Callers currently awaiting `promise` */
  waiters: number;
}

export const DEFAULT_TRANSACTION_CACHE_CONFIG: Readonly<TransactionCacheConfig> = {
  ttlMs: 5 * 60 * 1000,
  completedStatus: DEFAULT_COMPLETED_STATUS,
};

// =============================================================================
// TransactionCache
// =============================================================================

export class TransactionCache {
  private readonly config: TransactionCacheConfig;
  private readonly clock: Clock;
  private readonly logger: ILogger;
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, InFlightFetch>();
  private hits = 0;
  private misses = 0;
  private coalesced = 0;

  constructor(
    private readonly source: TransactionSource,
    config: Partial<TransactionCacheConfig> = {},
    deps: TransactionCacheDeps = {}
  ) {
    this.config = {
      ttlMs: config.ttlMs ?? DEFAULT_TRANSACTION_CACHE_CONFIG.ttlMs,
      completedStatus: config.completedStatus ?? DEFAULT_TRANSACTION_CACHE_CONFIG.completedStatus,
    };
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('transaction-cache');
  }

  /**
   * Current record for `id`, or undefined if the upstream does not know it.
   * Rejects with whatever the source surfaced when the fetch fails, or with
   * OperationCancelledError when `signal` aborts first.
   */
  async getTransaction(id: string, signal?: AbortSignal): Promise<TransactionRecord | undefined> {
    if (signal?.aborted) {
      throw new OperationCancelledError(`Lookup of transaction ${id} cancelled`);
    }

    const entry = this.entries.get(id);
    if (entry) {
      if (this.isFresh(entry)) {
        this.hits++;
        return entry.value ?? undefined;
      }
      this.entries.delete(id);
    }

    let flight = this.inFlight.get(id);
    if (flight) {
      this.coalesced++;
    } else {
      this.misses++;
      const controller = new AbortController();
      flight = { controller, promise: this.fetchAndStore(id, controller), waiters: 0 };
      this.inFlight.set(id, flight);
    }
    return this.awaitFetch(id, flight, signal);
  }

  /**
   * Resolve several ids at once. Duplicates share one lookup.
   */
  async getMultipleTransactions(
    ids: readonly string[],
    signal?: AbortSignal
  ): Promise<Map<string, TransactionRecord | undefined>> {
    const unique = [...new Set(ids)];
    const records = await Promise.all(unique.map((id) => this.getTransaction(id, signal)));
    return new Map(unique.map((id, index) => [id, records[index]]));
  }

  async getTransactionStatus(id: string, signal?: AbortSignal): Promise<TransactionStatusCode | undefined> {
    const record = await this.getTransaction(id, signal);
    return record?.status;
  }

  /**
   * False for unknown transactions.
   */
  async isTransactionCompleted(id: string, signal?: AbortSignal): Promise<boolean> {
    const record = await this.getTransaction(id, signal);
    return record !== undefined && this.isCompletedRecord(record);
  }

  isCompletedRecord(record: TransactionRecord): boolean {
    return record.status === this.config.completedStatus;
  }

  /**
   * Drop the entry for `id`. A fetch still in flight for it will not be
   * stored, and the next lookup fetches again.
   */
  removeFromCache(id: string): void {
    this.entries.delete(id);
    this.inFlight.delete(id);
  }

  /**
   * Drop every entry and abort every fetch in flight. Callers still waiting
   * on an aborted fetch reject with OperationCancelledError.
   */
  clearCache(): void {
    this.entries.clear();
    const flights = [...this.inFlight.values()];
    this.inFlight.clear();
    for (const flight of flights) {
      flight.controller.abort();
    }
  }

  /**
   * Remove expired entries eagerly.
   *
   * @returns number of entries removed
   */
  pruneExpired(): number {
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (!this.isFresh(entry)) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  getStats(): TransactionCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      coalesced: this.coalesced,
      size: this.entries.size,
      inFlight: this.inFlight.size,
    };
  }

  private isFresh(entry: CacheEntry): boolean {
    return this.clock.now() - entry.insertedAt < this.config.ttlMs;
  }

  private async awaitFetch(
    id: string,
    flight: InFlightFetch,
    signal?: AbortSignal
  ): Promise<TransactionRecord | undefined> {
    flight.waiters++;
    try {
      const value = await raceWithSignal(flight.promise, signal, `Lookup of transaction ${id} cancelled`);
      return value ?? undefined;
    } finally {
      flight.waiters--;
      if (flight.waiters === 0 && this.inFlight.get(id) === flight) {
        this.inFlight.delete(id);
        flight.controller.abort();
        this.logger.debug('Aborted fetch with no callers left', { transactionId: id });
      }
    }
  }

  private async fetchAndStore(id: string, controller: AbortController): Promise<TransactionRecord | null> {
    const isCurrent = (): boolean => this.inFlight.get(id)?.controller === controller;
    try {
      let value: TransactionRecord | null;
      try {
        // Deferred so the flight is registered before the source runs.
        value = await Promise.resolve().then(() => this.source.fetch(id, controller.signal));
      } catch (error) {
        if (controller.signal.aborted) {
          throw new OperationCancelledError(`Fetch of transaction ${id} aborted`, { cause: error });
        }
        if (!(error instanceof NotFoundError)) {
          this.logger.warn('Transaction fetch failed', { transactionId: id, error: getErrorMessage(error) });
          throw error;
        }
        value = null;
      }
      if (controller.signal.aborted) {
        throw new OperationCancelledError(`Fetch of transaction ${id} aborted`);
      }

      if (isCurrent()) {
        this.entries.set(id, { value, insertedAt: this.clock.now() });
      } else {
        this.logger.debug('Discarding fetch result invalidated while in flight', { transactionId: id });
      }
      return value;
    } finally {
      if (isCurrent()) {
        this.inFlight.delete(id);
      }
    }
  }
}
