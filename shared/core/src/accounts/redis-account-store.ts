/**
 * Redis-backed account store.
 *
 * The whole snapshot lives as one JSON string under a single key, written
 * with SET. A missing key loads as an empty pool. Any client exposing
 * ioredis-compatible get/set works, which is how tests inject RedisMock.
 */

import { Redis } from 'ioredis';
import {
  createEmptySnapshot,
  type AccountPoolSnapshot,
  type AccountStore,
} from '@p2p-settle/types';
import { systemClock, type Clock } from '../clock';
import { PersistenceError, ValidationError } from '../error-handling';
import { parseAccountPoolSnapshot } from './snapshot-schema';

export const DEFAULT_ACCOUNT_STORE_KEY = 'p2p:accounts:snapshot';

/**
 * Subset of the ioredis client used by the store.
 */
export interface RedisKeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

export class RedisAccountStore implements AccountStore {
  constructor(
    private readonly client: RedisKeyValueClient,
    readonly key: string = DEFAULT_ACCOUNT_STORE_KEY,
    private readonly clock: Clock = systemClock
  ) {}

  async load(): Promise<AccountPoolSnapshot> {
    let raw: string | null;
    try {
      raw = await this.client.get(this.key);
    } catch (error) {
      throw new PersistenceError(`Redis GET ${this.key} failed`, { cause: error });
    }
    if (raw === null) {
      return createEmptySnapshot(this.clock.now());
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ValidationError(`Account snapshot at ${this.key} is not valid JSON`, { cause: error });
    }
    return parseAccountPoolSnapshot(parsed, `redis:${this.key}`);
  }

  async save(snapshot: AccountPoolSnapshot): Promise<void> {
    try {
      await this.client.set(this.key, JSON.stringify(snapshot));
    } catch (error) {
      throw new PersistenceError(`Redis SET ${this.key} failed`, { cause: error });
    }
  }
}

/**
 * Connect an ioredis client and wrap it in a store.
 * The caller owns the returned client and must quit() it on shutdown.
 */
export function createRedisAccountStore(
  url: string,
  key: string = DEFAULT_ACCOUNT_STORE_KEY,
  clock: Clock = systemClock
): { store: RedisAccountStore; client: Redis } {
  const client = new Redis(url, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  });
  return { store: new RedisAccountStore(client, key, clock), client };
}
