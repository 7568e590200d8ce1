/**
 * Settlement runtime wiring.
 *
 * Builds every component once from a validated ServiceConfig and injects
 * them into each other. Nothing here is a module-level singleton; callers
 * own the returned runtime and must call shutdown() when done.
 */

import {
  describeAccountStore,
  type AccountStoreSettings,
  type ServiceConfig,
} from '@p2p-settle/config';
import {
  AccountPool,
  JsonFileAccountStore,
  RateLimiter,
  RetryPolicy,
  TransactionCache,
  createLogger,
  createRedisAccountStore,
  systemClock,
  type Clock,
  type ILogger,
  type RetryConfig,
} from '@p2p-settle/core';
import type { AccountStore, TransactionApi } from '@p2p-settle/types';
import { RateLimitedTransactionClient } from './transaction-client';
import { SettlementWorkflow, type AdPublisher } from './settlement-workflow';

export interface SettlementRuntimeDeps {
  /** Opaque upstream payout API */
  api: TransactionApi;
  adPublisher: AdPublisher;
  clock?: Clock;
  logger?: ILogger;
  /** Overrides the store named in config (tests, custom backends) */
  store?: AccountStore;
}

export interface SettlementRuntime {
  limiter: RateLimiter;
  retryPolicy: RetryPolicy;
  retryConfig: RetryConfig;
  pool: AccountPool;
  client: RateLimitedTransactionClient;
  cache: TransactionCache;
  workflow: SettlementWorkflow;
  /** Abort in-flight transaction lookups and release connections held by the runtime */
  shutdown(): Promise<void>;
}

interface StoreHandle {
  store: AccountStore;
  close(): Promise<void>;
}

function openStore(settings: AccountStoreSettings, clock: Clock): StoreHandle {
  switch (settings.kind) {
    case 'file':
      return { store: new JsonFileAccountStore(settings.path, clock), close: async () => undefined };
    case 'redis': {
      const { store, client } = createRedisAccountStore(settings.url, settings.key, clock);
      return {
        store,
        close: async () => {
          await client.quit();
        },
      };
    }
  }
}

export async function createSettlementRuntime(
  config: ServiceConfig,
  deps: SettlementRuntimeDeps
): Promise<SettlementRuntime> {
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger ?? createLogger('settlement-worker');

  const limiter = new RateLimiter({
    limits: { gate: config.rateLimits.gate, bybit: config.rateLimits.bybit },
    defaultLimit: config.rateLimits.default,
    clock,
    logger: logger.child({ component: 'rate-limiter' }),
  });
  const retryPolicy = new RetryPolicy({ clock, logger: logger.child({ component: 'retry-policy' }) });
  const retryConfig: RetryConfig = { ...config.retry };

  const handle: StoreHandle = deps.store
    ? { store: deps.store, close: async () => undefined }
    : openStore(config.accountPool.store, clock);

  let pool: AccountPool;
  try {
    pool = await AccountPool.create(handle.store, {
      maxAdsPerAccount: config.accountPool.maxAdsPerAccount,
      allocationPolicy: config.accountPool.allocationPolicy,
      clock,
      logger: logger.child({ component: 'account-pool' }),
    });
  } catch (error) {
    await handle.close();
    throw error;
  }

  const client = new RateLimitedTransactionClient(deps.api, limiter, retryPolicy, retryConfig, {
    serviceName: 'gate',
    logger: logger.child({ component: 'transaction-client' }),
  });
  const cache = new TransactionCache(client, config.transactionCache, {
    clock,
    logger: logger.child({ component: 'transaction-cache' }),
  });
  const workflow = new SettlementWorkflow(cache, pool, client, deps.adPublisher, {
    concurrency: config.worker.concurrency,
    logger: logger.child({ component: 'settlement-workflow' }),
  });

  logger.info('Settlement runtime ready', {
    accountStore: deps.store ? 'injected' : describeAccountStore(config.accountPool.store),
    ...pool.getStats(),
  });

  return {
    limiter,
    retryPolicy,
    retryConfig,
    pool,
    client,
    cache,
    workflow,
    shutdown: async () => {
      cache.clearCache();
      await handle.close();
      logger.info('Settlement runtime stopped');
    },
  };
}
