export { TransactionCache, DEFAULT_TRANSACTION_CACHE_CONFIG } from './transaction-cache';
export type {
  TransactionCacheConfig,
  TransactionCacheDeps,
  TransactionCacheStats,
} from './transaction-cache';
