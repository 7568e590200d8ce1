export { AccountPool } from './account-pool';
export type { AccountPoolOptions } from './account-pool';
export {
  mostFreeSlotsFirst,
  lowestIdFirst,
  resolveAllocationPolicy,
} from './allocation-policy';
export type { AllocationPolicy, AllocationPolicyName } from './allocation-policy';
export { JsonFileAccountStore } from './json-file-account-store';
export {
  RedisAccountStore,
  createRedisAccountStore,
  DEFAULT_ACCOUNT_STORE_KEY,
} from './redis-account-store';
export type { RedisKeyValueClient } from './redis-account-store';
export {
  AccountPoolSnapshotSchema,
  parseAccountPoolSnapshot,
} from './snapshot-schema';
