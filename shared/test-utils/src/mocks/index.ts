export { RedisMock, createRedisMock } from './redis.mock';
export type { RedisMockOptions, RedisOperation } from './redis.mock';
export { FakeTransactionApi } from './fake-transaction-api';
