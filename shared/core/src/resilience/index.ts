export { RetryPolicy, DEFAULT_RETRY_CONFIG } from './retry-policy';
export type {
  RetryConfig,
  RetryResult,
  RetryOperation,
  RetryExecuteOptions,
  RetryPolicyOptions,
} from './retry-policy';
