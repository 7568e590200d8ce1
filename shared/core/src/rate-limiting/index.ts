export { RateLimiter, DEFAULT_SERVICE_LIMITS, DEFAULT_UNKNOWN_SERVICE_LIMIT } from './rate-limiter';
export type { Permit, RateLimiterOptions } from './rate-limiter';
export { TokenBucket } from './token-bucket';
export type { TokenBucketConfig, TokenBucketStats } from './token-bucket';
