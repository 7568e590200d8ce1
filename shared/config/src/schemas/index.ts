/**
 * Zod Schema Validation for Service Configuration
 *
 * Runtime validation for the settlement service configuration. Values read
 * from the environment pass TypeScript checks trivially (they are strings),
 * so every numeric and enumerated setting is validated here once, at
 * startup. Components trust the validated object afterwards.
 */

import { z } from 'zod';

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * Positive integer.
 */
export const PositiveIntSchema = z
  .number()
  .int()
  .positive('Value must be a positive integer');

/**
 * Non-negative integer.
 */
export const NonNegativeIntSchema = z
  .number()
  .int()
  .min(0, 'Value cannot be negative');

// =============================================================================
// Component Schemas
// =============================================================================

/**
 * Token bucket settings for one upstream service.
 */
export const RateLimitSchema = z.object({
  requestsPerMinute: PositiveIntSchema.describe('Sustained request rate'),
  burstSize: PositiveIntSchema.describe('Bucket capacity'),
});

export const RateLimitsSchema = z.object({
  gate: RateLimitSchema,
  bybit: RateLimitSchema,
  default: RateLimitSchema,
});

/**
 * Exponential backoff settings.
 */
export const RetrySchema = z
  .object({
    maxAttempts: PositiveIntSchema,
    initialDelayMs: NonNegativeIntSchema,
    maxDelayMs: NonNegativeIntSchema,
    exponentialBase: z.number().min(1, 'Exponential base must be >= 1'),
  })
  .refine(
    (retry) => retry.maxDelayMs >= retry.initialDelayMs,
    { message: 'maxDelayMs must be >= initialDelayMs', path: ['maxDelayMs'] }
  );

export const AllocationPolicyNameSchema = z.enum(['most-free-slots', 'lowest-id']);

/**
 * Where the account pool snapshot lives.
 */
export const AccountStoreSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('file'),
    path: z.string().min(1, 'Store path is required'),
  }),
  z.object({
    kind: z.literal('redis'),
    url: z.string().regex(/^rediss?:\/\//, 'Redis URL must start with redis:// or rediss://'),
    key: z.string().min(1, 'Store key is required'),
  }),
]);

export const AccountPoolSchema = z.object({
  maxAdsPerAccount: PositiveIntSchema,
  allocationPolicy: AllocationPolicyNameSchema,
  store: AccountStoreSchema,
});

export const TransactionCacheSchema = z.object({
  ttlMs: PositiveIntSchema,
  completedStatus: z.number().int(),
});

export const WorkerSchema = z.object({
  concurrency: PositiveIntSchema,
});

export const ServiceConfigSchema = z.object({
  rateLimits: RateLimitsSchema,
  retry: RetrySchema,
  accountPool: AccountPoolSchema,
  transactionCache: TransactionCacheSchema,
  worker: WorkerSchema,
});

export type RateLimitSettings = z.infer<typeof RateLimitSchema>;
export type RateLimitsSettings = z.infer<typeof RateLimitsSchema>;
export type RetrySettings = z.infer<typeof RetrySchema>;
export type AllocationPolicyName = z.infer<typeof AllocationPolicyNameSchema>;
export type AccountStoreSettings = z.infer<typeof AccountStoreSchema>;
export type AccountPoolSettings = z.infer<typeof AccountPoolSchema>;
export type TransactionCacheSettings = z.infer<typeof TransactionCacheSchema>;
export type WorkerSettings = z.infer<typeof WorkerSchema>;
export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Thrown when configuration fails validation. Carries every failing path.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly context: string,
    public readonly issues: ConfigIssue[]
  ) {
    super(
      `Config validation failed for ${context}:\n` +
      issues.map((issue) => `  - ${issue.path}: ${issue.message}`).join('\n')
    );
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Validation result with detailed error information.
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ConfigIssue[] };

/**
 * Validate data against a schema and return detailed result.
 * Does NOT throw - returns result object for handling.
 */
export function validateWithDetails<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((e: z.ZodIssue) => ({
      path: e.path.join('.'),
      message: e.message,
    })),
  };
}

/**
 * Validate data and throw on failure.
 * Use at startup/load time, not in hot paths.
 *
 * @throws ConfigValidationError listing every failing path
 */
export function validateOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  context: string
): T {
  const result = validateWithDetails(schema, data);
  if (result.success) {
    return result.data;
  }
  throw new ConfigValidationError(context, result.errors);
}
