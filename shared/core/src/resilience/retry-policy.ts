// Exponential Backoff Retry Policy
// Retries upstream calls on retryable taxonomy errors, with server hints and
// anti-bot slowdown folded into the backoff sleep.

import { systemClock, type Clock } from '../clock';
import {
  AntiBotBlockError,
  OperationCancelledError,
  RateLimitError,
  RetryExhaustedError,
  getErrorMessage,
  isRetryableError,
} from '../error-handling';
import { createLogger } from '../logger';
import type { ILogger } from '../logging/types';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  /** 1 gives a fixed delay */
  exponentialBase: number;
  /** Factor applied to the sleep after an AntiBotBlockError (default 2) */
  antiBotDelayMultiplier?: number;
  /** Random extra sleep as a fraction of the delay, 0..1 (default 0) */
  jitterRatio?: number;
}

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 60_000,
  exponentialBase: 2,
};

const DEFAULT_ANTI_BOT_MULTIPLIER = 2;

export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalDelayMs: number }
  | { success: false; error: unknown; attempts: number; totalDelayMs: number };

/**
 * Attempt body. `attempt` is 1-based.
 */
export type RetryOperation<T> = (attempt: number, signal?: AbortSignal) => Promise<T>;

export interface RetryExecuteOptions {
  signal?: AbortSignal;
  /** Called before each backoff sleep */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export interface RetryPolicyOptions {
  clock?: Clock;
  logger?: ILogger;
  /** Source of randomness for jitter, returning [0, 1) */
  random?: () => number;
}

export class RetryPolicy {
  private readonly clock: Clock;
  private readonly logger: ILogger;
  private readonly random: () => number;

  constructor(options: RetryPolicyOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('retry-policy');
    this.random = options.random ?? Math.random;
  }

  /**
   * Run `operation` until it succeeds, fails fatally, or runs out of attempts.
   *
   * Never rejects for operation failures: a fatal error is returned as-is,
   * exhaustion as a RetryExhaustedError carrying the last error.
   *
   * @throws OperationCancelledError if `options.signal` aborts
   */
  async execute<T>(
    config: RetryConfig,
    name: string,
    operation: RetryOperation<T>,
    options: RetryExecuteOptions = {}
  ): Promise<RetryResult<T>> {
    const { signal } = options;
    const maxAttempts = Math.max(1, Math.floor(config.maxAttempts));
    let baseDelay = config.initialDelayMs;
    let totalDelayMs = 0;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw new OperationCancelledError(`${name} cancelled before attempt ${attempt}`);
      }

      this.logger.debug(`${name}: attempt ${attempt}/${maxAttempts}`, { operation: name, attempt });

      try {
        const data = await operation(attempt, signal);
        return { success: true, data, attempts: attempt, totalDelayMs };
      } catch (error) {
        if (!isRetryableError(error)) {
          this.logger.debug(`${name}: error not retryable, giving up`, {
            operation: name,
            attempt,
            error: getErrorMessage(error),
          });
          return { success: false, error, attempts: attempt, totalDelayMs };
        }

        if (attempt >= maxAttempts) {
          this.logger.warn(`${name} failed after ${attempt} attempts`, {
            operation: name,
            attempts: attempt,
            error: getErrorMessage(error),
          });
          return {
            success: false,
            error: new RetryExhaustedError(name, attempt, error),
            attempts: attempt,
            totalDelayMs,
          };
        }

        const delayMs = this.calculateSleep(config, baseDelay, error);
        this.logger.warn(`${name}: attempt ${attempt} failed, retrying in ${delayMs}ms`, {
          operation: name,
          attempt,
          maxAttempts,
          error: getErrorMessage(error),
        });
        options.onRetry?.(attempt, error, delayMs);

        await this.clock.sleep(delayMs, signal);
        totalDelayMs += delayMs;
        baseDelay = Math.min(baseDelay * config.exponentialBase, config.maxDelayMs);
      }
    }
  }

  /**
   * Same loop as execute(), resolving with the value or throwing the
   * surfaced error (the fatal error, or RetryExhaustedError).
   */
  async retry<T>(
    config: RetryConfig,
    name: string,
    operation: RetryOperation<T>,
    options: RetryExecuteOptions = {}
  ): Promise<T> {
    const result = await this.execute(config, name, operation, options);
    if (result.success) {
      return result.data;
    }
    throw result.error;
  }

  /**
   * Retry with the same delay before every attempt.
   */
  retryWithFixedDelay<T>(
    maxAttempts: number,
    delayMs: number,
    name: string,
    operation: RetryOperation<T>,
    options: RetryExecuteOptions = {}
  ): Promise<T> {
    return this.retry(
      { maxAttempts, initialDelayMs: delayMs, maxDelayMs: delayMs, exponentialBase: 1 },
      name,
      operation,
      options
    );
  }

  /**
   * Sleep before the next attempt. `baseDelay` is the current term of the
   * backoff sequence; error hints adjust only this sleep, not the sequence.
   */
  calculateSleep(config: RetryConfig, baseDelay: number, error: unknown): number {
    let delay = baseDelay;

    if (error instanceof RateLimitError && error.retryAfterMs !== undefined) {
      delay = Math.max(delay, error.retryAfterMs);
    } else if (error instanceof AntiBotBlockError) {
      delay *= config.antiBotDelayMultiplier ?? DEFAULT_ANTI_BOT_MULTIPLIER;
    }

    const jitterRatio = config.jitterRatio ?? 0;
    if (jitterRatio > 0) {
      delay += Math.floor(delay * jitterRatio * this.random());
    }

    return Math.min(delay, config.maxDelayMs);
  }
}
