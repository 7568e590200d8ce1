/**
 * Rate-limited, retrying wrapper around the opaque upstream transaction API.
 *
 * Every attempt of every call takes one permit from the shared RateLimiter
 * before it reaches the upstream, so retries are throttled like first
 * attempts. Failures surface as the shared error taxonomy: the first fatal
 * error, or RetryExhaustedError once attempts run out.
 */

import {
  createLogger,
  type ILogger,
  type RateLimiter,
  type RetryConfig,
  type RetryPolicy,
} from '@p2p-settle/core';
import type {
  ApprovedTransaction,
  PaymentEvidence,
  TransactionApi,
  TransactionRecord,
} from '@p2p-settle/types';

export interface RateLimitedTransactionClientOptions {
  /** Rate-limiter bucket the upstream calls draw from (default 'gate') */
  serviceName?: string;
  logger?: ILogger;
}

export class RateLimitedTransactionClient implements TransactionApi {
  private readonly serviceName: string;
  private readonly logger: ILogger;

  constructor(
    private readonly api: TransactionApi,
    private readonly limiter: RateLimiter,
    private readonly retryPolicy: RetryPolicy,
    private readonly retryConfig: RetryConfig,
    options: RateLimitedTransactionClientOptions = {}
  ) {
    this.serviceName = options.serviceName ?? 'gate';
    this.logger = options.logger ?? createLogger('transaction-client');
  }

  /**
   * @returns the record, or null when the upstream does not know `id`
   */
  fetch(id: string, signal?: AbortSignal): Promise<TransactionRecord | null> {
    return this.retryPolicy.retry(
      this.retryConfig,
      `fetch transaction ${id}`,
      async (_attempt, attemptSignal) => {
        await this.limiter.acquire(this.serviceName, attemptSignal);
        return this.api.fetch(id, attemptSignal);
      },
      { signal }
    );
  }

  async approve(id: string, evidence: PaymentEvidence, signal?: AbortSignal): Promise<ApprovedTransaction> {
    const approved = await this.retryPolicy.retry(
      this.retryConfig,
      `approve transaction ${id}`,
      async (_attempt, attemptSignal) => {
        await this.limiter.acquire(this.serviceName, attemptSignal);
        return this.api.approve(id, evidence, attemptSignal);
      },
      { signal }
    );
    this.logger.info('Transaction approved', { transactionId: id, status: approved.status });
    return approved;
  }
}
