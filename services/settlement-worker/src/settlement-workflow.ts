/**
 * Settlement Workflow
 *
 * Drives one pending transaction through the core components:
 * 1. read current state through the TransactionCache
 * 2. reserve an ad slot on a Bybit account
 * 3. hand the ad to the external AdPublisher
 * and later, when the buyer's payment is confirmed, approves the payout and
 * gives the slot back.
 *
 * The pool mutex is never held across upstream calls: slot reservation and
 * release are separate pool operations around the publish/approve calls.
 */

import {
  OperationCancelledError,
  createLogger,
  getErrorMessage,
  mapConcurrent,
  type AccountPool,
  type ILogger,
  type TransactionCache,
} from '@p2p-settle/core';
import type {
  ApprovedTransaction,
  BybitAccount,
  PaymentEvidence,
  TransactionApi,
  TransactionRecord,
} from '@p2p-settle/types';

/**
 * Publishes a P2P advertisement for a transaction on a Bybit account.
 * Implemented outside this system.
 */
export interface AdPublisher {
  publish(account: BybitAccount, transaction: TransactionRecord, signal?: AbortSignal): Promise<void>;
}

export type OpenAdOutcome =
  | { status: 'not-found'; transactionId: string }
  | { status: 'already-completed'; transactionId: string }
  | { status: 'deferred'; transactionId: string }
  | { status: 'published'; transactionId: string; accountId: number };

export type BatchOutcome =
  | OpenAdOutcome
  | { status: 'failed'; transactionId: string; error: string };

export interface SettlementWorkflowOptions {
  /** Transactions opened at once by processBatch (default 5) */
  concurrency?: number;
  logger?: ILogger;
}

const DEFAULT_CONCURRENCY = 5;

export class SettlementWorkflow {
  private readonly concurrency: number;
  private readonly logger: ILogger;

  constructor(
    private readonly cache: TransactionCache,
    private readonly pool: AccountPool,
    private readonly client: TransactionApi,
    private readonly publisher: AdPublisher,
    options: SettlementWorkflowOptions = {}
  ) {
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.logger = options.logger ?? createLogger('settlement-workflow');
  }

  /**
   * Publish an ad for a pending transaction.
   *
   * If publishing fails the reserved slot is released before the error is
   * rethrown. `signal` also cancels the upstream lookup, including its
   * rate-limit waits and retry backoff.
   */
  async openAd(transactionId: string, signal?: AbortSignal): Promise<OpenAdOutcome> {
    const transaction = await this.cache.getTransaction(transactionId, signal);
    if (!transaction) {
      this.logger.warn('Transaction not found upstream', { transactionId });
      return { status: 'not-found', transactionId };
    }
    if (this.cache.isCompletedRecord(transaction)) {
      this.logger.debug('Transaction already completed', { transactionId });
      return { status: 'already-completed', transactionId };
    }

    const account = await this.pool.acquireBybitAccountForAd(signal);
    if (!account) {
      return { status: 'deferred', transactionId };
    }

    try {
      await this.publisher.publish(account, transaction, signal);
    } catch (error) {
      this.logger.error('Ad publish failed, releasing slot', {
        transactionId,
        accountId: account.id,
        error: getErrorMessage(error),
      });
      await this.releaseAfterFailure(transactionId, account.id);
      throw error;
    }

    this.logger.info('Ad published', { transactionId, accountId: account.id });
    return { status: 'published', transactionId, accountId: account.id };
  }

  /**
   * Approve the payout for a confirmed payment and free the ad slot.
   *
   * The cache entry is dropped whatever the outcome, since the upstream
   * state may have changed. The slot is released on success and on any
   * failure except cancellation, where the approval outcome is unknown.
   */
  async confirmPayment(
    transactionId: string,
    accountId: number,
    evidence: PaymentEvidence,
    signal?: AbortSignal
  ): Promise<ApprovedTransaction> {
    let approved: ApprovedTransaction;
    try {
      approved = await this.client.approve(transactionId, evidence, signal);
    } catch (error) {
      this.cache.removeFromCache(transactionId);
      if (!(error instanceof OperationCancelledError)) {
        this.logger.error('Payment approval failed, releasing slot', {
          transactionId,
          accountId,
          error: getErrorMessage(error),
        });
        await this.releaseAfterFailure(transactionId, accountId);
      }
      throw error;
    }

    this.cache.removeFromCache(transactionId);
    await this.pool.releaseBybitAdSlot(accountId);
    this.logger.info('Payment confirmed', { transactionId, accountId });
    return approved;
  }

  /**
   * Open ads for several transactions with bounded concurrency. A failure
   * for one id is reported in its outcome and does not stop the others;
   * cancellation stops the batch.
   */
  async processBatch(transactionIds: readonly string[], signal?: AbortSignal): Promise<BatchOutcome[]> {
    const outcomes = await mapConcurrent(
      transactionIds,
      async (transactionId): Promise<BatchOutcome> => {
        if (signal?.aborted) {
          throw new OperationCancelledError('Batch cancelled');
        }
        try {
          return await this.openAd(transactionId, signal);
        } catch (error) {
          if (error instanceof OperationCancelledError) {
            throw error;
          }
          return { status: 'failed', transactionId, error: getErrorMessage(error) };
        }
      },
      this.concurrency
    );

    this.logger.info('Batch processed', {
      total: outcomes.length,
      published: outcomes.filter((o) => o.status === 'published').length,
      deferred: outcomes.filter((o) => o.status === 'deferred').length,
      failed: outcomes.filter((o) => o.status === 'failed').length,
    });
    return outcomes;
  }

  /**
   * Give a slot back while another error is propagating. A release failure
   * is logged so the caller still sees the original error.
   */
  private async releaseAfterFailure(transactionId: string, accountId: number): Promise<void> {
    try {
      await this.pool.releaseBybitAdSlot(accountId);
    } catch (releaseError) {
      this.logger.error('Failed to release ad slot', {
        transactionId,
        accountId,
        error: getErrorMessage(releaseError),
      });
    }
  }
}
