/**
 * SettlementWorkflow Unit Tests
 *
 * Real core components on a FakeClock, with in-memory stand-ins for the
 * upstream API, the account store and the ad publisher.
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import {
  AccountPool,
  AuthError,
  NetworkError,
  OperationCancelledError,
  PersistenceError,
  RateLimiter,
  RecordingLogger,
  RetryPolicy,
  TransactionCache,
  ValidationError,
  type TokenBucketConfig,
  type RetryConfig,
} from '@p2p-settle/core';
import {
  AccountSnapshotBuilder,
  FakeClock,
  FakeTransactionApi,
  InMemoryAccountStore,
  TransactionBuilder,
  flushPromises,
} from '@p2p-settle/test-utils';
import { RateLimitedTransactionClient } from '../../src/transaction-client';
import { SettlementWorkflow, type AdPublisher } from '../../src/settlement-workflow';

const EVIDENCE = { amount: '1500.00', receivedAt: 0, receiptId: 'rcpt-1' };

const SINGLE_ATTEMPT: RetryConfig = { maxAttempts: 1, initialDelayMs: 0, maxDelayMs: 0, exponentialBase: 1 };
const FAST_GATE: TokenBucketConfig = { requestsPerMinute: 6000, burstSize: 100 };

describe('SettlementWorkflow', () => {
  let clock: FakeClock;
  let logger: RecordingLogger;
  let api: FakeTransactionApi;
  let store: InMemoryAccountStore;
  let publish: jest.Mock<AdPublisher['publish']>;

  beforeEach(() => {
    clock = new FakeClock();
    logger = new RecordingLogger();
    api = new FakeTransactionApi([
      new TransactionBuilder().withId('tx-1').build(),
      new TransactionBuilder().withId('tx-2').build(),
      new TransactionBuilder().withId('tx-3').build(),
      new TransactionBuilder().withId('tx-done').withStatus(5).build(),
    ]);
    store = new InMemoryAccountStore(new AccountSnapshotBuilder().withIdleBybitAccounts(1).build());
    publish = jest.fn<AdPublisher['publish']>().mockResolvedValue(undefined);
  });

  async function createWorkflow(
    maxAdsPerAccount: number,
    retryConfig: RetryConfig = SINGLE_ATTEMPT,
    gateLimit: TokenBucketConfig = FAST_GATE
  ): Promise<{ workflow: SettlementWorkflow; pool: AccountPool }> {
    const limiter = new RateLimiter({ limits: { gate: gateLimit }, clock, logger });
    const retryPolicy = new RetryPolicy({ clock, logger });
    const client = new RateLimitedTransactionClient(api, limiter, retryPolicy, retryConfig, { logger });
    const cache = new TransactionCache(client, { ttlMs: 60_000 }, { clock, logger });
    const pool = await AccountPool.create(store, { maxAdsPerAccount, clock, logger });
    const workflow = new SettlementWorkflow(cache, pool, client, { publish }, { concurrency: 3, logger });
    return { workflow, pool };
  }

  // ===========================================================================
  // openAd
  // ===========================================================================

  describe('openAd', () => {
    it('should publish on a reserved slot', async () => {
      const { workflow, pool } = await createWorkflow(2);

      await expect(workflow.openAd('tx-1')).resolves.toEqual({
        status: 'published',
        transactionId: 'tx-1',
        accountId: 1,
      });

      expect(publish).toHaveBeenCalledTimes(1);
      const [account, transaction] = publish.mock.calls[0];
      expect(account).toMatchObject({ id: 1, activeAdCount: 1 });
      expect(transaction).toMatchObject({ id: 'tx-1', status: 1 });
      expect(pool.getBybitAccount(1)?.activeAdCount).toBe(1);
    });

    it('should report an unknown transaction without reserving a slot', async () => {
      const { workflow, pool } = await createWorkflow(2);

      await expect(workflow.openAd('tx-missing')).resolves.toEqual({
        status: 'not-found',
        transactionId: 'tx-missing',
      });
      expect(pool.getStats().totalActiveAds).toBe(0);
    });

    it('should skip completed transactions', async () => {
      const { workflow } = await createWorkflow(2);

      await expect(workflow.openAd('tx-done')).resolves.toEqual({
        status: 'already-completed',
        transactionId: 'tx-done',
      });
      expect(publish).not.toHaveBeenCalled();
    });

    it('should defer when no slot is free', async () => {
      const { workflow } = await createWorkflow(1);
      await workflow.openAd('tx-1');

      await expect(workflow.openAd('tx-2')).resolves.toEqual({ status: 'deferred', transactionId: 'tx-2' });
      expect(publish).toHaveBeenCalledTimes(1);
    });

    it('should release the slot and rethrow when publishing fails', async () => {
      const { workflow, pool } = await createWorkflow(1);
      const failure = new ValidationError('ad price out of range');
      publish.mockRejectedValueOnce(failure);

      await expect(workflow.openAd('tx-1')).rejects.toBe(failure);

      expect(pool.getBybitAccount(1)).toMatchObject({ activeAdCount: 0, status: 'available' });
      expect(logger.hasLogWithMeta('error', { transactionId: 'tx-1', accountId: 1 })).toBe(true);
    });

    it('should rethrow the publish error when the slot cannot be released', async () => {
      const { workflow, pool } = await createWorkflow(1);
      const failure = new ValidationError('ad price out of range');
      publish.mockImplementationOnce(async () => {
        store.failSavesWith(new PersistenceError('disk full'));
        throw failure;
      });

      await expect(workflow.openAd('tx-1')).rejects.toBe(failure);

      expect(pool.getBybitAccount(1)?.activeAdCount).toBe(1);
      expect(logger.getErrors().map((entry) => entry.msg)).toContain('Failed to release ad slot');
    });

    it('should stop retrying the lookup when cancelled during backoff', async () => {
      const { workflow, pool } = await createWorkflow(1, {
        maxAttempts: 3,
        initialDelayMs: 10_000,
        maxDelayMs: 60_000,
        exponentialBase: 2,
      });
      api.failFetch('tx-1', new NetworkError('connection reset'), new NetworkError('connection reset'));
      const controller = new AbortController();

      const outcome = expect(workflow.openAd('tx-1', controller.signal)).rejects.toBeInstanceOf(
        OperationCancelledError
      );
      await flushPromises();
      expect(clock.pendingTimerCount()).toBe(1);

      controller.abort();
      await outcome;
      await flushPromises();

      expect(clock.pendingTimerCount()).toBe(0);
      await clock.runAll();
      expect(api.fetchCallCount('tx-1')).toBe(1);
      expect(publish).not.toHaveBeenCalled();
      expect(pool.getStats().totalActiveAds).toBe(0);
    });

    it('should stop waiting for a rate-limit token when cancelled', async () => {
      const { workflow } = await createWorkflow(2, SINGLE_ATTEMPT, { requestsPerMinute: 6, burstSize: 1 });
      await workflow.openAd('tx-1');
      const controller = new AbortController();

      const outcome = expect(workflow.openAd('tx-2', controller.signal)).rejects.toBeInstanceOf(
        OperationCancelledError
      );
      await flushPromises();
      expect(clock.pendingTimerCount()).toBe(1);

      controller.abort();
      await outcome;
      await clock.runAll();

      expect(api.fetchCallCount('tx-2')).toBe(0);
      expect(publish).toHaveBeenCalledTimes(1);
    });
  });

  // ===========================================================================
  // confirmPayment
  // ===========================================================================

  describe('confirmPayment', () => {
    it('should approve, free the slot and drop the cached record', async () => {
      const { workflow, pool } = await createWorkflow(1);
      await workflow.openAd('tx-1');

      await expect(workflow.confirmPayment('tx-1', 1, EVIDENCE)).resolves.toMatchObject({
        id: 'tx-1',
        status: 5,
      });

      expect(api.approvals).toEqual([{ id: 'tx-1', evidence: EVIDENCE }]);
      expect(pool.getBybitAccount(1)?.activeAdCount).toBe(0);
      await expect(workflow.openAd('tx-1')).resolves.toEqual({
        status: 'already-completed',
        transactionId: 'tx-1',
      });
      expect(api.fetchCallCount('tx-1')).toBe(2);
    });

    it('should free the slot when approval fails fatally', async () => {
      const { workflow, pool } = await createWorkflow(1);
      await workflow.openAd('tx-1');
      api.failApprove('tx-1', new AuthError('session rejected'));

      await expect(workflow.confirmPayment('tx-1', 1, EVIDENCE)).rejects.toBeInstanceOf(AuthError);
      expect(pool.getBybitAccount(1)?.activeAdCount).toBe(0);
    });

    it('should keep the slot when the caller cancels', async () => {
      const { workflow, pool } = await createWorkflow(1);
      await workflow.openAd('tx-1');
      const controller = new AbortController();
      controller.abort();

      await expect(workflow.confirmPayment('tx-1', 1, EVIDENCE, controller.signal)).rejects.toBeInstanceOf(
        OperationCancelledError
      );
      expect(pool.getBybitAccount(1)?.activeAdCount).toBe(1);
      expect(api.approveCallCount).toBe(0);
    });
  });

  // ===========================================================================
  // processBatch
  // ===========================================================================

  describe('processBatch', () => {
    it('should publish up to capacity and defer the rest', async () => {
      const { workflow, pool } = await createWorkflow(2);

      const outcomes = await workflow.processBatch(['tx-1', 'tx-2', 'tx-3']);

      expect(outcomes.map((o) => o.transactionId)).toEqual(['tx-1', 'tx-2', 'tx-3']);
      expect(outcomes.filter((o) => o.status === 'published')).toHaveLength(2);
      expect(outcomes.filter((o) => o.status === 'deferred')).toHaveLength(1);
      expect(pool.getBybitAccount(1)).toMatchObject({ activeAdCount: 2, status: 'busy' });
    });

    it('should report a failure for one id and continue with the others', async () => {
      const { workflow } = await createWorkflow(4);
      publish.mockImplementation(async (_account, transaction) => {
        if (transaction.id === 'tx-2') throw new ValidationError('rejected by exchange');
      });

      const outcomes = await workflow.processBatch(['tx-1', 'tx-2', 'tx-missing']);

      expect(outcomes).toEqual([
        { status: 'published', transactionId: 'tx-1', accountId: 1 },
        { status: 'failed', transactionId: 'tx-2', error: 'rejected by exchange' },
        { status: 'not-found', transactionId: 'tx-missing' },
      ]);
    });

    it('should stop when the batch is cancelled', async () => {
      const { workflow } = await createWorkflow(4);
      const controller = new AbortController();
      controller.abort();

      await expect(workflow.processBatch(['tx-1'], controller.signal)).rejects.toBeInstanceOf(
        OperationCancelledError
      );
      expect(publish).not.toHaveBeenCalled();
    });
  });
});
