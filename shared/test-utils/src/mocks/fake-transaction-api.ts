/**
 * Fake upstream transaction API.
 *
 * Serves records from memory, counts calls per id, replays scripted
 * failures, and can hold fetches open so tests can line up concurrent
 * callers against one in-flight request.
 */

import { createDeferred, NotFoundError, type Deferred } from '@p2p-settle/core';
import type {
  ApprovedTransaction,
  PaymentEvidence,
  TransactionApi,
  TransactionRecord,
} from '@p2p-settle/types';

export class FakeTransactionApi implements TransactionApi {
  private readonly records = new Map<string, TransactionRecord>();
  private readonly fetchFailures = new Map<string, unknown[]>();
  private readonly approveFailures = new Map<string, unknown[]>();
  private gate: Deferred<void> | null = null;
  private readonly fetchCounts = new Map<string, number>();
  /** Signal passed to each fetch(), in call order */
  readonly fetchSignals: Array<AbortSignal | undefined> = [];
  readonly approvals: Array<{ id: string; evidence: PaymentEvidence }> = [];
  approveCallCount = 0;
  /** Statuses set on records by approve() */
  completedStatus = 5;
  /** Clock time stamped on approvals */
  now: () => number = () => 0;

  constructor(records: TransactionRecord[] = []) {
    for (const record of records) {
      this.records.set(record.id, record);
    }
  }

  async fetch(id: string, signal?: AbortSignal): Promise<TransactionRecord | null> {
    this.fetchCounts.set(id, this.fetchCallCount(id) + 1);
    this.fetchSignals.push(signal);
    if (this.gate) {
      await this.gate.promise;
    }
    const failure = this.fetchFailures.get(id)?.shift();
    if (failure !== undefined) {
      throw failure;
    }
    return this.records.get(id) ?? null;
  }

  async approve(id: string, evidence: PaymentEvidence): Promise<ApprovedTransaction> {
    this.approveCallCount++;
    const failure = this.approveFailures.get(id)?.shift();
    if (failure !== undefined) {
      throw failure;
    }
    const record = this.records.get(id);
    if (!record) {
      throw new NotFoundError(`Transaction ${id} not found`);
    }
    const approvedAt = this.now();
    this.records.set(id, { ...record, status: this.completedStatus, updatedAt: approvedAt });
    this.approvals.push({ id, evidence });
    return { id, status: this.completedStatus, approvedAt };
  }

  setRecord(record: TransactionRecord): void {
    this.records.set(record.id, record);
  }

  deleteRecord(id: string): void {
    this.records.delete(id);
  }

  /** Next fetches of `id` throw these errors, one per call. */
  failFetch(id: string, ...errors: unknown[]): void {
    this.fetchFailures.set(id, [...(this.fetchFailures.get(id) ?? []), ...errors]);
  }

  /** Next approvals of `id` throw these errors, one per call. */
  failApprove(id: string, ...errors: unknown[]): void {
    this.approveFailures.set(id, [...(this.approveFailures.get(id) ?? []), ...errors]);
  }

  fetchCallCount(id: string): number {
    return this.fetchCounts.get(id) ?? 0;
  }

  totalFetchCount(): number {
    let total = 0;
    for (const count of this.fetchCounts.values()) total += count;
    return total;
  }

  /**
   * Hold every fetch until the returned function is called.
   */
  holdFetches(): () => void {
    const gate = createDeferred<void>();
    this.gate = gate;
    return () => {
      if (this.gate === gate) this.gate = null;
      gate.resolve();
    };
  }
}
