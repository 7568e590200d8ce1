/**
 * In-memory AccountStore for AccountPool tests.
 *
 * Stores deep copies so the pool can never alias persisted state, counts
 * loads and saves, and can be told to fail saves to exercise rollback.
 */

import { createEmptySnapshot, type AccountPoolSnapshot, type AccountStore } from '@p2p-settle/types';
import { FAKE_CLOCK_START } from '../clock/fake-clock';

export class InMemoryAccountStore implements AccountStore {
  private snapshot: AccountPoolSnapshot;
  private saveFailure: Error | null = null;
  loadCount = 0;
  saveCount = 0;

  constructor(initial: AccountPoolSnapshot = createEmptySnapshot(FAKE_CLOCK_START)) {
    this.snapshot = structuredClone(initial);
  }

  async load(): Promise<AccountPoolSnapshot> {
    this.loadCount++;
    return structuredClone(this.snapshot);
  }

  async save(snapshot: AccountPoolSnapshot): Promise<void> {
    if (this.saveFailure) {
      throw this.saveFailure;
    }
    this.saveCount++;
    this.snapshot = structuredClone(snapshot);
  }

  /**
   * Make every following save() reject with `error` (null restores saving).
   */
  failSavesWith(error: Error | null): void {
    this.saveFailure = error;
  }

  /** What was last persisted. */
  peek(): AccountPoolSnapshot {
    return structuredClone(this.snapshot);
  }

  /** Replace persisted state behind the pool's back (e.g. before reload()). */
  replace(snapshot: AccountPoolSnapshot): void {
    this.snapshot = structuredClone(snapshot);
  }
}
