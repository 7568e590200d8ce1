/**
 * AccountPool
 *
 * In-memory inventory of Gate and Bybit accounts with write-through
 * persistence. Every mutation:
 * 1. takes the pool mutex (FIFO, so allocations are linearizable)
 * 2. applies the change to a copy of the current snapshot
 * 3. saves the copy through the AccountStore
 * 4. swaps the copy in only after the save succeeded
 *
 * A failed save leaves in-memory state untouched and surfaces as a
 * PersistenceError. Reads never wait for the mutex; they see the last
 * committed snapshot.
 *
 * Invariants (checked on load, kept by every mutation):
 * - ids unique per kind, lists in ascending id order
 * - 0 <= activeAdCount <= maxAdsPerAccount
 * - a Bybit account that is not disabled is busy iff it is at the cap
 *
 * @example
 * ```typescript
 * const pool = await AccountPool.create(new JsonFileAccountStore('data/accounts.json'));
 * const account = await pool.acquireBybitAccountForAd();
 * if (account) {
 *   try {
 *     await publishAd(account);
 *   } catch (error) {
 *     await pool.releaseBybitAdSlot(account.id);
 *     throw error;
 *   }
 * }
 * ```
 */

import {
  DEFAULT_MAX_ADS_PER_ACCOUNT,
  type AccountPoolSnapshot,
  type AccountPoolStats,
  type AccountStore,
  type BybitAccount,
  type BybitAccountStatus,
  type GateAccount,
  type GateAccountStatus,
} from '@p2p-settle/types';
import { AsyncMutex } from '../async/async-mutex';
import { systemClock, type Clock } from '../clock';
import {
  DuplicateAccountError,
  NotFoundError,
  PersistenceError,
  SettlementError,
  ValidationError,
  getErrorMessage,
} from '../error-handling';
import { createLogger } from '../logger';
import type { ILogger } from '../logging/types';
import { normalizeDecimal } from '../utils/decimal-utils';
import {
  mostFreeSlotsFirst,
  resolveAllocationPolicy,
  type AllocationPolicy,
  type AllocationPolicyName,
} from './allocation-policy';

export interface AccountPoolOptions {
  /** Cap on concurrently active ads per Bybit account (default 4) */
  maxAdsPerAccount?: number;
  /** Candidate selection (default most-free-slots) */
  allocationPolicy?: AllocationPolicy | AllocationPolicyName;
  clock?: Clock;
  logger?: ILogger;
}

/**
 * Result of a mutation body. `changed: false` skips the save.
 */
interface Mutation<R> {
  value: R;
  changed: boolean;
}

export class AccountPool {
  private snapshot: AccountPoolSnapshot;
  private readonly mutex: AsyncMutex;
  private readonly maxAdsPerAccount: number;
  private readonly allocationPolicy: AllocationPolicy;
  private readonly clock: Clock;
  private readonly logger: ILogger;

  private constructor(
    private readonly store: AccountStore,
    snapshot: AccountPoolSnapshot,
    options: Required<Pick<AccountPoolOptions, 'maxAdsPerAccount' | 'clock' | 'logger'>> & {
      allocationPolicy: AllocationPolicy;
    }
  ) {
    this.snapshot = snapshot;
    this.maxAdsPerAccount = options.maxAdsPerAccount;
    this.allocationPolicy = options.allocationPolicy;
    this.clock = options.clock;
    this.logger = options.logger;
    this.mutex = new AsyncMutex(() => this.clock.now());
  }

  /**
   * Load the pool from `store`. Startup always starts from persisted state.
   *
   * @throws ValidationError if the stored snapshot breaks an invariant
   * @throws PersistenceError if the store cannot be read
   */
  static async create(store: AccountStore, options: AccountPoolOptions = {}): Promise<AccountPool> {
    const maxAdsPerAccount = options.maxAdsPerAccount ?? DEFAULT_MAX_ADS_PER_ACCOUNT;
    if (!Number.isInteger(maxAdsPerAccount) || maxAdsPerAccount < 1) {
      throw new ValidationError(`maxAdsPerAccount must be a positive integer, got ${maxAdsPerAccount}`, {
        field: 'maxAdsPerAccount',
      });
    }

    const logger = options.logger ?? createLogger('account-pool');
    const snapshot = normalizeSnapshot(await loadFrom(store), maxAdsPerAccount);
    const pool = new AccountPool(store, snapshot, {
      maxAdsPerAccount,
      allocationPolicy: resolveAllocationPolicy(options.allocationPolicy ?? mostFreeSlotsFirst),
      clock: options.clock ?? systemClock,
      logger,
    });

    logger.info('Account pool loaded', { ...pool.getStats() });
    return pool;
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  /**
   * Gate accounts with status active, ascending id.
   */
  listActiveGateAccounts(): GateAccount[] {
    return this.snapshot.gateAccounts
      .filter((account) => account.status === 'active')
      .map(cloneAccount);
  }

  listGateAccounts(): GateAccount[] {
    return this.snapshot.gateAccounts.map(cloneAccount);
  }

  listBybitAccounts(): BybitAccount[] {
    return this.snapshot.bybitAccounts.map(cloneAccount);
  }

  getGateAccount(id: number): GateAccount | undefined {
    const account = this.snapshot.gateAccounts.find((a) => a.id === id);
    return account && cloneAccount(account);
  }

  getGateAccountByEmail(email: string): GateAccount | undefined {
    const key = normalizeEmail(email);
    const account = this.snapshot.gateAccounts.find((a) => normalizeEmail(a.email) === key);
    return account && cloneAccount(account);
  }

  getBybitAccount(id: number): BybitAccount | undefined {
    const account = this.snapshot.bybitAccounts.find((a) => a.id === id);
    return account && cloneAccount(account);
  }

  getStats(): AccountPoolStats {
    const { gateAccounts, bybitAccounts } = this.snapshot;
    return {
      gateActive: gateAccounts.filter((a) => a.status === 'active').length,
      gateTotal: gateAccounts.length,
      bybitAvailable: bybitAccounts.filter((a) => a.status === 'available').length,
      bybitTotal: bybitAccounts.length,
      totalActiveAds: bybitAccounts.reduce((sum, a) => sum + a.activeAdCount, 0),
    };
  }

  getMaxAdsPerAccount(): number {
    return this.maxAdsPerAccount;
  }

  // ===========================================================================
  // Account registration
  // ===========================================================================

  /**
   * Register a Gate account (status active, balance 0).
   *
   * @returns the new account id
   * @throws DuplicateAccountError if the email is already registered
   */
  async addGateAccount(email: string, password: string): Promise<number> {
    const trimmedEmail = email.trim();
    if (trimmedEmail === '') {
      throw new ValidationError('Gate account email is required', { field: 'email' });
    }

    const id = await this.mutate((draft, now) => {
      const key = normalizeEmail(trimmedEmail);
      if (draft.gateAccounts.some((a) => normalizeEmail(a.email) === key)) {
        throw new DuplicateAccountError(`Gate account with email ${trimmedEmail} already exists`, {
          context: { email: trimmedEmail },
        });
      }
      const account: GateAccount = {
        id: nextId(draft.gateAccounts),
        email: trimmedEmail,
        password,
        status: 'active',
        balance: '0',
        session: null,
        sessionExpiresAt: null,
        createdAt: now,
        updatedAt: now,
      };
      draft.gateAccounts.push(account);
      return { value: account.id, changed: true };
    });

    this.logger.info('Gate account added', { accountId: id, email: trimmedEmail });
    return id;
  }

  /**
   * Register a Bybit account (status available, no active ads).
   *
   * @returns the new account id
   * @throws DuplicateAccountError if the name is already registered
   */
  async addBybitAccount(name: string, apiKey: string, apiSecret: string): Promise<number> {
    const trimmedName = name.trim();
    if (trimmedName === '') {
      throw new ValidationError('Bybit account name is required', { field: 'name' });
    }

    const id = await this.mutate((draft, now) => {
      if (draft.bybitAccounts.some((a) => a.name === trimmedName)) {
        throw new DuplicateAccountError(`Bybit account ${trimmedName} already exists`, {
          context: { name: trimmedName },
        });
      }
      const account: BybitAccount = {
        id: nextId(draft.bybitAccounts),
        name: trimmedName,
        credentials: { apiKey, apiSecret },
        status: 'available',
        activeAdCount: 0,
        createdAt: now,
        updatedAt: now,
      };
      draft.bybitAccounts.push(account);
      return { value: account.id, changed: true };
    });

    this.logger.info('Bybit account added', { accountId: id, name: trimmedName });
    return id;
  }

  // ===========================================================================
  // Ad slots
  // ===========================================================================

  /**
   * Reserve one ad slot on an eligible Bybit account.
   *
   * @returns the updated account, or undefined when every account is busy
   *   or disabled
   * @throws OperationCancelledError if `signal` aborts while queued
   */
  async acquireBybitAccountForAd(signal?: AbortSignal): Promise<BybitAccount | undefined> {
    const account = await this.mutate<BybitAccount | undefined>((draft, now) => {
      const candidates = draft.bybitAccounts.filter(
        (a) => a.status === 'available' && a.activeAdCount < this.maxAdsPerAccount
      );
      const chosen = this.allocationPolicy(candidates);
      if (!chosen) {
        return { value: undefined, changed: false };
      }
      // The policy may return a copy; mutate the draft's own entry.
      const target = draft.bybitAccounts.find((a) => a.id === chosen.id);
      if (!target) {
        return { value: undefined, changed: false };
      }
      target.activeAdCount += 1;
      target.status = this.statusForCount(target);
      target.updatedAt = now;
      return { value: cloneAccount(target), changed: true };
    }, signal);

    if (account) {
      this.logger.debug('Ad slot acquired', {
        accountId: account.id,
        activeAdCount: account.activeAdCount,
        status: account.status,
      });
    } else {
      this.logger.warn('No Bybit account has a free ad slot', { ...this.getStats() });
    }
    return account;
  }

  /**
   * Return one ad slot. The count never drops below zero; a busy account
   * becomes available again.
   *
   * @throws NotFoundError if no Bybit account has this id
   */
  async releaseBybitAdSlot(id: number): Promise<void> {
    const released = await this.mutate((draft, now) => {
      const account = requireAccount(draft.bybitAccounts, id, 'Bybit');
      if (account.activeAdCount === 0) {
        return { value: false, changed: false };
      }
      account.activeAdCount -= 1;
      account.status = this.statusForCount(account);
      account.updatedAt = now;
      return { value: true, changed: true };
    });

    if (released) {
      this.logger.debug('Ad slot released', { accountId: id });
    } else {
      this.logger.warn('Ad slot release on account with no active ads', { accountId: id });
    }
  }

  /**
   * Enable or disable a Bybit account. Disabled accounts are never allocated;
   * enabling recomputes busy/available from the ad count.
   *
   * @throws NotFoundError if no Bybit account has this id
   */
  async setBybitAccountStatus(id: number, status: 'available' | 'disabled'): Promise<void> {
    await this.mutate((draft, now) => {
      const account = requireAccount(draft.bybitAccounts, id, 'Bybit');
      const next: BybitAccountStatus = status === 'disabled' ? 'disabled' : this.statusForCount({
        ...account,
        status: 'available',
      });
      if (account.status === next) {
        return { value: undefined, changed: false };
      }
      account.status = next;
      account.updatedAt = now;
      return { value: undefined, changed: true };
    });

    this.logger.info('Bybit account status changed', { accountId: id, status });
  }

  // ===========================================================================
  // Gate account state
  // ===========================================================================

  /**
   * Overwrite the balance of a Gate account.
   *
   * @throws ValidationError if `newBalance` is not a decimal
   * @throws NotFoundError if no Gate account has this id
   */
  async updateGateBalance(id: number, newBalance: string): Promise<void> {
    const balance = normalizeDecimal(newBalance, 'balance');

    await this.mutate((draft, now) => {
      const account = requireAccount(draft.gateAccounts, id, 'Gate');
      account.balance = balance;
      account.updatedAt = now;
      return { value: undefined, changed: true };
    });

    this.logger.debug('Gate balance updated', { accountId: id, balance });
  }

  /**
   * Store a fresh session for a Gate account and mark it active.
   *
   * @throws NotFoundError if no Gate account has this id
   */
  async updateGateSession(id: number, session: unknown, expiresAt: number | null): Promise<void> {
    await this.mutate((draft, now) => {
      const account = requireAccount(draft.gateAccounts, id, 'Gate');
      account.session = session;
      account.sessionExpiresAt = expiresAt;
      account.status = 'active';
      account.updatedAt = now;
      return { value: undefined, changed: true };
    });

    this.logger.info('Gate session updated', { accountId: id, sessionExpiresAt: expiresAt });
  }

  /**
   * @throws NotFoundError if no Gate account has this id
   */
  async setGateAccountStatus(id: number, status: GateAccountStatus): Promise<void> {
    await this.mutate((draft, now) => {
      const account = requireAccount(draft.gateAccounts, id, 'Gate');
      if (account.status === status) {
        return { value: undefined, changed: false };
      }
      account.status = status;
      account.updatedAt = now;
      return { value: undefined, changed: true };
    });

    this.logger.info('Gate account status changed', { accountId: id, status });
  }

  // ===========================================================================
  // Persistence
  // ===========================================================================

  /**
   * Replace in-memory state with the store's current snapshot.
   * Queued mutations run after the reload completes.
   */
  async reload(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.snapshot = normalizeSnapshot(await loadFrom(this.store), this.maxAdsPerAccount);
    });
    this.logger.info('Account pool reloaded', { ...this.getStats() });
  }

  private async mutate<R>(
    body: (draft: AccountPoolSnapshot, now: number) => Mutation<R>,
    signal?: AbortSignal
  ): Promise<R> {
    return this.mutex.runExclusive(async () => {
      const draft = structuredClone(this.snapshot);
      const now = this.clock.now();
      const { value, changed } = body(draft, now);
      if (!changed) {
        return value;
      }

      draft.updatedAt = now;
      try {
        await this.store.save(draft);
      } catch (error) {
        this.logger.error('Failed to save account snapshot', { error: getErrorMessage(error) });
        throw error instanceof PersistenceError
          ? error
          : new PersistenceError('Failed to save account snapshot', { cause: error });
      }
      this.snapshot = draft;
      return value;
    }, signal);
  }

  private statusForCount(account: BybitAccount): BybitAccountStatus {
    if (account.status === 'disabled') {
      return 'disabled';
    }
    return account.activeAdCount >= this.maxAdsPerAccount ? 'busy' : 'available';
  }
}

// =============================================================================
// Helpers
// =============================================================================

async function loadFrom(store: AccountStore): Promise<AccountPoolSnapshot> {
  try {
    return await store.load();
  } catch (error) {
    if (error instanceof SettlementError) {
      throw error;
    }
    throw new PersistenceError('Failed to load account snapshot', { cause: error });
  }
}

/**
 * Check the cap invariant, sort by id and derive busy/available from counts.
 */
function normalizeSnapshot(snapshot: AccountPoolSnapshot, maxAdsPerAccount: number): AccountPoolSnapshot {
  const seenGate = new Set<number>();
  for (const account of snapshot.gateAccounts) {
    if (seenGate.has(account.id)) {
      throw new ValidationError(`Duplicate Gate account id ${account.id}`, { field: 'gateAccounts' });
    }
    seenGate.add(account.id);
  }

  const seenBybit = new Set<number>();
  const bybitAccounts = snapshot.bybitAccounts.map((account) => {
    if (seenBybit.has(account.id)) {
      throw new ValidationError(`Duplicate Bybit account id ${account.id}`, { field: 'bybitAccounts' });
    }
    seenBybit.add(account.id);
    if (account.activeAdCount > maxAdsPerAccount) {
      throw new ValidationError(
        `Bybit account ${account.id} has ${account.activeAdCount} active ads, above the cap of ${maxAdsPerAccount}`,
        { field: 'activeAdCount' }
      );
    }
    const status: BybitAccountStatus = account.status === 'disabled'
      ? 'disabled'
      : account.activeAdCount >= maxAdsPerAccount ? 'busy' : 'available';
    return { ...account, status };
  });

  return {
    gateAccounts: [...snapshot.gateAccounts].sort(byId),
    bybitAccounts: bybitAccounts.sort(byId),
    updatedAt: snapshot.updatedAt,
  };
}

function byId(a: { id: number }, b: { id: number }): number {
  return a.id - b.id;
}

function nextId(accounts: ReadonlyArray<{ id: number }>): number {
  return accounts.reduce((max, account) => Math.max(max, account.id), 0) + 1;
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function requireAccount<T extends { id: number }>(accounts: T[], id: number, kind: string): T {
  const account = accounts.find((a) => a.id === id);
  if (!account) {
    throw new NotFoundError(`${kind} account ${id} not found`, { context: { accountId: id } });
  }
  return account;
}

function cloneAccount<T>(account: T): T {
  return structuredClone(account);
}
