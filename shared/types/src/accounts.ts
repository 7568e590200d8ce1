/**
 * Account inventory types.
 *
 * Two account kinds share the pool: Gate accounts (payout side, carry a
 * balance and a scraped session) and Bybit accounts (advertisement side,
 * carry API credentials and an ad-slot counter).
 */

/** Default cap on concurrently active ads for one Bybit account. */
export const DEFAULT_MAX_ADS_PER_ACCOUNT = 4;

export type GateAccountStatus = 'active' | 'inactive' | 'banned';

export type BybitAccountStatus = 'available' | 'busy' | 'disabled';

export interface GateAccount {
  id: number;
  email: string;
  /** Opaque login secret. Never logged. */
  password: string;
  status: GateAccountStatus;
  /** Exact decimal amount as a canonical string (e.g. "1250000.5"). */
  balance: string;
  /** Opaque session blob (cookies etc.) owned by the scraping client. */
  session: unknown;
  /** Unix ms; null when no session has been stored. */
  sessionExpiresAt: number | null;
  createdAt: number;
  updatedAt: number;
}

export interface BybitCredentials {
  apiKey: string;
  apiSecret: string;
}

export interface BybitAccount {
  id: number;
  name: string;
  /** Opaque API credentials. Never logged. */
  credentials: BybitCredentials;
  status: BybitAccountStatus;
  /** Ads currently running on this account, in [0, maxAdsPerAccount]. */
  activeAdCount: number;
  createdAt: number;
  updatedAt: number;
}

/**
 * Persisted pool state. Both lists are kept in ascending id order.
 */
export interface AccountPoolSnapshot {
  gateAccounts: GateAccount[];
  bybitAccounts: BybitAccount[];
  updatedAt: number;
}

export interface AccountPoolStats {
  gateActive: number;
  gateTotal: number;
  bybitAvailable: number;
  bybitTotal: number;
  totalActiveAds: number;
}

/**
 * Persistence port for the account pool. Any keyed durable store works.
 */
export interface AccountStore {
  load(): Promise<AccountPoolSnapshot>;
  save(snapshot: AccountPoolSnapshot): Promise<void>;
}

export function createEmptySnapshot(now: number): AccountPoolSnapshot {
  return { gateAccounts: [], bybitAccounts: [], updatedAt: now };
}
