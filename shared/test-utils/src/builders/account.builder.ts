/**
 * Account Builders
 *
 * Fluent builders for account pool fixtures.
 *
 * @example
 * const snapshot = new AccountSnapshotBuilder()
 *   .withBybit(new BybitAccountBuilder().withId(1).withActiveAds(2).build())
 *   .withGate(new GateAccountBuilder().withId(1).build())
 *   .build();
 */

import type {
  AccountPoolSnapshot,
  BybitAccount,
  BybitAccountStatus,
  GateAccount,
  GateAccountStatus,
} from '@p2p-settle/types';
import { FAKE_CLOCK_START } from '../clock/fake-clock';

export class GateAccountBuilder {
  private account: GateAccount = {
    id: 1,
    email: 'payout-1@example.com',
    password: 'test-secret',
    status: 'active',
    balance: '0',
    session: null,
    sessionExpiresAt: null,
    createdAt: FAKE_CLOCK_START,
    updatedAt: FAKE_CLOCK_START,
  };

  withId(id: number): this {
    this.account.id = id;
    this.account.email = `payout-${id}@example.com`;
    return this;
  }

  withEmail(email: string): this {
    this.account.email = email;
    return this;
  }

  withStatus(status: GateAccountStatus): this {
    this.account.status = status;
    return this;
  }

  withBalance(balance: string): this {
    this.account.balance = balance;
    return this;
  }

  build(): GateAccount {
    return { ...this.account };
  }
}

export class BybitAccountBuilder {
  private account: BybitAccount = {
    id: 1,
    name: 'merchant-1',
    credentials: { apiKey: 'test-key', apiSecret: 'test-secret' },
    status: 'available',
    activeAdCount: 0,
    createdAt: FAKE_CLOCK_START,
    updatedAt: FAKE_CLOCK_START,
  };

  withId(id: number): this {
    this.account.id = id;
    this.account.name = `merchant-${id}`;
    return this;
  }

  withName(name: string): this {
    this.account.name = name;
    return this;
  }

  withStatus(status: BybitAccountStatus): this {
    this.account.status = status;
    return this;
  }

  withActiveAds(count: number): this {
    this.account.activeAdCount = count;
    return this;
  }

  build(): BybitAccount {
    return { ...this.account, credentials: { ...this.account.credentials } };
  }
}

export class AccountSnapshotBuilder {
  private gateAccounts: GateAccount[] = [];
  private bybitAccounts: BybitAccount[] = [];
  private updatedAt = FAKE_CLOCK_START;

  withGate(...accounts: GateAccount[]): this {
    this.gateAccounts.push(...accounts);
    return this;
  }

  withBybit(...accounts: BybitAccount[]): this {
    this.bybitAccounts.push(...accounts);
    return this;
  }

  /**
   * Add `count` idle Bybit accounts with ids 1..count.
   */
  withIdleBybitAccounts(count: number): this {
    for (let id = 1; id <= count; id++) {
      this.bybitAccounts.push(new BybitAccountBuilder().withId(id).build());
    }
    return this;
  }

  build(): AccountPoolSnapshot {
    return {
      gateAccounts: [...this.gateAccounts],
      bybitAccounts: [...this.bybitAccounts],
      updatedAt: this.updatedAt,
    };
  }
}
