/**
 * Transaction Record Builder
 *
 * @example
 * const pending = new TransactionBuilder().withId('tx-1').withStatus(1).build();
 */

import type { TransactionRecord, TransactionStatusCode } from '@p2p-settle/types';
import { FAKE_CLOCK_START } from '../clock/fake-clock';

let transactionCounter = 0;

export class TransactionBuilder {
  private record: {
    -readonly [K in keyof TransactionRecord]: TransactionRecord[K];
  };

  constructor() {
    transactionCounter++;
    this.record = {
      id: `tx-${transactionCounter}`,
      status: 1,
      amount: '1500.00',
      currency: 'RUB',
      createdAt: FAKE_CLOCK_START,
      updatedAt: FAKE_CLOCK_START,
    };
  }

  withId(id: string): this {
    this.record.id = id;
    return this;
  }

  withStatus(status: TransactionStatusCode): this {
    this.record.status = status;
    return this;
  }

  withAmount(amount: string): this {
    this.record.amount = amount;
    return this;
  }

  build(): TransactionRecord {
    return { ...this.record };
  }
}

/**
 * Reset the id counter for deterministic ids across tests.
 */
export function resetTransactionBuilder(): void {
  transactionCounter = 0;
}
