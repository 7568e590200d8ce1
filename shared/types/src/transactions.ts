/**
 * Transaction types as seen from the upstream payout panel.
 * Records are owned by the upstream; this system only caches them.
 */

/** Upstream status code that marks a payout as completed. */
export const DEFAULT_COMPLETED_STATUS = 5;

export type TransactionStatusCode = number;

export interface TransactionRecord {
  readonly id: string;
  readonly status: TransactionStatusCode;
  /** Exact decimal amount as a string. */
  readonly amount: string;
  readonly currency: string;
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface ApprovedTransaction {
  readonly id: string;
  readonly status: TransactionStatusCode;
  readonly approvedAt: number;
}

/**
 * Evidence attached when approving a payout (e.g. the parsed receipt).
 * Parsing happens outside this system; only the extracted fields travel.
 */
export interface PaymentEvidence {
  readonly receiptId?: string;
  readonly amount: string;
  readonly receivedAt: number;
  readonly attachment?: string;
}

/**
 * Opaque upstream client. Session refresh and anti-bot handling live behind
 * this boundary; failures surface as the shared error taxonomy.
 *
 * `fetch` resolves to null when the transaction does not exist.
 */
export interface TransactionApi {
  fetch(id: string, signal?: AbortSignal): Promise<TransactionRecord | null>;
  approve(id: string, evidence: PaymentEvidence, signal?: AbortSignal): Promise<ApprovedTransaction>;
}

/**
 * Read side consumed by the transaction cache.
 */
export interface TransactionSource {
  fetch(id: string, signal?: AbortSignal): Promise<TransactionRecord | null>;
}
