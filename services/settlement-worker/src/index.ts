/**
 * Settlement worker public API.
 *
 * Process bootstrapping (argument parsing, the upstream HTTP client and the
 * ad publisher) lives with the embedding application; it calls
 * createSettlementRuntime() with those collaborators.
 */

export { RateLimitedTransactionClient } from './transaction-client';
export type { RateLimitedTransactionClientOptions } from './transaction-client';
export { SettlementWorkflow } from './settlement-workflow';
export type {
  AdPublisher,
  BatchOutcome,
  OpenAdOutcome,
  SettlementWorkflowOptions,
} from './settlement-workflow';
export { createSettlementRuntime } from './runtime';
export type { SettlementRuntime, SettlementRuntimeDeps } from './runtime';
