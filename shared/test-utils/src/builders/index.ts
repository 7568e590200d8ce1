export { GateAccountBuilder, BybitAccountBuilder, AccountSnapshotBuilder } from './account.builder';
export { TransactionBuilder, resetTransactionBuilder } from './transaction.builder';
