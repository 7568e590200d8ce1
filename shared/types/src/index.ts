// Shared types for the settlement libraries and services

export * from './accounts';
export * from './transactions';
