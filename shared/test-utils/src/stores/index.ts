export { InMemoryAccountStore } from './in-memory-account-store';
