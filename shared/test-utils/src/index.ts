/**
 * @p2p-settle/test-utils
 *
 * In-process test doubles for the settlement core: manual clock, account
 * stores, Redis and upstream API fakes, and fixture builders.
 */

export * from './clock';
export * from './stores';
export * from './mocks';
export * from './builders';
