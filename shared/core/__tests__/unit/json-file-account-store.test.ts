/**
 * JsonFileAccountStore Unit Tests
 *
 * Runs against a throwaway directory under the OS temp dir.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fsp from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { JsonFileAccountStore, PersistenceError, ValidationError } from '@p2p-settle/core';
import { AccountSnapshotBuilder, BybitAccountBuilder, FakeClock, GateAccountBuilder } from '@p2p-settle/test-utils';

describe('JsonFileAccountStore', () => {
  let dir: string;
  let filePath: string;
  let clock: FakeClock;

  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'account-store-'));
    filePath = path.join(dir, 'nested', 'accounts.json');
    clock = new FakeClock(1234);
  });

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
  });

  it('should load a missing file as an empty pool', async () => {
    const store = new JsonFileAccountStore(filePath, clock);
    await expect(store.load()).resolves.toEqual({ gateAccounts: [], bybitAccounts: [], updatedAt: 1234 });
  });

  it('should save and load a snapshot', async () => {
    const store = new JsonFileAccountStore(filePath, clock);
    const snapshot = new AccountSnapshotBuilder()
      .withGate(new GateAccountBuilder().withId(1).withBalance('10.5').build())
      .withBybit(new BybitAccountBuilder().withId(1).withActiveAds(2).build())
      .build();

    await store.save(snapshot);

    await expect(store.load()).resolves.toEqual(snapshot);
    expect(await fsp.readdir(path.dirname(filePath))).toEqual(['accounts.json']);
  });

  it('should reject a file that is not JSON', async () => {
    await fsp.mkdir(path.dirname(filePath), { recursive: true });
    await fsp.writeFile(filePath, '{not json', 'utf8');

    await expect(new JsonFileAccountStore(filePath, clock).load()).rejects.toBeInstanceOf(ValidationError);
  });

  it('should name failing fields of an invalid snapshot', async () => {
    await fsp.mkdir(path.dirname(filePath), { recursive: true });
    await fsp.writeFile(
      filePath,
      JSON.stringify({ gateAccounts: [], bybitAccounts: [{ id: 1 }], updatedAt: 0 }),
      'utf8'
    );

    await expect(new JsonFileAccountStore(filePath, clock).load()).rejects.toThrow(
      `Invalid account snapshot from ${filePath}: bybitAccounts.0.name: Required`
    );
  });

  it('should raise PersistenceError when the path cannot be read', async () => {
    const store = new JsonFileAccountStore(dir, clock);
    await expect(store.load()).rejects.toBeInstanceOf(PersistenceError);
  });

  it('should raise PersistenceError and leave no temp file when the write fails', async () => {
    await fsp.mkdir(filePath, { recursive: true });
    const store = new JsonFileAccountStore(filePath, clock);

    await expect(store.save(new AccountSnapshotBuilder().build())).rejects.toBeInstanceOf(PersistenceError);
    expect(await fsp.readdir(path.dirname(filePath))).toEqual(['accounts.json']);
  });
});
