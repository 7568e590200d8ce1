/**
 * File-backed account store.
 *
 * The snapshot is one pretty-printed JSON document. Saves write a temp file
 * next to the target and rename it over the target, so a crash mid-write
 * leaves the previous snapshot intact. A missing file loads as an empty pool.
 */

import * as fsp from 'fs/promises';
import * as path from 'path';
import {
  createEmptySnapshot,
  type AccountPoolSnapshot,
  type AccountStore,
} from '@p2p-settle/types';
import { systemClock, type Clock } from '../clock';
import { PersistenceError, ValidationError, getErrorCode } from '../error-handling';
import { parseAccountPoolSnapshot } from './snapshot-schema';

let tempCounter = 0;

function isFileNotFound(error: unknown): boolean {
  return getErrorCode(error) === 'ENOENT';
}

export class JsonFileAccountStore implements AccountStore {
  constructor(
    readonly filePath: string,
    private readonly clock: Clock = systemClock
  ) {}

  async load(): Promise<AccountPoolSnapshot> {
    let raw: string;
    try {
      raw = await fsp.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isFileNotFound(error)) {
        return createEmptySnapshot(this.clock.now());
      }
      throw new PersistenceError(`Failed to read ${this.filePath}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ValidationError(`Account snapshot ${this.filePath} is not valid JSON`, { cause: error });
    }
    return parseAccountPoolSnapshot(parsed, this.filePath);
  }

  async save(snapshot: AccountPoolSnapshot): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.${++tempCounter}.tmp`;
    try {
      await fsp.mkdir(path.dirname(this.filePath), { recursive: true });
      await fsp.writeFile(tempPath, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf8');
      await fsp.rename(tempPath, this.filePath);
    } catch (error) {
      await fsp.rm(tempPath, { force: true });
      throw new PersistenceError(`Failed to write ${this.filePath}`, { cause: error });
    }
  }
}
