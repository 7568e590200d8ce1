/**
 * Jest Setup File
 *
 * Runs before each test file (setupFilesAfterEnv in the root package.json).
 * Components fall back to pino loggers when none is injected; keep them quiet
 * unless LOG_LEVEL is set explicitly.
 */

import { afterEach, beforeEach } from '@jest/globals';
import { resetLoggerCache } from '@p2p-settle/core';
import { resetTransactionBuilder } from '../builders/transaction.builder';

process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';

beforeEach(() => {
  resetTransactionBuilder();
});

afterEach(() => {
  resetLoggerCache();
});
