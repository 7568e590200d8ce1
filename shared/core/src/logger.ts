/**
 * Logger entry point for settlement components.
 *
 * Thin facade over the pino implementation in ./logging so call sites read
 * `createLogger('account-pool')` regardless of the backing library.
 */

import { createPinoLogger } from './logging/pino-logger';
import type { ILogger, LogMeta } from './logging/types';

export type Logger = ILogger;

/**
 * Create (or fetch the cached) logger for a component.
 */
export function createLogger(name: string, bindings?: LogMeta): Logger {
  return createPinoLogger(bindings ? { name, bindings } : name);
}
