/**
 * Logging Module
 *
 * Production code uses createPinoLogger() (or createLogger() from ../logger);
 * tests use RecordingLogger or NullLogger.
 */

export type {
  ConfiguredLogLevel,
  ILogger,
  LoggerConfig,
  LogLevel,
  LogMeta,
} from './types';
export { isConfiguredLogLevel } from './types';

export {
  buildPinoOptions,
  createPinoLogger,
  resetLoggerCache,
  REDACTED_PATHS,
} from './pino-logger';

export { RecordingLogger, NullLogger } from './testing-logger';
export type { LogEntry } from './testing-logger';
