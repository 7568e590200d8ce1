/**
 * Logger Type Definitions
 *
 * The ILogger interface decouples settlement components from the logging
 * library. Components accept an optional logger in their options; production
 * wiring passes a pino-backed logger, tests pass RecordingLogger.
 */

/**
 * Log level union type for type-safe level checking.
 */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Levels accepted from configuration. `silent` disables output entirely.
 */
export type ConfiguredLogLevel = LogLevel | 'silent';

/**
 * Metadata object that can be attached to log entries.
 */
export type LogMeta = Record<string, unknown>;

/**
 * Core logger interface.
 *
 * All logging implementations (pino wrapper, RecordingLogger, NullLogger)
 * implement this interface. Use it for logger parameters in constructors.
 */
export interface ILogger {
  fatal(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  trace?(msg: string, meta?: LogMeta): void;

  /**
   * Create a child logger whose entries all carry `bindings`.
   *
   * @example
   * ```typescript
   * const txLogger = logger.child({ transactionId: 'tx-1' });
   * txLogger.info('Ad published'); // { transactionId: 'tx-1', msg: 'Ad published' }
   * ```
   */
  child(bindings: LogMeta): ILogger;

  /**
   * Check if a given log level is enabled.
   * Useful for avoiding expensive computations for disabled levels.
   */
  isLevelEnabled?(level: LogLevel): boolean;
}

/**
 * Configuration for logger creation.
 */
export interface LoggerConfig {
  /**
   * Component name for log identification.
   */
  name: string;

  /**
   * Minimum log level to output.
   * @default process.env.LOG_LEVEL, else 'info'
   */
  level?: ConfiguredLogLevel;

  /**
   * Enable pretty printing.
   * @default NODE_ENV === 'development' && LOG_FORMAT !== 'json'
   */
  pretty?: boolean;

  /**
   * Additional context to include in every log entry.
   */
  bindings?: LogMeta;
}

const CONFIGURED_LEVELS: readonly ConfiguredLogLevel[] = [
  'fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent',
];

export function isConfiguredLogLevel(value: string | undefined): value is ConfiguredLogLevel {
  return CONFIGURED_LEVELS.some((level) => level === value);
}
