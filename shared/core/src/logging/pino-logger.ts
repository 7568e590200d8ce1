/**
 * Pino Logger Implementation
 *
 * - Loggers cached per component name
 * - JSON output by default, pino-pretty in development
 * - Credentials and session blobs redacted from every entry
 */

import pino, { Logger as PinoLoggerType, LoggerOptions } from 'pino';
import {
  isConfiguredLogLevel,
  type ConfiguredLogLevel,
  type ILogger,
  type LoggerConfig,
  type LogLevel,
  type LogMeta,
} from './types';

// =============================================================================
// Singleton Cache
// =============================================================================

const loggerCache = new Map<string, ILogger>();

/**
 * Reset all cached loggers.
 * Used for testing and service shutdown.
 */
export function resetLoggerCache(): void {
  loggerCache.clear();
}

/**
 * Fields never written to log output. Account credentials, Gate session
 * cookies and upstream tokens may appear in metadata passed by callers.
 */
export const REDACTED_PATHS: readonly string[] = [
  'password', '*.password',
  'apiKey', '*.apiKey',
  'apiSecret', '*.apiSecret',
  'secret', '*.secret',
  'token', '*.token',
  'session', '*.session',
  'credentials', '*.credentials',
];

// =============================================================================
// Pino Logger Wrapper
// =============================================================================

/**
 * Adapts pino to the ILogger interface. pino takes metadata first.
 */
class PinoLoggerWrapper implements ILogger {
  constructor(private readonly pino: PinoLoggerType) {}

  fatal(msg: string, meta?: LogMeta): void {
    this.write('fatal', msg, meta);
  }

  error(msg: string, meta?: LogMeta): void {
    this.write('error', msg, meta);
  }

  warn(msg: string, meta?: LogMeta): void {
    this.write('warn', msg, meta);
  }

  info(msg: string, meta?: LogMeta): void {
    this.write('info', msg, meta);
  }

  debug(msg: string, meta?: LogMeta): void {
    this.write('debug', msg, meta);
  }

  trace(msg: string, meta?: LogMeta): void {
    this.write('trace', msg, meta);
  }

  child(bindings: LogMeta): ILogger {
    return new PinoLoggerWrapper(this.pino.child(bindings));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level);
  }

  private write(level: LogLevel, msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino[level](meta, msg);
    } else {
      this.pino[level](msg);
    }
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

function resolveLevel(level: ConfiguredLogLevel | undefined): ConfiguredLogLevel {
  if (level) return level;
  const fromEnv = process.env.LOG_LEVEL;
  return isConfiguredLogLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * Build the pino options for a component. Exposed so tests can check the
 * redaction and transport settings without writing to stdout.
 */
export function buildPinoOptions(config: LoggerConfig): LoggerOptions {
  const usePretty = config.pretty ??
    (process.env.LOG_FORMAT !== 'json' && process.env.NODE_ENV === 'development');

  const options: LoggerOptions = {
    name: config.name,
    level: resolveLevel(config.level),
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    base: {
      service: config.name,
      pid: process.pid,
    },
    redact: {
      paths: [...REDACTED_PATHS],
      censor: '[REDACTED]',
    },
  };

  if (usePretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname,service',
      },
    };
  }

  return options;
}

/**
 * Create a pino logger instance.
 *
 * Calling again with the same name, level and pretty setting returns the
 * same instance; bindings produce an uncached child of it.
 *
 * @example
 * ```typescript
 * const logger = createPinoLogger('account-pool');
 * const debugLogger = createPinoLogger({ name: 'rate-limiter', level: 'debug' });
 * ```
 */
export function createPinoLogger(config: string | LoggerConfig): ILogger {
  const normalizedConfig: LoggerConfig = typeof config === 'string'
    ? { name: config }
    : config;

  const cacheKey = [
    normalizedConfig.name,
    normalizedConfig.level ?? '',
    normalizedConfig.pretty === undefined ? '' : String(normalizedConfig.pretty),
  ].join('|');
  let logger = loggerCache.get(cacheKey);
  if (!logger) {
    logger = new PinoLoggerWrapper(pino(buildPinoOptions(normalizedConfig)));
    loggerCache.set(cacheKey, logger);
  }

  return normalizedConfig.bindings ? logger.child(normalizedConfig.bindings) : logger;
}
