/**
 * Pino Logger Implementation
 *
 * - Per-name caching so repeated lookups share one pino instance
 * - JSON output for production, pino-pretty for development
 * - Redaction of connection strings and credentials
 */

import pino, { Logger as PinoLoggerType, LoggerOptions } from 'pino';
import type { ILogger, LoggerConfig, LogLevel, LogMeta } from './types';

// =============================================================================
// Cache
// =============================================================================

const loggerCache = new Map<string, ILogger>();

/**
 * Reset all cached loggers. Used for testing and service shutdown.
 */
export function resetLoggerCache(): void {
  loggerCache.clear();
}

const LOG_LEVELS: ReadonlySet<string> = new Set(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVELS.has(value);
}

// =============================================================================
// Pino Logger Wrapper
// =============================================================================

class PinoLoggerWrapper implements ILogger {
  constructor(private readonly pino: PinoLoggerType) {}

  fatal(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.fatal(meta, msg);
    } else {
      this.pino.fatal(msg);
    }
  }

  error(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.error(meta, msg);
    } else {
      this.pino.error(msg);
    }
  }

  warn(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.warn(meta, msg);
    } else {
      this.pino.warn(msg);
    }
  }

  info(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.info(meta, msg);
    } else {
      this.pino.info(msg);
    }
  }

  debug(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.debug(meta, msg);
    } else {
      this.pino.debug(msg);
    }
  }

  trace(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.trace(meta, msg);
    } else {
      this.pino.trace(msg);
    }
  }

  child(bindings: LogMeta): ILogger {
    return new PinoLoggerWrapper(this.pino.child(bindings));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level);
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create (or return the cached) logger for a service.
 *
 * @example
 * ```typescript
 * const logger = createLogger('queue-processor');
 * const verbose = createLogger({ name: 'web-api', level: 'debug', pretty: true });
 * ```
 */
export function createLogger(config: string | LoggerConfig): ILogger {
  const normalizedConfig: LoggerConfig = typeof config === 'string'
    ? { name: config }
    : config;

  const { name, level, pretty, bindings } = normalizedConfig;

  const cached = loggerCache.get(name);
  if (cached) {
    return bindings ? cached.child(bindings) : cached;
  }

  const envLevel = process.env.LOG_LEVEL;
  const logLevel: LogLevel = level ?? (isLogLevel(envLevel) ? envLevel : 'info');

  // LOG_FORMAT=json forces JSON output even in development
  const usePretty = pretty ?? (process.env.LOG_FORMAT !== 'json' && process.env.NODE_ENV === 'development');

  const options: LoggerOptions = {
    name,
    level: logLevel,
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
      service: name,
      pid: process.pid,
    },
    redact: {
      paths: [
        'url', '*.url',
        'brokerUrl', '*.brokerUrl',
        'endpoint', '*.endpoint',
        'password', '*.password',
        'authorization', '*.authorization',
        'token', '*.token',
      ],
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

  const logger = new PinoLoggerWrapper(pino(options));
  loggerCache.set(name, logger);

  return bindings ? logger.child(bindings) : logger;
}

/**
 * Get a logger by name. Alias for createLogger with caching.
 */
export function getLogger(name: string): ILogger {
  return createLogger(name);
}
