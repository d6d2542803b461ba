/**
 * Logger Type Definitions
 *
 * ILogger decouples the codebase from the logging library so that services
 * receive their logger through the constructor and tests can inject a
 * RecordingLogger.
 */

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Metadata object that can be attached to log entries.
 */
export type LogMeta = Record<string, unknown>;

/**
 * Core logger interface.
 *
 * This is the ONLY type that should be used for logger parameters in class
 * constructors.
 *
 * @example
 * ```typescript
 * class QueueConsumer {
 *   constructor(private logger: ILogger) {}
 * }
 *
 * // Production
 * new QueueConsumer(createLogger('queue-processor'));
 *
 * // Test
 * new QueueConsumer(new RecordingLogger());
 * ```
 */
export interface ILogger {
  fatal(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  trace?(msg: string, meta?: LogMeta): void;

  /**
   * Create a child logger whose bindings are merged into every entry.
   * The consumer uses this as the per-message logging scope.
   *
   * @example
   * ```typescript
   * const scoped = logger.child({ correlationId: traceId });
   * scoped.info('Processing message'); // { correlationId: '…', msg: 'Processing message' }
   * ```
   */
  child(bindings: LogMeta): ILogger;

  isLevelEnabled?(level: LogLevel): boolean;
}

export interface LoggerConfig {
  /**
   * Service/module name for log identification.
   */
  name: string;

  /**
   * Minimum log level to output.
   * @default process.env.LOG_LEVEL or 'info'
   */
  level?: LogLevel;

  /**
   * Enable pretty printing.
   * @default process.env.NODE_ENV === 'development'
   */
  pretty?: boolean;

  /**
   * Additional context to include in every log entry.
   */
  bindings?: LogMeta;
}
