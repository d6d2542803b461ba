/**
 * Shared Error Handling
 *
 * Error taxonomy for trace propagation over the message broker.
 * Every error raised by the core derives from {@link MsgtraceError} so that
 * log entries carry a stable code and severity.
 *
 * Recovery policy by class:
 * - FormatError: message-level, fail-fast, never retried
 * - ConnectionError: recovered by the consumer's fixed-interval retry
 * - ProcessingError: recorded on the span and reported, never propagated
 * - DisposalError: logged and suppressed
 */

// =============================================================================
// Error Codes
// =============================================================================

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  INVALID_ARGUMENT = 1001,
  INVALID_STATE = 1005,
  OPERATION_CANCELLED = 1006,

  // Connection errors (2000-2999)
  CONNECTION_FAILED = 2000,
  CONNECTION_TIMEOUT = 2001,
  CONNECTION_CLOSED = 2002,

  // Broker errors (3000-3999)
  BROKER_OPERATION_ERROR = 3001,
  BROKER_STREAM_ERROR = 3003,

  // Trace propagation errors (4000-4999)
  INVALID_TRACE_CONTEXT = 4000,
  MISSING_TRACE_CONTEXT = 4001,

  // Processing errors (5000-5999)
  PROCESSING_FAILED = 5000,
  EXPORT_FAILED = 5001,

  // Configuration errors (6000-6999)
  INVALID_CONFIG = 6002,

  // Lifecycle errors (7000-7999)
  DISPOSAL_FAILED = 7005
}

export enum ErrorSeverity {
  /** Informational - expected errors that don't require action */
  INFO = 'info',
  /** Warning - unexpected but recoverable errors */
  WARNING = 'warning',
  /** Error - failures that may impact functionality */
  ERROR = 'error',
  /** Critical - severe failures requiring immediate attention */
  CRITICAL = 'critical'
}

// =============================================================================
// Custom Error Classes
// =============================================================================

export interface MsgtraceErrorOptions {
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Base error class. Carries structured information for logging.
 */
export class MsgtraceError extends Error {
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;
  readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    options: MsgtraceErrorOptions = {}
  ) {
    super(message);
    this.name = 'MsgtraceError';
    this.code = code;
    this.severity = options.severity ?? ErrorSeverity.ERROR;
    this.timestamp = Date.now();
    this.context = options.context;
    this.cause = options.cause;

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      timestamp: this.timestamp,
      context: this.context,
      cause: this.cause?.message,
      stack: this.stack
    };
  }
}

/**
 * Malformed or unsupported trace-context header.
 */
export class FormatError extends MsgtraceError {
  readonly input?: string;

  constructor(
    message: string,
    options: { code?: ErrorCode; input?: string; context?: Record<string, unknown> } = {}
  ) {
    super(message, options.code ?? ErrorCode.INVALID_TRACE_CONTEXT, {
      severity: ErrorSeverity.WARNING,
      context: { ...options.context, input: options.input }
    });
    this.name = 'FormatError';
    this.input = options.input;
  }
}

/**
 * Broker unreachable or connection dropped.
 */
export class ConnectionError extends MsgtraceError {
  readonly endpoint?: string;
  readonly retryable: boolean;

  constructor(
    message: string,
    options: {
      code?: ErrorCode;
      endpoint?: string;
      retryable?: boolean;
      cause?: Error;
      context?: Record<string, unknown>;
    } = {}
  ) {
    super(message, options.code ?? ErrorCode.CONNECTION_FAILED, {
      severity: ErrorSeverity.WARNING,
      cause: options.cause,
      context: { ...options.context, endpoint: options.endpoint }
    });
    this.name = 'ConnectionError';
    this.endpoint = options.endpoint;
    this.retryable = options.retryable ?? true;
  }
}

/**
 * Anything thrown by downstream message processing.
 */
export class ProcessingError extends MsgtraceError {
  readonly queue?: string;
  readonly traceId?: string;

  constructor(
    message: string,
    options: {
      queue?: string;
      traceId?: string;
      cause?: Error;
      context?: Record<string, unknown>;
    } = {}
  ) {
    super(message, ErrorCode.PROCESSING_FAILED, {
      severity: ErrorSeverity.ERROR,
      cause: options.cause,
      context: { ...options.context, queue: options.queue, traceId: options.traceId }
    });
    this.name = 'ProcessingError';
    this.queue = options.queue;
    this.traceId = options.traceId;
  }
}

/**
 * Failure while releasing a resource. Always suppressed by the caller.
 */
export class DisposalError extends MsgtraceError {
  readonly resource: string;

  constructor(message: string, resource: string, options: { cause?: Error } = {}) {
    super(message, ErrorCode.DISPOSAL_FAILED, {
      severity: ErrorSeverity.INFO,
      cause: options.cause,
      context: { resource }
    });
    this.name = 'DisposalError';
    this.resource = resource;
  }
}

export class ConfigurationError extends MsgtraceError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, ErrorCode.INVALID_CONFIG, {
      severity: ErrorSeverity.CRITICAL,
      context: { issues }
    });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Raised when an AbortSignal fires during a cancellable wait.
 */
export class OperationCancelledError extends MsgtraceError {
  constructor(message = 'Operation cancelled') {
    super(message, ErrorCode.OPERATION_CANCELLED, { severity: ErrorSeverity.INFO });
    this.name = 'OperationCancelledError';
  }
}

/**
 * Raised when a shutdown cleanup exceeds its deadline.
 */
export class TimeoutError extends MsgtraceError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`Timeout: ${operation} exceeded ${timeoutMs}ms`, ErrorCode.CONNECTION_TIMEOUT, {
      severity: ErrorSeverity.WARNING,
      context: { operation, timeoutMs }
    });
    this.name = 'TimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

// =============================================================================
// Error Utilities
// =============================================================================

/**
 * Extract a message from any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Normalize any thrown value to an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}

/**
 * Format error for structured logging.
 */
export function formatErrorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof MsgtraceError) {
    return error.toJSON();
  }
  const normalized = toError(error);
  return {
    name: normalized.name,
    message: normalized.message,
    stack: normalized.stack
  };
}
