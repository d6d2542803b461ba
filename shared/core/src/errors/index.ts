export {
  ErrorCode,
  ErrorSeverity,
  MsgtraceError,
  FormatError,
  ConnectionError,
  ProcessingError,
  DisposalError,
  ConfigurationError,
  OperationCancelledError,
  TimeoutError,
  getErrorMessage,
  toError,
  formatErrorForLog,
} from './error-handling';
export type { MsgtraceErrorOptions } from './error-handling';
