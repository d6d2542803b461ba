/**
 * Error reporting collaborator for failures that are handled locally
 * (never propagated) but must still be visible.
 */

import type { ILogger } from '../logging/types';
import { formatErrorForLog, getErrorMessage } from '../errors/error-handling';

export interface ErrorReporter {
  reportException(error: Error, properties?: Readonly<Record<string, string>>): void;
}

export class LoggingErrorReporter implements ErrorReporter {
  constructor(private readonly logger: ILogger) {}

  reportException(error: Error, properties: Readonly<Record<string, string>> = {}): void {
    this.logger.error('Exception reported', { ...properties, error: formatErrorForLog(error) });
  }
}

/**
 * Forwards every report to each reporter in order. A reporter that throws
 * is logged and skipped; the rest still receive the report.
 */
export class CompositeErrorReporter implements ErrorReporter {
  constructor(
    private readonly reporters: ReadonlyArray<ErrorReporter>,
    private readonly logger?: ILogger
  ) {}

  reportException(error: Error, properties?: Readonly<Record<string, string>>): void {
    for (const reporter of this.reporters) {
      try {
        reporter.reportException(error, properties);
      } catch (reporterError) {
        this.logger?.warn('Error reporter failed', {
          reporter: reporter.constructor.name,
          error: getErrorMessage(reporterError),
        });
      }
    }
  }
}
