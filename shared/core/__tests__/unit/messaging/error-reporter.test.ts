/**
 * Error Reporter Tests
 */

import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import {
  CompositeErrorReporter,
  LoggingErrorReporter,
  RecordingLogger,
} from '../../../src';
import type { ErrorReporter } from '../../../src';

class ThrowingReporter implements ErrorReporter {
  reportException(): void {
    throw new Error('reporter down');
  }
}

describe('LoggingErrorReporter', () => {
  it('should log the error with its properties', () => {
    const logger = new RecordingLogger();

    new LoggingErrorReporter(logger).reportException(new Error('boom'), { queue: 'orders' });

    expect(logger.hasLogWithMeta('error', { queue: 'orders' })).toBe(true);
    expect(logger.getErrors()[0].msg).toBe('Exception reported');
  });
});

describe('CompositeErrorReporter', () => {
  let logger: RecordingLogger;
  let reportException: jest.Mock<ErrorReporter['reportException']>;

  beforeEach(() => {
    logger = new RecordingLogger();
    reportException = jest.fn<ErrorReporter['reportException']>();
  });

  it('should forward each report to every reporter', () => {
    const composite = new CompositeErrorReporter([{ reportException }, { reportException }]);
    const error = new Error('boom');

    composite.reportException(error, { queue: 'orders' });

    expect(reportException).toHaveBeenCalledTimes(2);
    expect(reportException).toHaveBeenCalledWith(error, { queue: 'orders' });
  });

  it('should keep reporting after a reporter throws', () => {
    const composite = new CompositeErrorReporter([new ThrowingReporter(), { reportException }], logger);

    expect(() => composite.reportException(new Error('boom'))).not.toThrow();

    expect(reportException).toHaveBeenCalledTimes(1);
    expect(logger.hasLogWithMeta('warn', { reporter: 'ThrowingReporter', error: 'reporter down' })).toBe(true);
  });

  it('should not require a logger to isolate reporters', () => {
    const composite = new CompositeErrorReporter([new ThrowingReporter(), { reportException }]);

    expect(() => composite.reportException(new Error('boom'))).not.toThrow();
    expect(reportException).toHaveBeenCalledTimes(1);
  });
});
