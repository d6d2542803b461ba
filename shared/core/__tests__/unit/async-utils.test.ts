/**
 * Async Utilities Tests
 */

import { jest, describe, it, expect, afterEach } from '@jest/globals';
import {
  OperationCancelledError,
  RecordingLogger,
  clearTimeoutSafe,
  createDeferred,
  delay,
  gracefulShutdown,
  whenAborted,
} from '../../src';

describe('Async Utilities', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  // ===========================================================================
  // delay / whenAborted
  // ===========================================================================

  describe('delay', () => {
    it('should resolve after the interval', async () => {
      jest.useFakeTimers();
      let resolved = false;
      const pending = delay(3000).then(() => {
        resolved = true;
      });

      await jest.advanceTimersByTimeAsync(2999);
      expect(resolved).toBe(false);

      await jest.advanceTimersByTimeAsync(1);
      await pending;
      expect(resolved).toBe(true);
    });

    it('should reject immediately for an aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(delay(3000, controller.signal)).rejects.toThrow(OperationCancelledError);
    });

    it('should reject and clear its timer when the signal aborts', async () => {
      jest.useFakeTimers();
      const controller = new AbortController();
      const pending = delay(3000, controller.signal);

      controller.abort();

      await expect(pending).rejects.toThrow('Operation cancelled');
      expect(jest.getTimerCount()).toBe(0);
    });
  });

  describe('whenAborted', () => {
    it('should resolve when the signal aborts', async () => {
      const controller = new AbortController();
      const pending = whenAborted(controller.signal);

      controller.abort();

      await expect(pending).resolves.toBeUndefined();
    });

    it('should resolve at once for an aborted signal', async () => {
      await expect(whenAborted(AbortSignal.abort())).resolves.toBeUndefined();
    });
  });

  // ===========================================================================
  // createDeferred
  // ===========================================================================

  describe('createDeferred', () => {
    it('should settle from outside', async () => {
      const deferred = createDeferred<number>();
      deferred.resolve(7);
      await expect(deferred.promise).resolves.toBe(7);
    });
  });

  // ===========================================================================
  // gracefulShutdown
  // ===========================================================================

  describe('gracefulShutdown', () => {
    it('should run every cleanup in order even when one fails', async () => {
      const logger = new RecordingLogger();
      const order: string[] = [];

      await gracefulShutdown([
        { name: 'server', cleanup: async () => { order.push('server'); } },
        { name: 'producer', cleanup: async () => { throw new Error('channel gone'); } },
        { name: 'telemetry', cleanup: async () => { order.push('telemetry'); } },
      ], 100, logger);

      expect(order).toEqual(['server', 'telemetry']);
      expect(logger.hasLogWithMeta('warn', { error: 'channel gone' })).toBe(true);
      expect(logger.hasLogMatching('warn', 'producer cleanup failed')).toBe(true);
    });

    it('should log cleanups that exceed the timeout', async () => {
      const logger = new RecordingLogger();

      await gracefulShutdown([
        { name: 'slow', cleanup: () => new Promise<void>(resolve => setTimeout(resolve, 200)) },
      ], 10, logger);

      expect(logger.hasLogMatching('warn', 'slow cleanup timed out')).toBe(true);
    });

    it('should time out a hung cleanup and clear its timer', async () => {
      jest.useFakeTimers();
      const logger = new RecordingLogger();
      const order: string[] = [];

      const shutdown = gracefulShutdown([
        { name: 'consumer', cleanup: () => new Promise<void>(() => undefined) },
        { name: 'telemetry', cleanup: async () => { order.push('telemetry'); } },
      ], 500, logger);
      await jest.advanceTimersByTimeAsync(500);
      await shutdown;

      expect(order).toEqual(['telemetry']);
      expect(logger.hasLogWithMeta('warn', { timeoutMs: 500 })).toBe(true);
      expect(jest.getTimerCount()).toBe(0);
    });
  });

  describe('timer helpers', () => {
    it('should clear and return null', () => {
      jest.useFakeTimers();
      const timeout = setTimeout(() => undefined, 1000);

      expect(clearTimeoutSafe(timeout)).toBeNull();
      expect(clearTimeoutSafe(null)).toBeNull();
      expect(jest.getTimerCount()).toBe(0);
    });
  });
});
