/**
 * Logging Tests
 *
 * Pino-backed factory plus the in-memory test loggers.
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import { NullLogger, RecordingLogger, createLogger, getLogger, resetLoggerCache } from '../../src';

describe('createLogger', () => {
  afterEach(() => {
    resetLoggerCache();
  });

  it('should return the cached logger for a name', () => {
    const first = createLogger({ name: 'cache-test', level: 'error', pretty: false });
    expect(getLogger('cache-test')).toBe(first);
  });

  it('should build a fresh logger after the cache is reset', () => {
    const first = createLogger({ name: 'reset-test', level: 'error', pretty: false });
    resetLoggerCache();
    expect(createLogger({ name: 'reset-test', level: 'error', pretty: false })).not.toBe(first);
  });

  it('should honour the configured level', () => {
    const logger = createLogger({ name: 'level-test', level: 'warn', pretty: false });

    expect(logger.isLevelEnabled?.('warn')).toBe(true);
    expect(logger.isLevelEnabled?.('info')).toBe(false);
  });

  it('should create child loggers at the parent level', () => {
    const child = createLogger({ name: 'child-test', level: 'error', pretty: false }).child({ queue: 'web' });

    expect(child.isLevelEnabled?.('error')).toBe(true);
    expect(child.isLevelEnabled?.('debug')).toBe(false);
  });
});

describe('RecordingLogger', () => {
  it('should capture entries with their metadata', () => {
    const logger = new RecordingLogger();
    logger.info('Consuming from queue', { queue: 'web' });
    logger.error('Message processing failed', { traceId: 'abc' });

    expect(logger.count).toBe(2);
    expect(logger.getErrors()).toHaveLength(1);
    expect(logger.hasLogMatching('info', /Consuming/)).toBe(true);
    expect(logger.hasLogWithMeta('error', { traceId: 'abc' })).toBe(true);
    expect(logger.hasLogWithMeta('error', { traceId: 'other' })).toBe(false);
  });

  it('should share entries with child loggers and keep their bindings', () => {
    const logger = new RecordingLogger();
    logger.child({ correlationId: 'abc' }).warn('Scoped');

    expect(logger.getLastLog()).toMatchObject({ level: 'warn', msg: 'Scoped', bindings: { correlationId: 'abc' } });
  });

  it('should clear captured entries', () => {
    const logger = new RecordingLogger();
    logger.debug('x');
    logger.clear();
    expect(logger.getAllLogs()).toEqual([]);
  });
});

describe('NullLogger', () => {
  it('should discard everything and return itself as child', () => {
    const logger = new NullLogger();
    logger.error('ignored');

    expect(logger.child({ a: 1 })).toBe(logger);
    expect(logger.isLevelEnabled('error')).toBe(false);
  });
});
