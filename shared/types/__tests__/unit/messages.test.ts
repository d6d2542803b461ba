/**
 * Message type guard tests
 */

import { describe, it, expect } from '@jest/globals';
import { Queues, SpanNames, isEnqueuedMessage } from '../../src';

describe('isEnqueuedMessage', () => {
  it('accepts a complete message', () => {
    expect(isEnqueuedMessage({ eventName: 'Item enqueued', source: 'WebSiteA', enqueuedAt: 1700000000000 })).toBe(true);
  });

  it.each([
    ['null', null],
    ['a string', 'Item enqueued'],
    ['a missing source', { eventName: 'Item enqueued', enqueuedAt: 1 }],
    ['a numeric event name', { eventName: 7, source: 'WebSiteA', enqueuedAt: 1 }],
    ['a string timestamp', { eventName: 'Item enqueued', source: 'WebSiteA', enqueuedAt: '1' }],
  ])('rejects %s', (_label, value) => {
    expect(isEnqueuedMessage(value)).toBe(false);
  });
});

describe('names', () => {
  it('keeps queue and span names stable', () => {
    expect(Queues.WEB).toBe('msgtrace:web-queue');
    expect(SpanNames.PUBLISH).toBe('Publish to queue');
    expect(SpanNames.PROCESS).toBe('Process single queue message');
  });
});
