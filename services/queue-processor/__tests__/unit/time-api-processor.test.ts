/**
 * Time API Processor Tests
 */

import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import {
  ErrorCode,
  FormatError,
  InMemorySpanExporter,
  RecordingLogger,
  SpanExportPipeline,
  Tracer,
  formatTraceParent,
  parseTraceParent,
} from '@msgtrace/core';
import type { Delivery, Span } from '@msgtrace/core';
import { InMemoryMetricsCollector, MetricType } from '@msgtrace/metrics';
import { MetricNames, Queues, SpanNames } from '@msgtrace/types';
import { createTimeApiProcessor, parseEnqueuedMessage } from '../../src';

const TRACEPARENT = '00-cd4262a7f7adf040bdd892959cf8c4fc-4a28d39ff0e725f2-01';
const BODY = JSON.stringify({ eventName: 'Checkout clicked', source: 'WebSiteA', enqueuedAt: 1700000000000 });

function delivery(body = BODY): Delivery {
  return { id: '1-0', queue: Queues.WEB, headers: { traceparent: TRACEPARENT }, body };
}

describe('parseEnqueuedMessage', () => {
  it('should return the parsed message', () => {
    expect(parseEnqueuedMessage(BODY)).toEqual({
      eventName: 'Checkout clicked',
      source: 'WebSiteA',
      enqueuedAt: 1700000000000,
    });
  });

  it('should reject bodies that are not JSON', () => {
    expect(() => parseEnqueuedMessage('not json')).toThrow(/^Message body is not JSON: /);
  });

  it('should reject JSON of the wrong shape', () => {
    let caught: unknown;
    try {
      parseEnqueuedMessage('{"eventName":1}');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(FormatError);
    expect(caught).toMatchObject({
      message: 'Message body is not an enqueued message',
      code: ErrorCode.INVALID_ARGUMENT,
      input: '{"eventName":1}',
    });
  });
});

describe('createTimeApiProcessor', () => {
  let logger: RecordingLogger;
  let exporter: InMemorySpanExporter;
  let pipeline: SpanExportPipeline;
  let tracer: Tracer;
  let metrics: InMemoryMetricsCollector;
  let fetchImpl: jest.Mock<typeof fetch>;
  let consumerSpan: Span;

  function respondWith(status: number, body = '2024-01-01T00:00:00Z'): void {
    fetchImpl.mockImplementation(async () => new Response(body, { status }));
  }

  function run(body?: string): Promise<void> {
    const processor = createTimeApiProcessor({
      apiUrl: 'http://time-api.local/',
      tracer,
      metrics,
      fetchImpl,
    });
    return processor(delivery(body), { span: consumerSpan, traceContext: consumerSpan.context, logger });
  }

  beforeEach(() => {
    logger = new RecordingLogger();
    exporter = new InMemorySpanExporter();
    pipeline = new SpanExportPipeline([exporter], logger);
    tracer = new Tracer('test', pipeline, logger);
    metrics = new InMemoryMetricsCollector();
    metrics.defineMetric({ name: MetricNames.PROCESSED_ITEM, type: MetricType.COUNTER, help: 'Processed' });
    fetchImpl = jest.fn<typeof fetch>();
    consumerSpan = tracer.startSpan(SpanNames.PROCESS, { kind: 'consumer', parent: parseTraceParent(TRACEPARENT) });
  });

  it('should call the time API under a client span', async () => {
    respondWith(200);

    await run();
    await pipeline.forceFlush();

    const [clientSpan] = exporter.getFinishedSpans();
    expect(clientSpan).toMatchObject({
      name: 'GET /api/time/dbtime',
      kind: 'client',
      traceId: 'cd4262a7f7adf040bdd892959cf8c4fc',
      parentId: consumerSpan.id,
      status: { code: 'unset' },
      tags: {
        'http.method': 'GET',
        'http.url': 'http://time-api.local/api/time/dbtime',
        'http.status_code': '200',
      },
    });

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://time-api.local/api/time/dbtime');
    expect(init?.headers).toEqual({ traceparent: formatTraceParent(clientSpan.context) });
  });

  it('should record the event name and count the message', async () => {
    respondWith(200);

    await run();
    consumerSpan.end();

    expect(consumerSpan.toReadable().events).toEqual([
      { name: 'Checkout clicked', timestamp: expect.any(Number), attributes: { source: 'WebSiteA' } },
    ]);
    expect(metrics.getValue(MetricNames.PROCESSED_ITEM, { Queue: Queues.WEB })).toBe(1);
    expect(logger.hasLogWithMeta('debug', { messageId: '1-0', time: '2024-01-01T00:00:00Z' })).toBe(true);
  });

  it('should fail on a non-success status', async () => {
    respondWith(500, 'boom');

    await expect(run()).rejects.toMatchObject({
      name: 'ProcessingError',
      message: 'Time API responded with HTTP 500',
      traceId: 'cd4262a7f7adf040bdd892959cf8c4fc',
    });
    await pipeline.forceFlush();

    const [clientSpan] = exporter.getFinishedSpans();
    expect(clientSpan.status).toEqual({ code: 'error', description: 'Time API responded with HTTP 500' });
    expect(clientSpan.tags['http.status_code']).toBe('500');
    expect(metrics.getValue(MetricNames.PROCESSED_ITEM, { Queue: Queues.WEB })).toBeUndefined();
  });

  it('should fail when the request cannot be sent', async () => {
    fetchImpl.mockRejectedValue(new TypeError('fetch failed'));

    await expect(run()).rejects.toThrow('fetch failed');
    await pipeline.forceFlush();

    expect(exporter.getFinishedSpans()[0].status).toEqual({ code: 'error', description: 'fetch failed' });
  });

  it('should reject an unreadable body after the call', async () => {
    respondWith(200);

    await expect(run('not json')).rejects.toBeInstanceOf(FormatError);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(metrics.getValue(MetricNames.PROCESSED_ITEM, { Queue: Queues.WEB })).toBeUndefined();
  });
});
