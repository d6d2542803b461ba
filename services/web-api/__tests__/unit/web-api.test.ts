/**
 * Web API Tests
 *
 * Drives the Express app through supertest against the in-process broker.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import request from 'supertest';
import type { Express } from 'express';
import { loadConfig } from '@msgtrace/config';
import { RecordingLogger, parseTraceParent } from '@msgtrace/core';
import type { LogEntry } from '@msgtrace/core';
import { InMemoryBroker } from '@msgtrace/test-utils';
import { Queues, isEnqueuedMessage } from '@msgtrace/types';
import { DEFAULT_EVENT_NAME } from '../../src/api';
import { WebApiService } from '../../src';

const INCOMING_TRACEPARENT = '00-cd4262a7f7adf040bdd892959cf8c4fc-4a28d39ff0e725f2-01';

function createService(broker: InMemoryBroker, logger: RecordingLogger, env: Record<string, string> = {}): WebApiService {
  const config = loadConfig(env, { serviceName: 'web-api', queueName: Queues.WEB, port: 0, metricsPort: 0 });
  return new WebApiService({ config, logger, broker });
}

function finishedSpan(logger: RecordingLogger, name: string): LogEntry | undefined {
  return logger.getLogs('info').find(entry => entry.msg === 'Span finished' && entry.meta?.span === name);
}

describe('WebApiService', () => {
  let broker: InMemoryBroker;
  let logger: RecordingLogger;
  let service: WebApiService;
  let app: Express;

  beforeEach(async () => {
    broker = new InMemoryBroker();
    logger = new RecordingLogger();
    service = createService(broker, logger);
    app = await service.start(false);
  });

  afterEach(async () => {
    await service.stop();
  });

  // ===========================================================================
  // POST /api/enqueue/:source
  // ===========================================================================

  describe('POST /api/enqueue/:source', () => {
    it('should publish a traced message and answer 202', async () => {
      const response = await request(app).post('/api/enqueue/WebSiteA').send({});

      expect(response.status).toBe(202);
      expect(response.body).toEqual({
        messageId: '1-0',
        traceId: expect.stringMatching(/^[0-9a-f]{32}$/),
        source: 'WebSiteA',
      });

      const [delivery] = broker.getPublished(Queues.WEB);
      const message: unknown = JSON.parse(delivery.body);
      expect(isEnqueuedMessage(message)).toBe(true);
      expect(message).toMatchObject({ eventName: DEFAULT_EVENT_NAME, source: 'WebSiteA' });
      expect(parseTraceParent(delivery.headers.traceparent).traceId).toBe(response.body.traceId);
      expect(service.getMetrics().getValue('Enqueued_Item', { Source: 'WebSiteA' })).toBe(1);
    });

    it('should use a trimmed event name from the body', async () => {
      await request(app).post('/api/enqueue/WebSiteB').send({ eventName: '  Checkout clicked  ' }).expect(202);

      expect(JSON.parse(broker.getPublished(Queues.WEB)[0].body)).toMatchObject({ eventName: 'Checkout clicked' });
    });

    it('should accept a request without a body', async () => {
      await request(app).post('/api/enqueue/WebSiteA').expect(202);
    });

    it('should continue an incoming trace', async () => {
      const response = await request(app)
        .post('/api/enqueue/WebSiteA')
        .set('traceparent', INCOMING_TRACEPARENT)
        .send({});

      expect(response.body.traceId).toBe('cd4262a7f7adf040bdd892959cf8c4fc');
    });

    it('should start a new trace for a malformed incoming header', async () => {
      const response = await request(app)
        .post('/api/enqueue/WebSiteA')
        .set('traceparent', 'garbage')
        .send({});

      expect(response.status).toBe(202);
      expect(response.body.traceId).not.toBe('cd4262a7f7adf040bdd892959cf8c4fc');
    });

    it('should reject invalid sources', async () => {
      const response = await request(app).post('/api/enqueue/bad%20source').send({});

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: 'Invalid enqueue request',
        issues: ['Source must be 1-64 letters, digits, dots, dashes or underscores'],
      });
      expect(broker.getPublished(Queues.WEB)).toEqual([]);
    });

    it('should reject blank event names', async () => {
      const response = await request(app).post('/api/enqueue/WebSiteA').send({ eventName: '   ' });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Invalid enqueue request');
    });

    it('should answer 400 for malformed JSON', async () => {
      const response = await request(app)
        .post('/api/enqueue/WebSiteA')
        .set('Content-Type', 'application/json')
        .send('{"eventName":');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'Malformed request body' });
    });

    it('should answer 503 when the broker rejects the publish', async () => {
      broker.failNext('publish');

      const response = await request(app).post('/api/enqueue/WebSiteA').send({});

      expect(response.status).toBe(503);
      expect(response.body).toEqual({ error: 'Failed to enqueue message' });
      expect(service.getMetrics().getValue('Enqueued_Item', { Source: 'WebSiteA' })).toBeUndefined();
      expect(logger.hasLogWithMeta('error', { source: 'WebSiteA', error: 'Injected publish failure' })).toBe(true);
    });
  });

  // ===========================================================================
  // Health, metrics, fallbacks
  // ===========================================================================

  describe('GET /health', () => {
    it('should report healthy while running and unhealthy after stop', async () => {
      const healthy = await request(app).get('/health');
      expect(healthy.status).toBe(200);
      expect(healthy.body).toMatchObject({ service: 'web-api', status: 'healthy' });

      await service.stop();

      const stopped = await request(app).get('/health');
      expect(stopped.status).toBe(503);
      expect(stopped.body.status).toBe('unhealthy');
    });
  });

  describe('GET /metrics', () => {
    it('should expose the enqueue counter per source', async () => {
      await request(app).post('/api/enqueue/WebSiteA').send({});
      await request(app).post('/api/enqueue/WebSiteA').send({});

      const response = await request(app).get('/metrics');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toMatch(/^text\/plain/);
      expect(response.text).toContain('# HELP Enqueued_Item Items enqueued per source\n# TYPE Enqueued_Item counter\n');
      expect(response.text).toMatch(/^Enqueued_Item\{Source="WebSiteA"\} 2 \d+$/m);
    });
  });

  it('should answer 404 for unknown routes', async () => {
    const response = await request(app).get('/api/unknown');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: 'Not found' });
  });

  it('should release the producer on stop', async () => {
    await service.stop();

    expect(broker.getOpenConnectionCount()).toBe(0);
    expect(broker.getOpenChannelCount()).toBe(0);
  });
});

describe('WebApiService with tracing', () => {
  it('should record the publish span as a child of the request span', async () => {
    const broker = new InMemoryBroker();
    const logger = new RecordingLogger();
    const service = createService(broker, logger, { USE_OPENTELEMETRY: '1', LOG_SPANS: 'true' });
    const app = await service.start(false);

    const response = await request(app)
      .post('/api/enqueue/WebSiteA')
      .set('traceparent', INCOMING_TRACEPARENT)
      .send({});
    await service.stop();

    const requestSpan = finishedSpan(logger, 'Enqueue request');
    const publishSpan = finishedSpan(logger, 'Publish to queue');
    expect(requestSpan?.meta).toMatchObject({
      kind: 'server',
      traceId: response.body.traceId,
      parentId: '4a28d39ff0e725f2',
      tags: { 'http.method': 'POST', source: 'WebSiteA', 'messaging.message_id': '1-0' },
    });
    expect(publishSpan?.meta).toMatchObject({
      kind: 'producer',
      traceId: response.body.traceId,
      parentId: requestSpan?.meta?.spanId,
      tags: { operation: 'publish', queue: Queues.WEB },
    });

    const [delivery] = broker.getPublished(Queues.WEB);
    expect(parseTraceParent(delivery.headers.traceparent).spanId).toBe(publishSpan?.meta?.spanId);
  });
});
