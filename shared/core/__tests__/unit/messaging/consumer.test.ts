/**
 * TracedQueueConsumer Tests
 *
 * Connection retry, trace extraction per delivery, failure handling and
 * draining on stop, against the in-process broker.
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { SpanNames } from '@msgtrace/types';
import { InMemoryBroker, flushPromises } from '@msgtrace/test-utils';
import {
  ConsumerState,
  ErrorCode,
  FormatError,
  InMemorySpanExporter,
  NullLogger,
  ProcessingError,
  RecordingLogger,
  SpanExportPipeline,
  Tracer,
  TracedQueueConsumer,
  createDeferred,
} from '../../../src';
import type {
  ConsumerStateChange,
  ErrorReporter,
  MessageProcessor,
  MissingContextPolicy,
} from '../../../src';

const QUEUE = 'msgtrace:test-queue';
const TRACE_ID = 'cd4262a7f7adf040bdd892959cf8c4fc';
const PARENT_SPAN_ID = '4a28d39ff0e725f2';
const TRACEPARENT = `00-${TRACE_ID}-${PARENT_SPAN_ID}-01`;

describe('TracedQueueConsumer', () => {
  let broker: InMemoryBroker;
  let logger: RecordingLogger;
  let exporter: InMemorySpanExporter;
  let pipeline: SpanExportPipeline;
  let processor: jest.Mock<MessageProcessor>;
  let reportException: jest.Mock<ErrorReporter['reportException']>;
  let consumer: TracedQueueConsumer;

  function createConsumer(missingContextPolicy?: MissingContextPolicy): TracedQueueConsumer {
    return new TracedQueueConsumer({
      broker,
      brokerUrl: 'redis://localhost:6379',
      queue: QUEUE,
      tracer: new Tracer('test', pipeline),
      processor,
      logger,
      errorReporter: { reportException },
      missingContextPolicy,
    });
  }

  function recordStates(target: TracedQueueConsumer): ConsumerState[] {
    const states: ConsumerState[] = [];
    target.on('stateChange', (change: ConsumerStateChange) => states.push(change.newState));
    return states;
  }

  beforeEach(() => {
    broker = new InMemoryBroker();
    logger = new RecordingLogger();
    exporter = new InMemorySpanExporter();
    pipeline = new SpanExportPipeline([exporter], new NullLogger());
    processor = jest.fn<MessageProcessor>().mockResolvedValue(undefined);
    reportException = jest.fn<ErrorReporter['reportException']>();
    consumer = createConsumer();
  });

  afterEach(async () => {
    jest.useRealTimers();
    await consumer.stop(AbortSignal.abort());
  });

  // ===========================================================================
  // Connection lifecycle
  // ===========================================================================

  describe('start', () => {
    it('should connect, declare the queue and register a handler', async () => {
      const states = recordStates(consumer);

      await expect(consumer.start()).resolves.toBe(ConsumerState.CONSUMING);

      expect(states).toEqual([ConsumerState.CONNECTING, ConsumerState.CONSUMING]);
      expect(broker.hasQueue(QUEUE)).toBe(true);
      expect(broker.getConsumerCount(QUEUE)).toBe(1);
      expect(consumer.getStats().connectAttempts).toBe(1);
    });

    it('should share one attempt between concurrent callers', async () => {
      const first = consumer.start();
      const second = consumer.start();

      expect(second).toBe(first);
      await first;
      await expect(consumer.start()).resolves.toBe(ConsumerState.CONSUMING);
      expect(broker.getConnectAttempts()).toBe(1);
    });

    it('should retry every 3 seconds until the broker is reachable', async () => {
      jest.useFakeTimers();
      broker.failNext('connect', 3);
      const states = recordStates(consumer);

      const started = consumer.start();
      await jest.advanceTimersByTimeAsync(3000);
      await jest.advanceTimersByTimeAsync(3000);
      expect(consumer.getState()).toBe(ConsumerState.DISCONNECTED);
      expect(broker.getConnectAttempts()).toBe(3);

      await jest.advanceTimersByTimeAsync(3000);

      await expect(started).resolves.toBe(ConsumerState.CONSUMING);
      expect(broker.getConnectAttempts()).toBe(4);
      expect(states).toEqual([
        ConsumerState.CONNECTING, ConsumerState.DISCONNECTED,
        ConsumerState.CONNECTING, ConsumerState.DISCONNECTED,
        ConsumerState.CONNECTING, ConsumerState.DISCONNECTED,
        ConsumerState.CONNECTING, ConsumerState.CONSUMING,
      ]);
      expect(logger.getWarnings().filter(entry => entry.msg === 'Failed to start consuming, will retry')).toHaveLength(3);
    });

    it('should release a partially opened connection before retrying', async () => {
      broker.failNext('declareQueue');
      consumer = new TracedQueueConsumer({
        broker,
        brokerUrl: 'redis://localhost:6379',
        queue: QUEUE,
        tracer: new Tracer('test', pipeline),
        processor,
        logger,
        retryDelayMs: 1,
      });

      await expect(consumer.start()).resolves.toBe(ConsumerState.CONSUMING);

      expect(broker.getConnectAttempts()).toBe(2);
      expect(broker.getOpenConnectionCount()).toBe(1);
      expect(broker.getOpenChannelCount()).toBe(1);
    });

    it('should stop retrying when the signal aborts during the delay', async () => {
      broker.failNext('connect', 10);
      const controller = new AbortController();
      consumer.on('stateChange', (change: ConsumerStateChange) => {
        if (change.newState === ConsumerState.DISCONNECTED) {
          controller.abort();
        }
      });

      await expect(consumer.start(controller.signal)).resolves.toBe(ConsumerState.DISCONNECTED);

      expect(broker.getConnectAttempts()).toBe(1);
      expect(logger.hasLogMatching('info', 'Consumer start cancelled')).toBe(true);
    });

    it('should not connect with an already aborted signal', async () => {
      await expect(consumer.start(AbortSignal.abort())).resolves.toBe(ConsumerState.DISCONNECTED);
      expect(broker.getConnectAttempts()).toBe(0);
    });
  });

  // ===========================================================================
  // Delivery handling
  // ===========================================================================

  describe('message handling', () => {
    beforeEach(async () => {
      await consumer.start();
    });

    it('should process each delivery in a consumer span continuing the trace', async () => {
      const id = broker.inject(QUEUE, { traceparent: TRACEPARENT }, 'payload');
      await broker.whenIdle();

      expect(processor).toHaveBeenCalledTimes(1);
      const [delivery, context] = processor.mock.calls[0];
      expect(delivery).toEqual({ id, queue: QUEUE, headers: { traceparent: TRACEPARENT }, body: 'payload' });
      expect(context.traceContext.traceId).toBe(TRACE_ID);

      const [span] = exporter.getFinishedSpans();
      expect(span.name).toBe(SpanNames.PROCESS);
      expect(span.kind).toBe('consumer');
      expect(span.traceId).toBe(TRACE_ID);
      expect(span.parentId).toBe(PARENT_SPAN_ID);
      expect(span.id).toBe(context.span.id);
      expect(span.tags).toEqual({ queue: QUEUE });
      expect(span.status).toEqual({ code: 'unset' });
      expect(consumer.getStats().messagesProcessed).toBe(1);
    });

    it('should scope the processing logger by correlation id', async () => {
      processor.mockImplementation(async (_delivery, context) => {
        context.logger.info('Handled');
      });

      broker.inject(QUEUE, { traceparent: TRACEPARENT }, 'payload');
      await broker.whenIdle();

      const entry = logger.getLogs('info').find(log => log.msg === 'Handled');
      expect(entry?.bindings).toEqual({ queue: QUEUE, correlationId: TRACE_ID });
    });

    it('should reject deliveries without trace information', async () => {
      const id = broker.inject(QUEUE, {}, 'payload');
      await broker.whenIdle();

      expect(processor).not.toHaveBeenCalled();
      expect(exporter.getFinishedSpans()).toHaveLength(0);
      expect(broker.getAcked(QUEUE)).toEqual([id]);
      expect(consumer.getStats().messagesRejected).toBe(1);

      expect(reportException).toHaveBeenCalledTimes(1);
      const [error, properties] = reportException.mock.calls[0];
      expect(error).toBeInstanceOf(FormatError);
      expect(error).toMatchObject({ code: ErrorCode.MISSING_TRACE_CONTEXT, message: 'Trace information not found in message' });
      expect(properties).toEqual({ queue: QUEUE, messageId: id });
      expect(logger.hasLogWithMeta('error', { messageId: id, error: 'Trace information not found in message' })).toBe(true);
    });

    it('should reject deliveries with a malformed header', async () => {
      broker.inject(QUEUE, { traceparent: 'garbage' }, 'payload');
      await broker.whenIdle();

      expect(processor).not.toHaveBeenCalled();
      expect(reportException.mock.calls[0][0]).toMatchObject({ code: ErrorCode.INVALID_TRACE_CONTEXT });
    });

    it('should record processing failures on the span without rethrowing', async () => {
      processor.mockRejectedValue(new TypeError('Time API unreachable'));

      const id = broker.inject(QUEUE, { traceparent: TRACEPARENT }, 'payload');
      await broker.whenIdle();

      const [span] = exporter.getFinishedSpans();
      expect(span.status).toEqual({ code: 'error', description: 'Time API unreachable' });
      expect(span.events).toHaveLength(1);
      expect(span.events[0]).toMatchObject({
        name: 'exception',
        attributes: { 'exception.type': 'TypeError', 'exception.message': 'Time API unreachable' },
      });

      const [error, properties] = reportException.mock.calls[0];
      expect(error).toBeInstanceOf(ProcessingError);
      expect(properties).toEqual({ queue: QUEUE, messageId: id, traceId: TRACE_ID });
      expect(broker.getHandlerFailures()).toEqual([]);
      expect(consumer.getStats()).toMatchObject({ messagesProcessed: 0, messagesFailed: 1 });
    });

    it('should keep rejecting deliveries when the error reporter throws', async () => {
      reportException.mockImplementation(() => {
        throw new Error('reporter down');
      });

      const id = broker.inject(QUEUE, {}, 'payload');
      await broker.whenIdle();

      expect(broker.getHandlerFailures()).toEqual([]);
      expect(consumer.getStats().messagesRejected).toBe(1);
      expect(logger.hasLogWithMeta('warn', { messageId: id, error: 'reporter down' })).toBe(true);
    });

    it('should end the span of a failed message when the error reporter throws', async () => {
      processor.mockRejectedValue(new Error('Time API unreachable'));
      reportException.mockImplementation(() => {
        throw new Error('reporter down');
      });

      const id = broker.inject(QUEUE, { traceparent: TRACEPARENT }, 'payload');
      await broker.whenIdle();

      expect(broker.getHandlerFailures()).toEqual([]);
      expect(exporter.getFinishedSpans()).toHaveLength(1);
      expect(consumer.getStats()).toMatchObject({ messagesFailed: 1, inFlight: 0 });
      expect(logger.hasLogWithMeta('warn', { messageId: id, error: 'reporter down' })).toBe(true);
    });
  });

  describe('missing context policy start-root', () => {
    it('should process deliveries without trace information under a new root', async () => {
      consumer = createConsumer('start-root');
      await consumer.start();

      broker.inject(QUEUE, {}, 'payload');
      await broker.whenIdle();

      expect(processor).toHaveBeenCalledTimes(1);
      const [span] = exporter.getFinishedSpans();
      expect(span.parentId).toBeUndefined();
      expect(span.traceId).not.toBe(TRACE_ID);
      expect(reportException).not.toHaveBeenCalled();
    });

    it('should still reject malformed headers', async () => {
      consumer = createConsumer('start-root');
      await consumer.start();

      broker.inject(QUEUE, { traceparent: '01-zz' }, 'payload');
      await broker.whenIdle();

      expect(processor).not.toHaveBeenCalled();
      expect(consumer.getStats().messagesRejected).toBe(1);
    });
  });

  // ===========================================================================
  // Stop
  // ===========================================================================

  describe('stop', () => {
    it('should wait for in-flight messages and release broker resources', async () => {
      const gate = createDeferred();
      processor.mockImplementation(() => gate.promise);
      await consumer.start();
      const states = recordStates(consumer);

      broker.inject(QUEUE, { traceparent: TRACEPARENT }, 'payload');
      await flushPromises();
      expect(consumer.getStats().inFlight).toBe(1);

      let stopped = false;
      const stopping = consumer.stop().then(() => {
        stopped = true;
      });
      await flushPromises();
      expect(stopped).toBe(false);
      expect(broker.getConsumerCount(QUEUE)).toBe(0);

      gate.resolve();
      await stopping;

      expect(consumer.getStats()).toMatchObject({ messagesProcessed: 1, inFlight: 0 });
      expect(states).toEqual([ConsumerState.DISCONNECTED]);
      expect(broker.getOpenChannelCount()).toBe(0);
      expect(broker.getOpenConnectionCount()).toBe(0);
    });

    it('should stop waiting when its signal aborts', async () => {
      processor.mockImplementation(() => new Promise<void>(() => undefined));
      await consumer.start();
      broker.inject(QUEUE, { traceparent: TRACEPARENT }, 'payload');
      await flushPromises();

      await consumer.stop(AbortSignal.abort());

      expect(consumer.getState()).toBe(ConsumerState.DISCONNECTED);
      expect(consumer.getStats().inFlight).toBe(1);
      expect(broker.getOpenConnectionCount()).toBe(0);
    });

    it('should cancel a start that is waiting to retry', async () => {
      broker.failNext('connect', 10);
      consumer = new TracedQueueConsumer({
        broker,
        brokerUrl: 'redis://localhost:6379',
        queue: QUEUE,
        tracer: new Tracer('test', pipeline),
        processor,
        logger,
        retryDelayMs: 60_000,
      });

      const started = consumer.start();
      await flushPromises(20);
      await consumer.stop();

      await expect(started).resolves.toBe(ConsumerState.DISCONNECTED);
      expect(broker.getConnectAttempts()).toBe(1);
    });

    it('should start again only after a draining stop completes', async () => {
      const gate = createDeferred();
      processor.mockImplementation(() => gate.promise);
      await consumer.start();
      const states = recordStates(consumer);

      broker.inject(QUEUE, { traceparent: TRACEPARENT }, 'payload');
      await flushPromises();

      const stopping = consumer.stop();
      let restarted = false;
      const starting = consumer.start().then(state => {
        restarted = true;
        return state;
      });
      await flushPromises();
      expect(restarted).toBe(false);
      expect(consumer.getState()).toBe(ConsumerState.CONSUMING);

      gate.resolve();
      await stopping;

      await expect(starting).resolves.toBe(ConsumerState.CONSUMING);
      expect(states).toEqual([ConsumerState.DISCONNECTED, ConsumerState.CONNECTING, ConsumerState.CONSUMING]);
      expect(broker.getConnectAttempts()).toBe(2);
      expect(broker.getConsumerCount(QUEUE)).toBe(1);
    });

    it('should be a no-op on a consumer that never started', async () => {
      await expect(consumer.stop()).resolves.toBeUndefined();
      expect(consumer.getState()).toBe(ConsumerState.DISCONNECTED);
    });
  });
});
