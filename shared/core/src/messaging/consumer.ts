/**
 * Traced Queue Consumer
 *
 * Owns the broker connection lifecycle and correlates every delivery with
 * the trace that produced it.
 *
 * Connection states:
 * - DISCONNECTED: no broker resources held
 * - CONNECTING: an attempt to connect, open a channel, declare the queue
 *   and register the handler is in progress
 * - CONSUMING: the handler is registered
 *
 * A failed attempt releases whatever it acquired, returns to DISCONNECTED
 * and retries after a fixed delay. Aborting the start signal (or calling
 * stop()) during that delay ends the attempt without another retry.
 *
 * Per delivery (already acknowledged by the channel):
 * 1. missing or malformed `traceparent`: FormatError reported, no span
 * 2. consumer span as child of the extracted context, tagged with the queue
 * 3. processing runs with a logger scoped by correlationId = traceId
 * 4. processing errors mark the span and are reported, never rethrown
 * 5. the span always ends
 */

import { EventEmitter } from 'events';
import { SpanNames } from '@msgtrace/types';
import type { ILogger } from '../logging/types';
import { delay, whenAborted } from '../async/async-utils';
import {
  DisposalError,
  ErrorCode,
  FormatError,
  MsgtraceError,
  OperationCancelledError,
  ProcessingError,
  getErrorMessage,
  toError,
} from '../errors/error-handling';
import type { Span } from '../tracing/span';
import { errorStatus } from '../tracing/span';
import type { Tracer } from '../tracing/tracer';
import { TraceContext, requireTraceParent } from '../tracing/trace-context';
import type { ErrorReporter } from './error-reporter';
import type { BrokerChannel, BrokerClient, BrokerConnection, Delivery } from './types';

// =============================================================================
// Types
// =============================================================================

export enum ConsumerState {
  DISCONNECTED = 'disconnected',
  CONNECTING = 'connecting',
  CONSUMING = 'consuming'
}

const VALID_TRANSITIONS: Record<ConsumerState, ConsumerState[]> = {
  [ConsumerState.DISCONNECTED]: [ConsumerState.CONNECTING],
  [ConsumerState.CONNECTING]: [ConsumerState.CONSUMING, ConsumerState.DISCONNECTED],
  [ConsumerState.CONSUMING]: [ConsumerState.DISCONNECTED]
};

export interface ConsumerStateChange {
  previousState: ConsumerState;
  newState: ConsumerState;
  timestamp: number;
}

/**
 * What the downstream processing step receives besides the delivery.
 */
export interface ProcessingContext {
  span: Span;
  traceContext: TraceContext;
  /** Scoped by correlationId */
  logger: ILogger;
}

export type MessageProcessor = (delivery: Delivery, context: ProcessingContext) => Promise<void>;

/**
 * Handling of deliveries without a `traceparent` header.
 * - 'reject': report a FormatError and skip processing
 * - 'start-root': process under a new root trace
 */
export type MissingContextPolicy = 'reject' | 'start-root';

export interface TracedQueueConsumerOptions {
  broker: BrokerClient;
  brokerUrl: string;
  queue: string;
  tracer: Tracer;
  processor: MessageProcessor;
  logger: ILogger;
  errorReporter?: ErrorReporter;
  /** Fixed delay between connection attempts (default: 3000) */
  retryDelayMs?: number;
  spanName?: string;
  missingContextPolicy?: MissingContextPolicy;
}

export interface ConsumerStats {
  state: ConsumerState;
  connectAttempts: number;
  messagesProcessed: number;
  messagesFailed: number;
  messagesRejected: number;
  inFlight: number;
}

interface AcquiredResources {
  connection?: BrokerConnection;
  channel?: BrokerChannel;
  consumerTag?: string;
}

export const DEFAULT_RETRY_DELAY_MS = 3000;

// =============================================================================
// Consumer
// =============================================================================

export class TracedQueueConsumer extends EventEmitter {
  readonly queue: string;

  private readonly options: TracedQueueConsumerOptions;
  private readonly logger: ILogger;
  private readonly retryDelayMs: number;
  private readonly spanName: string;
  private readonly missingContextPolicy: MissingContextPolicy;

  private state = ConsumerState.DISCONNECTED;
  private resources: AcquiredResources = {};
  private lifecycle: AbortController | null = null;
  private startPromise: Promise<ConsumerState> | null = null;
  private stopPromise: Promise<void> | null = null;
  private readonly inFlight = new Set<Promise<void>>();
  private connectAttempts = 0;
  private messagesProcessed = 0;
  private messagesFailed = 0;
  private messagesRejected = 0;

  constructor(options: TracedQueueConsumerOptions) {
    super();
    this.options = options;
    this.queue = options.queue;
    this.logger = options.logger.child({ queue: options.queue });
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.spanName = options.spanName ?? SpanNames.PROCESS;
    this.missingContextPolicy = options.missingContextPolicy ?? 'reject';
  }

  // ===========================================================================
  // State
  // ===========================================================================

  getState(): ConsumerState {
    return this.state;
  }

  getStats(): ConsumerStats {
    return {
      state: this.state,
      connectAttempts: this.connectAttempts,
      messagesProcessed: this.messagesProcessed,
      messagesFailed: this.messagesFailed,
      messagesRejected: this.messagesRejected,
      inFlight: this.inFlight.size,
    };
  }

  private transition(newState: ConsumerState): void {
    const previousState = this.state;
    if (previousState === newState) {
      return;
    }
    if (!VALID_TRANSITIONS[previousState].includes(newState)) {
      throw new MsgtraceError(
        `Invalid consumer state transition: ${previousState} -> ${newState}`,
        ErrorCode.INVALID_STATE,
        { context: { queue: this.queue } }
      );
    }
    this.state = newState;
    const change: ConsumerStateChange = { previousState, newState, timestamp: Date.now() };
    this.emit('stateChange', change);
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Connect and begin consuming, retrying until success or cancellation.
   * Concurrent calls share one attempt. A call made while stop() is still
   * draining waits for it and then connects again.
   *
   * @returns CONSUMING on success, DISCONNECTED when cancelled
   */
  start(signal?: AbortSignal): Promise<ConsumerState> {
    if (this.stopPromise) {
      return this.stopPromise.then(() => this.start(signal));
    }
    if (this.state === ConsumerState.CONSUMING) {
      return Promise.resolve(this.state);
    }
    if (!this.startPromise) {
      this.startPromise = this.connectLoop(signal).finally(() => {
        this.startPromise = null;
      });
    }
    return this.startPromise;
  }

  /**
   * Cancel the consumer registration, wait for in-flight handlers (until
   * `signal` aborts), then close channel and connection. Idempotent.
   */
  stop(signal?: AbortSignal): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.shutdown(signal).finally(() => {
        this.stopPromise = null;
      });
    }
    return this.stopPromise;
  }

  private async connectLoop(ownerSignal?: AbortSignal): Promise<ConsumerState> {
    const lifecycle = new AbortController();
    this.lifecycle = lifecycle;
    const forwardAbort = (): void => lifecycle.abort();
    ownerSignal?.addEventListener('abort', forwardAbort, { once: true });
    if (ownerSignal?.aborted) {
      lifecycle.abort();
    }

    try {
      while (!lifecycle.signal.aborted) {
        this.connectAttempts++;
        this.transition(ConsumerState.CONNECTING);

        const acquired: AcquiredResources = {};
        try {
          await this.acquire(acquired);
        } catch (error) {
          this.logger.warn('Failed to start consuming, will retry', {
            attempt: this.connectAttempts,
            retryDelayMs: this.retryDelayMs,
            error: getErrorMessage(error),
          });
          await this.release(acquired);
          this.transition(ConsumerState.DISCONNECTED);

          try {
            await delay(this.retryDelayMs, lifecycle.signal);
          } catch (waitError) {
            if (waitError instanceof OperationCancelledError) {
              break;
            }
            throw waitError;
          }
          continue;
        }

        if (lifecycle.signal.aborted) {
          await this.release(acquired);
          this.transition(ConsumerState.DISCONNECTED);
          break;
        }

        this.resources = acquired;
        this.transition(ConsumerState.CONSUMING);
        this.logger.info('Consuming from queue', { attempt: this.connectAttempts });
        return ConsumerState.CONSUMING;
      }

      this.logger.info('Consumer start cancelled');
      return ConsumerState.DISCONNECTED;
    } finally {
      ownerSignal?.removeEventListener('abort', forwardAbort);
      if (this.lifecycle === lifecycle) {
        this.lifecycle = null;
      }
    }
  }

  private async acquire(acquired: AcquiredResources): Promise<void> {
    acquired.connection = await this.options.broker.connect(this.options.brokerUrl);
    acquired.channel = await acquired.connection.createChannel();
    await acquired.channel.declareQueue(this.queue);
    acquired.consumerTag = await acquired.channel.consume(this.queue, delivery => this.handleDelivery(delivery));
  }

  /**
   * Release in reverse order of acquisition. Every failure is suppressed.
   */
  private async release(acquired: AcquiredResources): Promise<void> {
    const { connection, channel, consumerTag } = acquired;
    if (channel && consumerTag) {
      await this.releaseQuietly('consumer', () => channel.cancel(consumerTag));
    }
    if (channel) {
      await this.releaseQuietly('channel', () => channel.close());
    }
    if (connection) {
      await this.releaseQuietly('connection', () => connection.close());
    }
  }

  private async releaseQuietly(resource: string, close: () => Promise<void>): Promise<void> {
    try {
      await close();
    } catch (error) {
      const suppressed = error instanceof DisposalError
        ? error
        : new DisposalError(`Failed to release ${resource}`, resource, { cause: toError(error) });
      this.logger.debug(suppressed.message, { resource, error: getErrorMessage(error) });
    }
  }

  private async shutdown(signal?: AbortSignal): Promise<void> {
    this.lifecycle?.abort();
    if (this.startPromise) {
      await this.startPromise;
    }

    const { connection, channel, consumerTag } = this.resources;
    this.resources = {};

    if (channel && consumerTag) {
      await this.releaseQuietly('consumer', () => channel.cancel(consumerTag));
    }

    if (this.inFlight.size > 0) {
      this.logger.info('Waiting for in-flight messages', { inFlight: this.inFlight.size });
      await Promise.race([this.drain(), whenAborted(signal)]);
    }

    await this.release({ connection, channel });
    this.transition(ConsumerState.DISCONNECTED);
    this.logger.info('Consumer stopped', { stats: this.getStats() });
  }

  private async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  // ===========================================================================
  // Message Handling
  // ===========================================================================

  /**
   * Handle one delivery. Never rejects.
   */
  async handleDelivery(delivery: Delivery): Promise<void> {
    const task = this.processDelivery(delivery);
    this.inFlight.add(task);
    try {
      await task;
    } finally {
      this.inFlight.delete(task);
    }
  }

  private report(failure: Error, properties: Readonly<Record<string, string>>): void {
    try {
      this.options.errorReporter?.reportException(failure, properties);
    } catch (error) {
      this.logger.warn('Error reporter failed', { messageId: properties.messageId, error: getErrorMessage(error) });
    }
  }

  private extractParent(delivery: Delivery): TraceContext | null | undefined {
    try {
      return requireTraceParent(delivery.headers);
    } catch (error) {
      const missing = error instanceof FormatError && error.code === ErrorCode.MISSING_TRACE_CONTEXT;
      if (missing && this.missingContextPolicy === 'start-root') {
        return undefined;
      }
      this.messagesRejected++;
      const failure = error instanceof FormatError
        ? error
        : new FormatError(getErrorMessage(error));
      this.logger.error('Rejected message without valid trace context', {
        messageId: delivery.id,
        error: failure.message,
      });
      this.report(failure, { queue: this.queue, messageId: delivery.id });
      return null;
    }
  }

  private async processDelivery(delivery: Delivery): Promise<void> {
    const parent = this.extractParent(delivery);
    if (parent === null) {
      return;
    }

    const span = this.options.tracer.startSpan(this.spanName, {
      kind: 'consumer',
      parent,
      tags: { queue: this.queue },
    });
    const scopedLogger = this.logger.child({ correlationId: span.traceId });

    try {
      scopedLogger.debug('Processing message', { messageId: delivery.id, spanId: span.id });
      await this.options.processor(delivery, {
        span,
        traceContext: span.context,
        logger: scopedLogger,
      });
      this.messagesProcessed++;
    } catch (error) {
      this.messagesFailed++;
      const failure = new ProcessingError(getErrorMessage(error), {
        queue: this.queue,
        traceId: span.traceId,
        cause: toError(error),
      });
      span.addEvent('exception', {
        'exception.type': toError(error).name,
        'exception.message': failure.message,
      });
      span.setStatus(errorStatus(failure.message));
      scopedLogger.error('Message processing failed', { messageId: delivery.id, error: failure.message });
      this.report(failure, {
        queue: this.queue,
        messageId: delivery.id,
        traceId: span.traceId,
      });
    } finally {
      span.end();
    }
  }
}
