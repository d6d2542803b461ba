/**
 * Traced Queue Producer
 *
 * Publishes messages with the W3C `traceparent` header. When a collector
 * listens on the broker diagnostic source, every publish is recorded as a
 * producer span tagged with operation, host and queue; the span always
 * ends, with an error status when the broker rejects the publish.
 *
 * One producer owns one channel; publishes are serialized through a mutex.
 */

import { BROKER_DIAGNOSTIC_SOURCE, SpanNames } from '@msgtrace/types';
import type { ILogger } from '../logging/types';
import { AsyncMutex } from '../async/async-mutex';
import { DisposalError, ErrorCode, MsgtraceError, getErrorMessage, toError } from '../errors/error-handling';
import type { Activity, DiagnosticRegistry, DiagnosticSource } from '../tracing/diagnostic-source';
import { TraceContext, createRootContext, injectTraceParent } from '../tracing/trace-context';
import { brokerHost } from './types';
import type { BrokerChannel, BrokerClient, BrokerConnection } from './types';

// =============================================================================
// Types
// =============================================================================

export interface TracedQueueProducerOptions {
  channel: BrokerChannel;
  queue: string;
  /** Broker host recorded on spans */
  host: string;
  source: DiagnosticSource;
  logger: ILogger;
  /** Closed on dispose() when the producer owns it */
  connection?: BrokerConnection;
  operationName?: string;
}

export interface ConnectProducerOptions {
  brokerUrl: string;
  queue: string;
  registry: DiagnosticRegistry;
  logger: ILogger;
  sourceName?: string;
}

export interface PublishOptions {
  /** Upstream context; the publish span becomes its child */
  parent?: TraceContext;
}

export interface PublishResult {
  messageId: string;
  /** Context written to the `traceparent` header */
  traceContext: TraceContext;
}

// =============================================================================
// Producer
// =============================================================================

export class TracedQueueProducer {
  readonly queue: string;

  private readonly channel: BrokerChannel;
  private readonly host: string;
  private readonly source: DiagnosticSource;
  private readonly logger: ILogger;
  private readonly connection?: BrokerConnection;
  private readonly operationName: string;
  private readonly publishMutex = new AsyncMutex();
  private disposePromise: Promise<void> | null = null;

  constructor(options: TracedQueueProducerOptions) {
    this.channel = options.channel;
    this.queue = options.queue;
    this.host = options.host;
    this.source = options.source;
    this.logger = options.logger;
    this.connection = options.connection;
    this.operationName = options.operationName ?? SpanNames.PUBLISH;
  }

  /**
   * Open a connection and channel, declare the queue and return a producer
   * that owns both.
   *
   * @throws ConnectionError when the broker is unreachable
   */
  static async connect(broker: BrokerClient, options: ConnectProducerOptions): Promise<TracedQueueProducer> {
    const connection = await broker.connect(options.brokerUrl);
    try {
      const channel = await connection.createChannel();
      await channel.declareQueue(options.queue);
      return new TracedQueueProducer({
        channel,
        connection,
        queue: options.queue,
        host: brokerHost(options.brokerUrl),
        source: options.registry.getSource(options.sourceName ?? BROKER_DIAGNOSTIC_SOURCE),
        logger: options.logger,
      });
    } catch (error) {
      await connection.close().catch((closeError: unknown) => {
        options.logger.warn('Failed to close connection after producer setup failure', {
          error: getErrorMessage(closeError),
        });
      });
      throw error;
    }
  }

  /**
   * Publish a message. Objects are serialized as JSON.
   *
   * @throws whatever the broker channel throws, after the span has ended
   */
  async publish(message: string | object, options: PublishOptions = {}): Promise<PublishResult> {
    if (this.disposePromise) {
      throw new MsgtraceError('Producer is disposed', ErrorCode.INVALID_STATE, { context: { queue: this.queue } });
    }

    const body = typeof message === 'string' ? message : JSON.stringify(message);

    return this.publishMutex.runExclusive(async () => {
      const activity: Activity | null = this.source.isEnabled()
        ? this.source.startActivity(this.operationName, {
          kind: 'producer',
          parent: options.parent,
          tags: { operation: 'publish', host: this.host, queue: this.queue },
        })
        : null;

      const traceContext = activity?.context ?? options.parent ?? createRootContext();
      const headers = injectTraceParent({}, traceContext);

      try {
        const messageId = await this.channel.publish(this.queue, headers, body);
        this.logger.debug('Message published', { queue: this.queue, messageId, traceId: traceContext.traceId });
        return { messageId, traceContext };
      } catch (error) {
        if (activity) {
          this.source.reportException(activity, toError(error));
        }
        this.logger.error('Failed to publish message', {
          queue: this.queue,
          traceId: traceContext.traceId,
          error: getErrorMessage(error),
        });
        throw error;
      } finally {
        if (activity) {
          this.source.stopActivity(activity);
        }
      }
    });
  }

  /**
   * Close the channel and any owned connection. Idempotent; failures are
   * logged and suppressed. Publishes still queued behind the mutex are
   * rejected with INVALID_STATE.
   */
  dispose(): Promise<void> {
    if (!this.disposePromise) {
      this.disposePromise = this.release();
    }
    return this.disposePromise;
  }

  private async release(): Promise<void> {
    const cancelled = this.publishMutex.cancelWaiters(
      new MsgtraceError('Producer is disposed', ErrorCode.INVALID_STATE, { context: { queue: this.queue } })
    );
    if (cancelled > 0) {
      this.logger.warn('Cancelled queued publishes on dispose', { queue: this.queue, cancelled });
    }
    await this.closeQuietly('channel', () => this.channel.close());
    if (this.connection) {
      const connection = this.connection;
      await this.closeQuietly('connection', () => connection.close());
    }
  }

  private async closeQuietly(resource: string, close: () => Promise<void>): Promise<void> {
    try {
      await close();
    } catch (error) {
      const suppressed = error instanceof DisposalError
        ? error
        : new DisposalError(`Failed to close producer ${resource}`, resource, { cause: toError(error) });
      this.logger.warn(suppressed.message, { queue: this.queue, error: getErrorMessage(error) });
    }
  }
}
