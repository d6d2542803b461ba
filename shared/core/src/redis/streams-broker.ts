/**
 * Redis Streams Broker
 *
 * BrokerClient implementation on Redis Streams. A stream plays the role of
 * a queue and a consumer group provides competing-consumer delivery.
 *
 * Entry layout: `headers` (JSON object of string values) and `body`.
 * Each channel owns a dedicated Redis connection so that a blocking
 * XREADGROUP never stalls publishes on another channel.
 */

import type { ILogger } from '../logging/types';
import { ConnectionError, DisposalError, getErrorMessage, toError } from '../errors/error-handling';
import type { MessageHeaders } from '../tracing/trace-context';
import { brokerHost } from '../messaging/types';
import type { BrokerChannel, BrokerClient, BrokerConnection, Delivery, DeliveryHandler } from '../messaging/types';
import { RedisStreamsClient, StreamEntry, StreamsRedis, createIoRedisConnection } from './streams';
import { StreamConsumer } from './stream-consumer';

// =============================================================================
// Configuration
// =============================================================================

export interface RedisStreamsBrokerOptions {
  logger: ILogger;
  /**
   * Consumer group created by declareQueue and read by consume. Producers
   * and consumers of one queue must use the same name.
   */
  groupName: string;
  /** Unique per process */
  consumerName: string;
  batchSize?: number;
  blockMs?: number;
  /** Connection factory; defaults to ioredis */
  createRedis?: (url: string) => StreamsRedis;
}

export const HEADERS_FIELD = 'headers';
export const BODY_FIELD = 'body';

// =============================================================================
// Entry Encoding
// =============================================================================

export function encodeEntry(headers: MessageHeaders, body: string): Record<string, string> {
  return { [HEADERS_FIELD]: JSON.stringify(headers), [BODY_FIELD]: body };
}

/**
 * Decode entry fields. Unreadable headers decode to an empty object so the
 * consumer sees the message as carrying no trace information.
 */
export function decodeEntry(queue: string, entry: StreamEntry, logger: ILogger): Delivery {
  const headers: MessageHeaders = {};
  const rawHeaders = entry.fields[HEADERS_FIELD];

  if (rawHeaders !== undefined) {
    try {
      const parsed: unknown = JSON.parse(rawHeaders);
      if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
        for (const [key, value] of Object.entries(parsed)) {
          if (typeof value === 'string') {
            headers[key] = value;
          }
        }
      }
    } catch (error) {
      logger.warn('Discarding unreadable message headers', {
        queue,
        messageId: entry.id,
        error: getErrorMessage(error),
      });
    }
  }

  return {
    id: entry.id,
    queue,
    headers,
    body: entry.fields[BODY_FIELD] ?? '',
  };
}

// =============================================================================
// Channel
// =============================================================================

export class RedisStreamsChannel implements BrokerChannel {
  private readonly consumers = new Map<string, StreamConsumer>();
  private nextTag = 1;
  private closed = false;

  constructor(
    private readonly client: RedisStreamsClient,
    private readonly options: RedisStreamsBrokerOptions
  ) {}

  async declareQueue(queue: string): Promise<void> {
    await this.client.createConsumerGroup({
      streamName: queue,
      groupName: this.options.groupName,
      consumerName: this.options.consumerName,
    });
  }

  async publish(queue: string, headers: MessageHeaders, body: string): Promise<string> {
    return this.client.xadd(queue, encodeEntry(headers, body));
  }

  async consume(queue: string, handler: DeliveryHandler): Promise<string> {
    const consumerTag = `${this.options.consumerName}-${this.nextTag++}`;
    const consumer = new StreamConsumer(this.client, {
      config: {
        streamName: queue,
        groupName: this.options.groupName,
        consumerName: this.options.consumerName,
      },
      handler: entry => handler(decodeEntry(queue, entry, this.options.logger)),
      logger: this.options.logger,
      batchSize: this.options.batchSize,
      blockMs: this.options.blockMs,
    });

    this.consumers.set(consumerTag, consumer);
    consumer.start();
    this.options.logger.info('Consumer registered', { queue, consumerTag });
    return consumerTag;
  }

  async cancel(consumerTag: string): Promise<void> {
    const consumer = this.consumers.get(consumerTag);
    if (!consumer) {
      return;
    }
    this.consumers.delete(consumerTag);
    await consumer.stop();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const consumerTag of [...this.consumers.keys()]) {
      await this.cancel(consumerTag);
    }
    this.client.disconnect();
  }
}

// =============================================================================
// Connection
// =============================================================================

export class RedisStreamsConnection implements BrokerConnection {
  private closed = false;

  constructor(
    readonly url: string,
    private readonly redis: StreamsRedis,
    private readonly options: RedisStreamsBrokerOptions
  ) {}

  /**
   * @throws ConnectionError when the channel's connection cannot be opened
   */
  async createChannel(): Promise<BrokerChannel> {
    const client = new RedisStreamsClient(this.redis.duplicate(), this.options.logger);
    try {
      await client.connect();
    } catch (error) {
      client.disconnect();
      throw new ConnectionError('Failed to open broker channel', {
        endpoint: this.url,
        cause: toError(error),
      });
    }
    return new RedisStreamsChannel(client, this.options);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      this.redis.disconnect();
    } catch (error) {
      throw new DisposalError('Failed to close broker connection', 'redis', { cause: toError(error) });
    }
  }
}

// =============================================================================
// Broker
// =============================================================================

/**
 * @example
 * ```typescript
 * const broker = new RedisStreamsBroker({ logger, groupName: 'queue:web:consumers', consumerName: 'worker-1' });
 * const connection = await broker.connect('redis://localhost:6379');
 * const channel = await connection.createChannel();
 * await channel.declareQueue('queue:web');
 * ```
 */
export class RedisStreamsBroker implements BrokerClient {
  private readonly createRedis: (url: string) => StreamsRedis;

  constructor(private readonly options: RedisStreamsBrokerOptions) {
    this.createRedis = options.createRedis ?? (url => createIoRedisConnection(url));
  }

  async connect(url: string): Promise<BrokerConnection> {
    const redis = this.createRedis(url);
    redis.on('error', (error: Error) => {
      this.options.logger.debug('Broker connection error', { error: error.message });
    });

    try {
      await redis.connect();
    } catch (error) {
      redis.disconnect();
      throw new ConnectionError('Failed to connect to broker', {
        endpoint: url,
        cause: toError(error),
      });
    }

    this.options.logger.info('Connected to broker', { host: brokerHost(url) });
    return new RedisStreamsConnection(url, redis, this.options);
  }
}
