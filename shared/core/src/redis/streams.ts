/**
 * Redis Streams Client
 *
 * Thin typed layer over the stream commands used by the broker:
 * - XADD for publishing with automatic ID generation
 * - XGROUP CREATE ... MKSTREAM for queue declaration
 * - XREADGROUP / XACK for consumer-group delivery
 *
 * @see https://redis.io/docs/data-types/streams/
 */

import Redis, { RedisOptions } from 'ioredis';
import type { ILogger } from '../logging/types';
import { ErrorCode, MsgtraceError, getErrorMessage } from '../errors/error-handling';

// =============================================================================
// Connection Abstraction
// =============================================================================

/**
 * The command surface the client needs from a Redis connection. Production
 * code wraps ioredis; tests inject an in-process fake.
 */
export interface StreamsRedis {
  connect(): Promise<void>;
  sendCommand(command: string, args: Array<string | number>): Promise<unknown>;
  /** New connection with the same options */
  duplicate(): StreamsRedis;
  disconnect(): void;
  on(event: 'error', listener: (error: Error) => void): void;
}

/** Reconnect attempts before ioredis gives up on a dropped connection */
const MAX_RECONNECT_ATTEMPTS = 3;

/** Upper bound for an XREADGROUP BLOCK */
const MAX_BLOCK_MS = 30000;

class IoRedisStreamsConnection implements StreamsRedis {
  constructor(private readonly redis: Redis) {}

  async connect(): Promise<void> {
    await this.redis.connect();
  }

  sendCommand(command: string, args: Array<string | number>): Promise<unknown> {
    return this.redis.call(command, args);
  }

  duplicate(): StreamsRedis {
    return new IoRedisStreamsConnection(this.redis.duplicate());
  }

  disconnect(): void {
    this.redis.disconnect();
  }

  on(event: 'error', listener: (error: Error) => void): void {
    this.redis.on(event, listener);
  }
}

/**
 * Create a lazily connecting ioredis connection.
 */
export function createIoRedisConnection(url: string): StreamsRedis {
  const options: RedisOptions = {
    retryStrategy: (times: number) => {
      if (times > MAX_RECONNECT_ATTEMPTS) {
        return null;
      }
      return Math.min(times * 100, 3000);
    },
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  };

  return new IoRedisStreamsConnection(new Redis(url, options));
}

// =============================================================================
// Types
// =============================================================================

export interface StreamEntry {
  id: string;
  fields: Record<string, string>;
}

export interface ConsumerGroupConfig {
  streamName: string;
  groupName: string;
  consumerName: string;
  /**
   * Default '0': the group starts at the head of the stream, so entries
   * published before it existed are still delivered. '$' skips them.
   */
  startId?: string;
}

export interface XReadGroupOptions {
  count?: number;
  /** Milliseconds to block; 0 or anything above 30s blocks for 30s */
  block?: number;
  /** '>' for new messages, '0' for pending */
  startId?: string;
}

const STREAM_NAME_PATTERN = /^[a-zA-Z0-9\-_:.]+$/;

// =============================================================================
// Reply Parsing
// =============================================================================

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function toFields(raw: string[]): Record<string, string> {
  const fields: Record<string, string> = {};
  for (let i = 0; i + 1 < raw.length; i += 2) {
    fields[raw[i]] = raw[i + 1];
  }
  return fields;
}

/**
 * Parse an XREADGROUP reply: [[streamName, [[id, [field, value, ...]], ...]], ...]
 */
export function parseStreamReply(reply: unknown): StreamEntry[] {
  const entries: StreamEntry[] = [];
  if (!Array.isArray(reply)) {
    return entries;
  }

  for (const stream of reply) {
    if (!Array.isArray(stream) || !Array.isArray(stream[1])) continue;

    for (const entry of stream[1]) {
      if (!Array.isArray(entry) || typeof entry[0] !== 'string') continue;
      // Entries deleted after delivery come back with null fields
      const rawFields: unknown = entry[1];
      entries.push({ id: entry[0], fields: isStringArray(rawFields) ? toFields(rawFields) : {} });
    }
  }
  return entries;
}

// =============================================================================
// RedisStreamsClient
// =============================================================================

export class RedisStreamsClient {
  constructor(
    private readonly redis: StreamsRedis,
    private readonly logger: ILogger
  ) {
    this.redis.on('error', (error: Error) => {
      this.logger.error('Redis Streams client error', { error: error.message });
    });
  }

  async connect(): Promise<void> {
    await this.redis.connect();
  }

  /**
   * Append an entry.
   *
   * @returns Entry id assigned by Redis
   */
  async xadd(streamName: string, fields: Record<string, string>): Promise<string> {
    this.validateStreamName(streamName);

    const args: Array<string | number> = [streamName, '*'];
    for (const [key, value] of Object.entries(fields)) {
      args.push(key, value);
    }

    const id = await this.redis.sendCommand('XADD', args);
    if (typeof id !== 'string') {
      throw new MsgtraceError('XADD returned no entry id', ErrorCode.BROKER_STREAM_ERROR, {
        context: { stream: streamName },
      });
    }
    return id;
  }

  /**
   * Create the consumer group (and the stream). An existing group is kept.
   */
  async createConsumerGroup(config: ConsumerGroupConfig): Promise<void> {
    this.validateStreamName(config.streamName);
    try {
      await this.redis.sendCommand('XGROUP', [
        'CREATE',
        config.streamName,
        config.groupName,
        config.startId ?? '0',
        'MKSTREAM',
      ]);
      this.logger.info('Consumer group created', {
        stream: config.streamName,
        group: config.groupName,
      });
    } catch (error) {
      if (getErrorMessage(error).includes('BUSYGROUP')) {
        this.logger.debug('Consumer group already exists', {
          stream: config.streamName,
          group: config.groupName,
        });
        return;
      }
      throw error;
    }
  }

  async xreadgroup(config: ConsumerGroupConfig, options: XReadGroupOptions = {}): Promise<StreamEntry[]> {
    const args: Array<string | number> = ['GROUP', config.groupName, config.consumerName];

    if (options.count) {
      args.push('COUNT', options.count);
    }
    if (options.block !== undefined) {
      const block = options.block === 0 || options.block > MAX_BLOCK_MS ? MAX_BLOCK_MS : options.block;
      args.push('BLOCK', block);
    }
    args.push('STREAMS', config.streamName, options.startId ?? '>');

    const reply = await this.redis.sendCommand('XREADGROUP', args);
    return parseStreamReply(reply);
  }

  async xack(streamName: string, groupName: string, ...ids: string[]): Promise<number> {
    if (ids.length === 0) {
      return 0;
    }
    const acked = await this.redis.sendCommand('XACK', [streamName, groupName, ...ids]);
    return typeof acked === 'number' ? acked : 0;
  }

  disconnect(): void {
    this.redis.disconnect();
    this.logger.debug('Redis Streams client disconnected');
  }

  private validateStreamName(streamName: string): void {
    if (!streamName || !STREAM_NAME_PATTERN.test(streamName)) {
      throw new MsgtraceError(`Invalid stream name: ${streamName}`, ErrorCode.INVALID_ARGUMENT);
    }
  }
}
