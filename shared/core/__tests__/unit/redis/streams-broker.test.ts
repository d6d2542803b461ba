/**
 * Redis Streams Broker Tests
 *
 * Runs the broker against the in-process FakeStreamsRedis.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { FakeStreamsRedis, waitFor } from '@msgtrace/test-utils';
import {
  ConnectionError,
  RecordingLogger,
  RedisStreamsBroker,
  decodeEntry,
  encodeEntry,
  parseStreamReply,
} from '../../../src';
import type { BrokerChannel, BrokerConnection, Delivery } from '../../../src';

const BROKER_URL = 'redis://localhost:6379';
const QUEUE = 'queue:web';
const GROUP = 'queue:web:consumers';
const TRACEPARENT = '00-cd4262a7f7adf040bdd892959cf8c4fc-4a28d39ff0e725f2-01';

describe('Entry encoding', () => {
  it('should store headers as JSON next to the body', () => {
    expect(encodeEntry({ traceparent: TRACEPARENT }, '{"a":1}')).toEqual({
      headers: `{"traceparent":"${TRACEPARENT}"}`,
      body: '{"a":1}',
    });
  });

  it('should decode entries into deliveries', () => {
    const logger = new RecordingLogger();
    const delivery = decodeEntry(QUEUE, { id: '3-0', fields: encodeEntry({ traceparent: TRACEPARENT }, 'hello') }, logger);

    expect(delivery).toEqual({ id: '3-0', queue: QUEUE, headers: { traceparent: TRACEPARENT }, body: 'hello' });
  });

  it('should decode unreadable headers as empty', () => {
    const logger = new RecordingLogger();
    const delivery = decodeEntry(QUEUE, { id: '4-0', fields: { headers: '{not json', body: 'x' } }, logger);

    expect(delivery.headers).toEqual({});
    expect(logger.hasLogWithMeta('warn', { messageId: '4-0' })).toBe(true);
  });

  it('should drop non-string header values', () => {
    const delivery = decodeEntry(QUEUE, { id: '5-0', fields: { headers: '{"a":"1","b":2,"c":null}' } }, new RecordingLogger());

    expect(delivery.headers).toEqual({ a: '1' });
    expect(delivery.body).toBe('');
  });
});

describe('parseStreamReply', () => {
  it('should flatten stream replies', () => {
    const reply = [[QUEUE, [['1-0', ['body', 'a']], ['2-0', null]]]];

    expect(parseStreamReply(reply)).toEqual([
      { id: '1-0', fields: { body: 'a' } },
      { id: '2-0', fields: {} },
    ]);
  });

  it('should treat an empty read as no entries', () => {
    expect(parseStreamReply(null)).toEqual([]);
  });
});

describe('RedisStreamsBroker', () => {
  let redis: FakeStreamsRedis;
  let logger: RecordingLogger;
  let broker: RedisStreamsBroker;
  let connection: BrokerConnection | null;
  let channel: BrokerChannel | null;

  beforeEach(() => {
    redis = new FakeStreamsRedis();
    logger = new RecordingLogger();
    broker = new RedisStreamsBroker({
      logger,
      groupName: GROUP,
      consumerName: 'worker-1',
      createRedis: () => redis,
    });
    connection = null;
    channel = null;
  });

  afterEach(async () => {
    await channel?.close();
    await connection?.close();
  });

  it('should wrap connect failures in ConnectionError', async () => {
    redis.failConnect(1);

    const attempt = broker.connect(BROKER_URL);

    await expect(attempt).rejects.toThrow(ConnectionError);
    await expect(attempt).rejects.toThrow('Failed to connect to broker');
  });

  it('should open one Redis connection per channel', async () => {
    connection = await broker.connect(BROKER_URL);
    channel = await connection.createChannel();

    expect(redis.getConnectionCount()).toBe(2);
    expect(logger.hasLogWithMeta('info', { host: 'localhost:6379' })).toBe(true);
  });

  it('should declare queues idempotently', async () => {
    connection = await broker.connect(BROKER_URL);
    channel = await connection.createChannel();

    await channel.declareQueue(QUEUE);
    await channel.declareQueue(QUEUE);

    expect(redis.hasGroup(QUEUE, GROUP)).toBe(true);
    expect(redis.getCommands('XGROUP')[0].args).toEqual(['CREATE', QUEUE, GROUP, '0', 'MKSTREAM']);
    expect(logger.hasLogMatching('debug', 'Consumer group already exists')).toBe(true);
  });

  it('should publish with broker-assigned ids', async () => {
    connection = await broker.connect(BROKER_URL);
    channel = await connection.createChannel();
    await channel.declareQueue(QUEUE);

    await expect(channel.publish(QUEUE, { traceparent: TRACEPARENT }, 'first')).resolves.toBe('1-0');
    await expect(channel.publish(QUEUE, {}, 'second')).resolves.toBe('2-0');
    expect(redis.getStreamLength(QUEUE)).toBe(2);
  });

  it('should deliver published messages and acknowledge them', async () => {
    connection = await broker.connect(BROKER_URL);
    channel = await connection.createChannel();
    await channel.declareQueue(QUEUE);
    const deliveries: Delivery[] = [];

    const tag = await channel.consume(QUEUE, async delivery => {
      deliveries.push(delivery);
    });
    await channel.publish(QUEUE, { traceparent: TRACEPARENT }, 'payload');
    await waitFor(() => deliveries.length === 1);

    expect(tag).toBe('worker-1-1');
    expect(deliveries[0]).toEqual({ id: '1-0', queue: QUEUE, headers: { traceparent: TRACEPARENT }, body: 'payload' });
    expect(redis.getPendingCount(QUEUE, GROUP)).toBe(0);
  });

  it('should deliver messages published before any consumer attached', async () => {
    const producerBroker = new RedisStreamsBroker({
      logger,
      groupName: GROUP,
      consumerName: 'web-api-1',
      createRedis: () => redis,
    });
    const producerConnection = await producerBroker.connect(BROKER_URL);
    const producerChannel = await producerConnection.createChannel();
    await producerChannel.declareQueue(QUEUE);
    await producerChannel.publish(QUEUE, { traceparent: TRACEPARENT }, 'early-1');
    await producerChannel.publish(QUEUE, { traceparent: TRACEPARENT }, 'early-2');
    await producerChannel.close();
    await producerConnection.close();

    connection = await broker.connect(BROKER_URL);
    channel = await connection.createChannel();
    await channel.declareQueue(QUEUE);
    const bodies: string[] = [];
    await channel.consume(QUEUE, async delivery => {
      bodies.push(delivery.body);
    });
    await waitFor(() => bodies.length === 2);

    expect(bodies).toEqual(['early-1', 'early-2']);
    expect(redis.getPendingCount(QUEUE, GROUP)).toBe(0);
  });

  it('should deliver entries appended before the group was created', async () => {
    connection = await broker.connect(BROKER_URL);
    channel = await connection.createChannel();
    await channel.publish(QUEUE, {}, 'before-declare');

    await channel.declareQueue(QUEUE);
    const bodies: string[] = [];
    await channel.consume(QUEUE, async delivery => {
      bodies.push(delivery.body);
    });
    await waitFor(() => bodies.length === 1);

    expect(bodies).toEqual(['before-declare']);
  });

  it('should acknowledge messages whose handler fails', async () => {
    connection = await broker.connect(BROKER_URL);
    channel = await connection.createChannel();
    await channel.declareQueue(QUEUE);

    await channel.consume(QUEUE, async () => {
      throw new Error('handler failure');
    });
    await channel.publish(QUEUE, {}, 'payload');
    await waitFor(() => logger.hasLogMatching('error', 'Stream message handler failed'));

    expect(redis.getPendingCount(QUEUE, GROUP)).toBe(0);
    expect(redis.getCommands('XACK')).toHaveLength(1);
  });

  it('should stop reading after cancel', async () => {
    connection = await broker.connect(BROKER_URL);
    channel = await connection.createChannel();
    await channel.declareQueue(QUEUE);
    const tag = await channel.consume(QUEUE, async () => undefined);
    await waitFor(() => redis.getCommands('XREADGROUP').length > 0);

    await channel.cancel(tag);
    const reads = redis.getCommands('XREADGROUP').length;
    await new Promise(resolve => setTimeout(resolve, 30));

    expect(redis.getCommands('XREADGROUP')).toHaveLength(reads);
  });

  it('should disconnect channel and connection on close', async () => {
    connection = await broker.connect(BROKER_URL);
    channel = await connection.createChannel();

    await channel.close();
    await connection.close();
    await connection.close();

    expect(redis.getDisconnectCount()).toBe(2);
  });
});
