/**
 * Redis Streams broker implementation.
 */

export {
  RedisStreamsClient,
  createIoRedisConnection,
  parseStreamReply,
} from './streams';
export type {
  StreamsRedis,
  StreamEntry,
  ConsumerGroupConfig,
  XReadGroupOptions,
} from './streams';

export { StreamConsumer } from './stream-consumer';
export type { StreamConsumerConfig, StreamConsumerStats } from './stream-consumer';

export {
  RedisStreamsBroker,
  RedisStreamsConnection,
  RedisStreamsChannel,
  encodeEntry,
  decodeEntry,
  HEADERS_FIELD,
  BODY_FIELD,
} from './streams-broker';
export type { RedisStreamsBrokerOptions } from './streams-broker';
