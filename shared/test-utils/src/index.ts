/**
 * @msgtrace/test-utils
 *
 * In-process stand-ins for the broker and Redis, plus async test helpers.
 */

export { InMemoryBroker } from './brokers/in-memory-broker';
export type { BrokerOperation, HandlerFailure } from './brokers/in-memory-broker';

export { FakeStreamsRedis, FakeRedisStore } from './redis/fake-streams-redis';
export type { RedisCommandRecord } from './redis/fake-streams-redis';

export { waitFor, flushPromises } from './helpers/async-helpers';
