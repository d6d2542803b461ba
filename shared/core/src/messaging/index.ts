/**
 * Messaging Module
 *
 * Broker contract plus the trace-propagating producer and consumer.
 */

export { brokerHost } from './types';
export type { BrokerClient, BrokerConnection, BrokerChannel, Delivery, DeliveryHandler } from './types';

export { TracedQueueProducer } from './producer';
export type {
  TracedQueueProducerOptions,
  ConnectProducerOptions,
  PublishOptions,
  PublishResult,
} from './producer';

export { TracedQueueConsumer, ConsumerState, DEFAULT_RETRY_DELAY_MS } from './consumer';
export type {
  TracedQueueConsumerOptions,
  ConsumerStateChange,
  ConsumerStats,
  ProcessingContext,
  MessageProcessor,
  MissingContextPolicy,
} from './consumer';

export { LoggingErrorReporter, CompositeErrorReporter } from './error-reporter';
export type { ErrorReporter } from './error-reporter';
