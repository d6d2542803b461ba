/**
 * Broker capability contract.
 *
 * The producer and consumer depend only on these interfaces; the Redis
 * Streams implementation lives in ../redis and tests use an in-process
 * broker.
 */

import type { MessageHeaders } from '../tracing/trace-context';

export interface Delivery {
  /** Broker-assigned message id */
  readonly id: string;
  readonly queue: string;
  readonly headers: MessageHeaders;
  readonly body: string;
}

export type DeliveryHandler = (delivery: Delivery) => Promise<void>;

export interface BrokerChannel {
  /** Create the queue if it does not exist. Idempotent. */
  declareQueue(queue: string): Promise<void>;

  /**
   * @returns Broker-assigned message id
   */
  publish(queue: string, headers: MessageHeaders, body: string): Promise<string>;

  /**
   * Register a handler. Deliveries are acknowledged when they are handed to
   * the handler, not when it completes.
   *
   * @returns Consumer tag for cancel()
   */
  consume(queue: string, handler: DeliveryHandler): Promise<string>;

  cancel(consumerTag: string): Promise<void>;

  close(): Promise<void>;
}

export interface BrokerConnection {
  readonly url: string;
  createChannel(): Promise<BrokerChannel>;
  close(): Promise<void>;
}

export interface BrokerClient {
  /**
   * @throws ConnectionError when the broker is unreachable
   */
  connect(url: string): Promise<BrokerConnection>;
}

/**
 * Host part of a broker URL for logs and span tags.
 */
export function brokerHost(url: string): string {
  try {
    return new URL(url).host || url;
  } catch {
    return url;
  }
}
