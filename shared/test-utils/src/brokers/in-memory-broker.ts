/**
 * In-Memory Broker
 *
 * In-process BrokerClient for unit tests. Queues hold published messages
 * until a consumer registers; deliveries are acknowledged when handed to a
 * handler, as the real broker does.
 *
 * Failures are injected per operation with failNext().
 */

import {
  BrokerChannel,
  BrokerClient,
  BrokerConnection,
  ConnectionError,
  Delivery,
  DeliveryHandler,
  MessageHeaders,
  getErrorMessage,
} from '@msgtrace/core';

export type BrokerOperation = 'connect' | 'createChannel' | 'declareQueue' | 'consume' | 'publish';

interface QueueState {
  published: Delivery[];
  backlog: Delivery[];
  acked: string[];
  consumers: Map<string, DeliveryHandler>;
  nextConsumer: number;
}

export interface HandlerFailure {
  deliveryId: string;
  error: string;
}

export class InMemoryBroker implements BrokerClient {
  private readonly queues = new Map<string, QueueState>();
  private readonly failures = new Map<BrokerOperation, Error[]>();
  private readonly pending = new Set<Promise<void>>();
  private readonly handlerFailures: HandlerFailure[] = [];
  private nextMessageId = 1;
  private nextConsumerTag = 1;
  private connectAttempts = 0;
  private openConnections = 0;
  private openChannels = 0;

  // ===========================================================================
  // Failure Injection
  // ===========================================================================

  /**
   * Make the next `times` calls of an operation fail.
   */
  failNext(operation: BrokerOperation, times = 1, error?: Error): void {
    const queue = this.failures.get(operation) ?? [];
    for (let i = 0; i < times; i++) {
      queue.push(error ?? this.defaultError(operation));
    }
    this.failures.set(operation, queue);
  }

  private takeFailure(operation: BrokerOperation): Error | undefined {
    return this.failures.get(operation)?.shift();
  }

  private defaultError(operation: BrokerOperation): Error {
    if (operation === 'connect' || operation === 'createChannel') {
      return new ConnectionError(`Injected ${operation} failure`, { endpoint: 'memory://broker' });
    }
    return new Error(`Injected ${operation} failure`);
  }

  // ===========================================================================
  // BrokerClient
  // ===========================================================================

  async connect(url: string): Promise<BrokerConnection> {
    this.connectAttempts++;
    const failure = this.takeFailure('connect');
    if (failure) {
      throw failure;
    }
    this.openConnections++;
    return new InMemoryConnection(url, this);
  }

  // ===========================================================================
  // Inspection
  // ===========================================================================

  getConnectAttempts(): number {
    return this.connectAttempts;
  }

  getOpenConnectionCount(): number {
    return this.openConnections;
  }

  getOpenChannelCount(): number {
    return this.openChannels;
  }

  getPublished(queue: string): Delivery[] {
    return [...(this.queues.get(queue)?.published ?? [])];
  }

  getAcked(queue: string): string[] {
    return [...(this.queues.get(queue)?.acked ?? [])];
  }

  getConsumerCount(queue: string): number {
    return this.queues.get(queue)?.consumers.size ?? 0;
  }

  hasQueue(queue: string): boolean {
    return this.queues.has(queue);
  }

  getHandlerFailures(): HandlerFailure[] {
    return [...this.handlerFailures];
  }

  /**
   * Publish from outside any channel, e.g. a message without headers.
   */
  inject(queue: string, headers: MessageHeaders, body: string): string {
    return this.enqueue(queue, headers, body);
  }

  /**
   * Resolve once every dispatched handler has settled.
   */
  async whenIdle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }

  // ===========================================================================
  // Channel Operations
  // ===========================================================================

  /** @internal */
  openChannel(): void {
    const failure = this.takeFailure('createChannel');
    if (failure) {
      throw failure;
    }
    this.openChannels++;
  }

  /** @internal */
  closeChannel(): void {
    this.openChannels--;
  }

  /** @internal */
  closeConnection(): void {
    this.openConnections--;
  }

  /** @internal */
  declare(queue: string): void {
    const failure = this.takeFailure('declareQueue');
    if (failure) {
      throw failure;
    }
    this.getQueue(queue);
  }

  /** @internal */
  publish(queue: string, headers: MessageHeaders, body: string): string {
    const failure = this.takeFailure('publish');
    if (failure) {
      throw failure;
    }
    return this.enqueue(queue, headers, body);
  }

  /** @internal */
  addConsumer(queue: string, handler: DeliveryHandler): string {
    const failure = this.takeFailure('consume');
    if (failure) {
      throw failure;
    }
    const state = this.getQueue(queue);
    const consumerTag = `memory-consumer-${this.nextConsumerTag++}`;
    state.consumers.set(consumerTag, handler);

    for (const delivery of state.backlog.splice(0)) {
      this.dispatch(state, delivery);
    }
    return consumerTag;
  }

  /** @internal */
  removeConsumer(consumerTag: string): void {
    for (const state of this.queues.values()) {
      state.consumers.delete(consumerTag);
    }
  }

  private getQueue(queue: string): QueueState {
    let state = this.queues.get(queue);
    if (!state) {
      state = { published: [], backlog: [], acked: [], consumers: new Map(), nextConsumer: 0 };
      this.queues.set(queue, state);
    }
    return state;
  }

  private enqueue(queue: string, headers: MessageHeaders, body: string): string {
    const state = this.getQueue(queue);
    const delivery: Delivery = {
      id: `${this.nextMessageId++}-0`,
      queue,
      headers: { ...headers },
      body,
    };
    state.published.push(delivery);

    if (state.consumers.size > 0) {
      this.dispatch(state, delivery);
    } else {
      state.backlog.push(delivery);
    }
    return delivery.id;
  }

  /**
   * Round-robin over registered consumers; ack before the handler runs.
   */
  private dispatch(state: QueueState, delivery: Delivery): void {
    const handlers = [...state.consumers.values()];
    const handler = handlers[state.nextConsumer % handlers.length];
    state.nextConsumer++;
    state.acked.push(delivery.id);

    const task: Promise<void> = Promise.resolve()
      .then(() => handler(delivery))
      .catch((error: unknown) => {
        this.handlerFailures.push({ deliveryId: delivery.id, error: getErrorMessage(error) });
      })
      .then(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }
}

class InMemoryConnection implements BrokerConnection {
  private closed = false;

  constructor(
    readonly url: string,
    private readonly broker: InMemoryBroker
  ) {}

  async createChannel(): Promise<BrokerChannel> {
    if (this.closed) {
      throw new ConnectionError('Connection is closed', { endpoint: this.url });
    }
    this.broker.openChannel();
    return new InMemoryChannel(this.broker);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.broker.closeConnection();
  }
}

class InMemoryChannel implements BrokerChannel {
  private readonly consumerTags = new Set<string>();
  private closed = false;

  constructor(private readonly broker: InMemoryBroker) {}

  async declareQueue(queue: string): Promise<void> {
    this.broker.declare(queue);
  }

  async publish(queue: string, headers: MessageHeaders, body: string): Promise<string> {
    return this.broker.publish(queue, headers, body);
  }

  async consume(queue: string, handler: DeliveryHandler): Promise<string> {
    const consumerTag = this.broker.addConsumer(queue, handler);
    this.consumerTags.add(consumerTag);
    return consumerTag;
  }

  async cancel(consumerTag: string): Promise<void> {
    this.consumerTags.delete(consumerTag);
    this.broker.removeConsumer(consumerTag);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const consumerTag of this.consumerTags) {
      this.broker.removeConsumer(consumerTag);
    }
    this.consumerTags.clear();
    this.broker.closeChannel();
  }
}
