/**
 * Stream Consumer
 *
 * Polling loop over a consumer group: read a batch, acknowledge it, hand
 * every entry to the handler. Acknowledgment happens at delivery time, so a
 * failing handler never causes redelivery.
 *
 * Handlers run concurrently; at most `maxInFlight` are pending before the
 * loop waits for one to settle. stop() ends the loop and waits for the
 * current read, not for running handlers.
 */

import type { ILogger } from '../logging/types';
import { clearTimeoutSafe } from '../async/lifecycle-utils';
import { getErrorMessage } from '../errors/error-handling';
import type { ConsumerGroupConfig, RedisStreamsClient, StreamEntry } from './streams';

// =============================================================================
// Types
// =============================================================================

export interface StreamConsumerConfig {
  config: ConsumerGroupConfig;
  handler: (entry: StreamEntry) => Promise<void>;
  logger: ILogger;
  /** Entries fetched per read (default: 10) */
  batchSize?: number;
  /** Block time in ms (default: 1000) */
  blockMs?: number;
  /** Pending handler limit (default: batchSize) */
  maxInFlight?: number;
  /** Delay between reads in ms (default: 10) */
  interPollDelayMs?: number;
}

export interface StreamConsumerStats {
  messagesDelivered: number;
  messagesFailed: number;
  lastDeliveredAt: number | null;
  isRunning: boolean;
  inFlight: number;
}

// =============================================================================
// StreamConsumer
// =============================================================================

export class StreamConsumer {
  private static readonly MAX_ERROR_BACKOFF_MS = 30_000;
  private static readonly BASE_ERROR_DELAY_MS = 100;

  private readonly batchSize: number;
  private readonly blockMs: number;
  private readonly maxInFlight: number;
  private readonly interPollDelayMs: number;
  private running = false;
  private pollTimer: NodeJS.Timeout | null = null;
  private pollPromise: Promise<void> | null = null;
  private consecutiveErrors = 0;
  private readonly inFlight = new Set<Promise<void>>();
  private stats: Omit<StreamConsumerStats, 'isRunning' | 'inFlight'> = {
    messagesDelivered: 0,
    messagesFailed: 0,
    lastDeliveredAt: null,
  };

  constructor(
    private readonly client: RedisStreamsClient,
    private readonly config: StreamConsumerConfig
  ) {
    this.batchSize = config.batchSize ?? 10;
    this.blockMs = config.blockMs ?? 1000;
    this.maxInFlight = config.maxInFlight ?? this.batchSize;
    this.interPollDelayMs = config.interPollDelayMs ?? 10;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedulePoll();
  }

  /**
   * Stop polling. Waits for the in-flight read to finish.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.pollTimer = clearTimeoutSafe(this.pollTimer);
    if (this.pollPromise) {
      await this.pollPromise;
      this.pollPromise = null;
    }
  }

  getStats(): StreamConsumerStats {
    return {
      ...this.stats,
      isRunning: this.running,
      inFlight: this.inFlight.size,
    };
  }

  private schedulePoll(): void {
    this.pollTimer = null;
    this.pollPromise = this.poll();
  }

  private dispatch(entry: StreamEntry): void {
    const task: Promise<void> = Promise.resolve()
      .then(() => this.config.handler(entry))
      .catch((error: unknown) => {
        this.stats.messagesFailed++;
        this.config.logger.error('Stream message handler failed', {
          error: getErrorMessage(error),
          stream: this.config.config.streamName,
          messageId: entry.id,
        });
      })
      .then(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private async poll(): Promise<void> {
    if (!this.running) return;

    let pollSucceeded = false;
    try {
      while (this.inFlight.size >= this.maxInFlight) {
        await Promise.race(this.inFlight);
      }

      const entries = await this.client.xreadgroup(this.config.config, {
        count: this.batchSize,
        block: this.blockMs,
        startId: '>',
      });
      pollSucceeded = true;
      this.consecutiveErrors = 0;

      if (entries.length > 0) {
        await this.client.xack(
          this.config.config.streamName,
          this.config.config.groupName,
          ...entries.map(entry => entry.id)
        );
      }

      for (const entry of entries) {
        this.stats.messagesDelivered++;
        this.stats.lastDeliveredAt = Date.now();
        this.dispatch(entry);
      }
    } catch (error) {
      const errorMessage = getErrorMessage(error);
      if (errorMessage.includes('timeout')) {
        pollSucceeded = true;
        this.consecutiveErrors = 0;
      } else {
        this.consecutiveErrors++;
        this.config.logger.error('Error consuming stream', {
          error: errorMessage,
          stream: this.config.config.streamName,
          consecutiveErrors: this.consecutiveErrors,
        });
      }
    }

    if (this.running) {
      const delay = !pollSucceeded && this.consecutiveErrors > 0
        ? Math.min(
          StreamConsumer.BASE_ERROR_DELAY_MS * Math.pow(2, this.consecutiveErrors - 1),
          StreamConsumer.MAX_ERROR_BACKOFF_MS
        )
        : this.interPollDelayMs;
      this.pollTimer = setTimeout(() => this.schedulePoll(), delay);
    }
  }
}
