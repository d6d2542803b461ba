/**
 * Queue Processor Service
 *
 * Consumes the web queue with trace correlation and exposes health and
 * metrics over HTTP.
 */

import type { Server } from 'http';
import {
  BrokerClient,
  CompositeErrorReporter,
  ConsumerState,
  ConsumerStats,
  ILogger,
  LoggingErrorReporter,
  RedisStreamsBroker,
  Telemetry,
  TracedQueueConsumer,
  closeServer,
  setupTelemetry,
} from '@msgtrace/core';
import type { MissingContextPolicy } from '@msgtrace/core';
import type { AppConfig } from '@msgtrace/config';
import { InMemoryMetricsCollector, MetricType, PrometheusExporter } from '@msgtrace/metrics';
import { MetricNames } from '@msgtrace/types';
import type { Express } from 'express';
import { createProcessorApp } from './api';
import { FailureMetricsReporter } from './failure-metrics-reporter';
import { createTimeApiProcessor } from './time-api-processor';

export interface QueueProcessorServiceOptions {
  config: AppConfig;
  logger: ILogger;
  broker?: BrokerClient;
  /** Used for the time API and the span exporters */
  fetchImpl?: typeof fetch;
  missingContextPolicy?: MissingContextPolicy;
}

export class QueueProcessorService {
  private readonly config: AppConfig;
  private readonly logger: ILogger;
  private readonly broker: BrokerClient;
  private readonly metrics = new InMemoryMetricsCollector();
  private readonly exporter: PrometheusExporter;
  private readonly telemetry: Telemetry;
  private readonly consumer: TracedQueueConsumer;
  private readonly app: Express;
  private server: Server | null = null;

  constructor(options: QueueProcessorServiceOptions) {
    const { config, logger } = options;
    this.config = config;
    this.logger = logger;
    this.broker = options.broker ?? new RedisStreamsBroker({
      logger: logger.child({ component: 'broker' }),
      groupName: config.consumerGroup,
      consumerName: `${config.serviceName}-${process.pid}`,
    });

    this.metrics.defineMetric({
      name: MetricNames.PROCESSED_ITEM,
      type: MetricType.COUNTER,
      help: 'Messages processed per queue',
    });
    this.metrics.defineMetric({
      name: MetricNames.PROCESSING_FAILED,
      type: MetricType.COUNTER,
      help: 'Messages that failed processing per queue',
    });
    this.exporter = new PrometheusExporter(this.metrics, { includeTimestamps: true });

    this.telemetry = setupTelemetry({
      serviceName: config.serviceName,
      logger,
      enabled: config.tracing.enabled,
      otlpEndpoint: config.tracing.otlpEndpoint,
      zipkinUrl: config.tracing.zipkinUrl,
      logSpans: config.tracing.logSpans,
      fetchImpl: options.fetchImpl,
    });

    this.consumer = new TracedQueueConsumer({
      broker: this.broker,
      brokerUrl: config.redisUrl,
      queue: config.queueName,
      tracer: this.telemetry.tracer,
      logger,
      retryDelayMs: config.consumerRetryDelayMs,
      missingContextPolicy: options.missingContextPolicy,
      processor: createTimeApiProcessor({
        apiUrl: config.apiUrl,
        tracer: this.telemetry.tracer,
        metrics: this.metrics,
        fetchImpl: options.fetchImpl,
      }),
      errorReporter: new CompositeErrorReporter([
        new LoggingErrorReporter(logger.child({ component: 'errors' })),
        new FailureMetricsReporter(this.metrics, config.queueName),
      ], logger),
    });

    this.app = createProcessorApp(config.serviceName, {
      getConsumerStats: () => this.consumer.getStats(),
    }, this.exporter);
  }

  /**
   * Bind the HTTP port and start consuming. Resolves once consuming, or
   * with DISCONNECTED when `signal` aborts first.
   */
  start(signal?: AbortSignal, listen = true): Promise<ConsumerState> {
    if (listen && !this.server) {
      const port = this.config.metricsPort;
      this.server = this.app.listen(port, () => {
        this.logger.info(`${this.config.serviceName} health server listening`, { port });
      });
    }
    return this.consumer.start(signal);
  }

  getApp(): Express {
    return this.app;
  }

  getConsumerStats(): ConsumerStats {
    return this.consumer.getStats();
  }

  getMetrics(): InMemoryMetricsCollector {
    return this.metrics;
  }

  /**
   * Stop consuming (waiting for in-flight messages until `signal` aborts),
   * flush spans and close the HTTP server.
   */
  async stop(signal?: AbortSignal): Promise<void> {
    await this.consumer.stop(signal);
    await this.telemetry.shutdown();
    await closeServer(this.server);
    this.server = null;
    this.logger.info(`${this.config.serviceName} stopped`);
  }
}
