/**
 * Web API Service
 *
 * Owns the telemetry setup, the queue producer and the HTTP server.
 */

import type { Server } from 'http';
import {
  BrokerClient,
  ILogger,
  RedisStreamsBroker,
  Telemetry,
  TracedQueueProducer,
  closeServer,
  gracefulShutdown,
  setupTelemetry,
} from '@msgtrace/core';
import type { AppConfig } from '@msgtrace/config';
import { InMemoryMetricsCollector, MetricType, PrometheusExporter } from '@msgtrace/metrics';
import { MetricNames } from '@msgtrace/types';
import type { Express } from 'express';
import { createApp } from './api';

export interface WebApiServiceOptions {
  config: AppConfig;
  logger: ILogger;
  /** Defaults to the Redis Streams broker */
  broker?: BrokerClient;
  /** Injected into the span exporters */
  fetchImpl?: typeof fetch;
}

export class WebApiService {
  private readonly config: AppConfig;
  private readonly logger: ILogger;
  private readonly broker: BrokerClient;
  private readonly metrics = new InMemoryMetricsCollector();
  private readonly exporter: PrometheusExporter;
  private telemetry: Telemetry | null = null;
  private producer: TracedQueueProducer | null = null;
  private server: Server | null = null;
  private running = false;

  constructor(private readonly options: WebApiServiceOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.broker = options.broker ?? new RedisStreamsBroker({
      logger: options.logger.child({ component: 'broker' }),
      groupName: options.config.consumerGroup,
      consumerName: `${options.config.serviceName}-${process.pid}`,
    });
    this.exporter = new PrometheusExporter(this.metrics, { includeTimestamps: true });
    this.metrics.defineMetric({
      name: MetricNames.ENQUEUED_ITEM,
      type: MetricType.COUNTER,
      help: 'Items enqueued per source',
    });
  }

  /**
   * Set up telemetry and the producer, and build the HTTP app.
   *
   * @param listen - Bind the HTTP port (tests drive the app directly)
   */
  async start(listen = true): Promise<Express> {
    const telemetry = setupTelemetry({
      serviceName: this.config.serviceName,
      logger: this.logger,
      enabled: this.config.tracing.enabled,
      otlpEndpoint: this.config.tracing.otlpEndpoint,
      zipkinUrl: this.config.tracing.zipkinUrl,
      logSpans: this.config.tracing.logSpans,
      fetchImpl: this.options.fetchImpl,
    });
    this.telemetry = telemetry;

    this.producer = await TracedQueueProducer.connect(this.broker, {
      brokerUrl: this.config.redisUrl,
      queue: this.config.queueName,
      registry: telemetry.registry,
      logger: this.logger.child({ component: 'producer' }),
    });

    const app = createApp({
      serviceName: this.config.serviceName,
      publisher: this.producer,
      tracer: telemetry.tracer,
      metrics: this.metrics,
      exporter: this.exporter,
      logger: this.logger,
      health: { getIsRunning: () => this.running },
    });
    this.running = true;

    if (listen) {
      const port = this.config.port;
      this.server = app.listen(port, () => {
        this.logger.info(`${this.config.serviceName} listening`, { port, queue: this.config.queueName });
      });
    }
    return app;
  }

  getMetrics(): InMemoryMetricsCollector {
    return this.metrics;
  }

  /**
   * Close the HTTP server, the producer and telemetry in that order, each
   * bounded by `timeoutMs`.
   */
  async stop(timeoutMs = 5000): Promise<void> {
    this.running = false;
    const server = this.server;
    const producer = this.producer;
    const telemetry = this.telemetry;
    this.server = null;
    this.producer = null;
    this.telemetry = null;

    await gracefulShutdown([
      { name: 'http server', cleanup: () => closeServer(server, timeoutMs) },
      { name: 'producer', cleanup: async () => { await producer?.dispose(); } },
      { name: 'telemetry', cleanup: async () => { await telemetry?.shutdown(); } },
    ], timeoutMs, this.logger);
    this.logger.info(`${this.config.serviceName} stopped`);
  }
}
