/**
 * Web API Types
 */

import type { ILogger, PublishOptions, PublishResult, Tracer } from '@msgtrace/core';
import type { IMetricsCollector, PrometheusExporter } from '@msgtrace/metrics';

/**
 * Publishing surface of the queue producer used by the routes.
 */
export interface MessagePublisher {
  publish(message: string | object, options?: PublishOptions): Promise<PublishResult>;
}

export interface HealthStateProvider {
  getIsRunning(): boolean;
}

export interface WebApiDependencies {
  serviceName: string;
  publisher: MessagePublisher;
  tracer: Tracer;
  metrics: IMetricsCollector;
  exporter: PrometheusExporter;
  logger: ILogger;
  health: HealthStateProvider;
}
