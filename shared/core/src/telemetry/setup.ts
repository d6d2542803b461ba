/**
 * Telemetry Setup
 *
 * Builds the diagnostic registry, the tracer and (when tracing is enabled)
 * a collector wired to every configured span sink. Services call this once
 * at startup and the returned shutdown() once at exit.
 */

import { BROKER_DIAGNOSTIC_SOURCE } from '@msgtrace/types';
import type { ILogger } from '../logging/types';
import { ConfigurationError } from '../errors/error-handling';
import { Collector } from '../tracing/collector';
import { DiagnosticRegistry } from '../tracing/diagnostic-source';
import { SpanExportPipeline } from '../tracing/span-export';
import { Tracer } from '../tracing/tracer';
import type { FetchFn } from '../tracing/exporters/http-export';
import { LoggingSpanExporter } from '../tracing/exporters/logging-span-exporter';
import { OtlpSpanExporter } from '../tracing/exporters/otlp-span-exporter';
import type { SpanExporter } from '../tracing/exporters/types';
import { ZipkinSpanExporter } from '../tracing/exporters/zipkin-span-exporter';

export interface TelemetryOptions {
  serviceName: string;
  logger: ILogger;
  /** When false spans are still created and propagated but never exported */
  enabled: boolean;
  otlpEndpoint?: string;
  zipkinUrl?: string;
  /** Write finished spans to the logger */
  logSpans?: boolean;
  /** Sinks added on top of the configured ones */
  exporters?: ReadonlyArray<SpanExporter>;
  /** Diagnostic sources the collector listens to (default: the broker source) */
  sourceNames?: ReadonlyArray<string>;
  fetchImpl?: FetchFn;
}

export interface Telemetry {
  readonly registry: DiagnosticRegistry;
  readonly tracer: Tracer;
  /** Null when tracing is disabled */
  readonly collector: Collector | null;
  /** Flush pending exports and release subscriptions. Idempotent. */
  shutdown(): Promise<void>;
}

export const NO_TRACING_SINK_MESSAGE = 'No sink for tracing was configured';

export function createSpanExporters(options: TelemetryOptions): SpanExporter[] {
  const exporters: SpanExporter[] = [];

  if (options.otlpEndpoint) {
    exporters.push(new OtlpSpanExporter({
      endpoint: options.otlpEndpoint,
      serviceName: options.serviceName,
      fetchImpl: options.fetchImpl,
    }));
  }
  if (options.zipkinUrl) {
    exporters.push(new ZipkinSpanExporter({
      url: options.zipkinUrl,
      serviceName: options.serviceName,
      fetchImpl: options.fetchImpl,
    }));
  }
  if (options.logSpans) {
    exporters.push(new LoggingSpanExporter(options.logger.child({ component: 'spans' })));
  }
  exporters.push(...(options.exporters ?? []));

  return exporters;
}

/**
 * @throws ConfigurationError when tracing is enabled without any sink
 */
export function setupTelemetry(options: TelemetryOptions): Telemetry {
  const { logger, serviceName } = options;
  const registry = new DiagnosticRegistry(logger);

  if (!options.enabled) {
    const pipeline = new SpanExportPipeline([], logger);
    logger.info('Tracing disabled', { serviceName });
    return {
      registry,
      tracer: new Tracer(serviceName, pipeline, logger),
      collector: null,
      shutdown: () => pipeline.shutdown(),
    };
  }

  const exporters = createSpanExporters(options);
  if (exporters.length === 0) {
    throw new ConfigurationError(NO_TRACING_SINK_MESSAGE, [
      'Set OTEL_EXPORTER_ENDPOINT, ZIPKIN_URL or LOG_SPANS, or disable USE_OPENTELEMETRY',
    ]);
  }

  const collector = new Collector({ name: serviceName, registry, exporters, logger });
  for (const sourceName of options.sourceNames ?? [BROKER_DIAGNOSTIC_SOURCE]) {
    collector.subscribe(sourceName);
  }

  logger.info('Tracing enabled', {
    serviceName,
    exporters: exporters.map(exporter => exporter.name),
  });

  return {
    registry,
    tracer: new Tracer(serviceName, collector.getPipeline(), logger),
    collector,
    shutdown: () => collector.dispose(),
  };
}
