/**
 * Metrics Infrastructure Layer
 *
 * @package @msgtrace/metrics
 * @module metrics/infrastructure
 */

export * from './in-memory-metrics-collector.impl';
export * from './prometheus-exporter.impl';
