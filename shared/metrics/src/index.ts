/**
 * @msgtrace/metrics - Metrics Collection and Export
 *
 * Counters and gauges with Prometheus text and JSON exposition.
 *
 * @package @msgtrace/metrics
 */

// Domain Layer
export * from './domain';

// Infrastructure Layer
export * from './infrastructure';
