/**
 * Metrics Collector Contract
 *
 * @package @msgtrace/metrics
 * @module metrics/domain
 */

export enum MetricType {
  COUNTER = 'counter',
  GAUGE = 'gauge',
}

export type MetricLabels = Readonly<Record<string, string>>;

export interface MetricDefinition {
  name: string;
  type: MetricType;
  /** HELP text */
  help: string;
}

/**
 * Current value of one (name, labels) series.
 */
export interface MetricSnapshot {
  readonly name: string;
  readonly type: MetricType;
  readonly value: number;
  readonly labels: MetricLabels;
  /** Unix ms of the last update */
  readonly timestamp: number;
  readonly help?: string;
}

export interface CollectorStats {
  metricsCount: number;
  seriesCount: number;
  totalObservations: number;
}

export interface IMetricsCollector {
  defineMetric(definition: MetricDefinition): void;
  incrementCounter(name: string, labels?: MetricLabels, delta?: number): void;
  setGauge(name: string, value: number, labels?: MetricLabels): void;
  getSnapshot(): MetricSnapshot[];
  /** Value of one series, undefined when never recorded */
  getValue(name: string, labels?: MetricLabels): number | undefined;
  reset(): void;
  getStats(): CollectorStats;
}
