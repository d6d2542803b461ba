/**
 * InMemoryMetricsCollector - Infrastructure Layer
 *
 * Counters and gauges keyed by name + labels, read back by the exporter on
 * every scrape.
 *
 * @package @msgtrace/metrics
 * @module metrics/infrastructure
 */

import {
  CollectorStats,
  IMetricsCollector,
  MetricDefinition,
  MetricLabels,
  MetricSnapshot,
  MetricType,
} from '../domain/metrics-collector.interface';
import { MetricValue } from '../domain/models';

interface Series {
  name: string;
  type: MetricType;
  labels: MetricLabels;
  value: number;
  timestamp: number;
}

function seriesKey(name: string, labels: MetricLabels): string {
  const sorted = Object.keys(labels).sort().map(key => [key, labels[key]]);
  return `${name}|${JSON.stringify(sorted)}`;
}

export class InMemoryMetricsCollector implements IMetricsCollector {
  private readonly definitions = new Map<string, MetricDefinition>();
  private readonly series = new Map<string, Series>();
  private totalObservations = 0;

  constructor(private readonly clock: () => number = Date.now) {}

  defineMetric(definition: MetricDefinition): void {
    const existing = this.definitions.get(definition.name);
    if (existing && existing.type !== definition.type) {
      throw new Error(
        `Metric ${definition.name} already defined as ${existing.type}, cannot redefine as ${definition.type}`
      );
    }
    this.definitions.set(definition.name, definition);
  }

  /**
   * Counters only go up; a negative delta is rejected.
   */
  incrementCounter(name: string, labels: MetricLabels = {}, delta = 1): void {
    if (delta < 0) {
      throw new Error(`Counter ${name} cannot be decremented (delta ${delta})`);
    }
    const series = this.getOrCreateSeries(name, MetricType.COUNTER, labels);
    series.value += delta;
    series.timestamp = this.clock();
    this.totalObservations++;
  }

  setGauge(name: string, value: number, labels: MetricLabels = {}): void {
    const series = this.getOrCreateSeries(name, MetricType.GAUGE, labels);
    series.value = value;
    series.timestamp = this.clock();
    this.totalObservations++;
  }

  getSnapshot(): MetricSnapshot[] {
    return [...this.series.values()].map(series => {
      const help = this.definitions.get(series.name)?.help;
      return series.type === MetricType.COUNTER
        ? MetricValue.counter(series.name, series.value, series.labels, series.timestamp, help)
        : MetricValue.gauge(series.name, series.value, series.labels, series.timestamp, help);
    });
  }

  getValue(name: string, labels: MetricLabels = {}): number | undefined {
    return this.series.get(seriesKey(name, labels))?.value;
  }

  reset(): void {
    this.series.clear();
    this.totalObservations = 0;
  }

  getStats(): CollectorStats {
    const names = new Set([...this.definitions.keys()]);
    for (const series of this.series.values()) {
      names.add(series.name);
    }
    return {
      metricsCount: names.size,
      seriesCount: this.series.size,
      totalObservations: this.totalObservations,
    };
  }

  private getOrCreateSeries(name: string, type: MetricType, labels: MetricLabels): Series {
    const definedType = this.definitions.get(name)?.type;
    if (definedType && definedType !== type) {
      throw new Error(`Metric ${name} is a ${definedType}, not a ${type}`);
    }

    const key = seriesKey(name, labels);
    let series = this.series.get(key);
    if (!series) {
      series = { name, type, labels: { ...labels }, value: 0, timestamp: this.clock() };
      this.series.set(key, series);
    } else if (series.type !== type) {
      throw new Error(`Metric ${name} is a ${series.type}, not a ${type}`);
    }
    return series;
  }
}
