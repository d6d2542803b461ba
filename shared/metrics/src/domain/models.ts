/**
 * Domain Models for Metrics Collection
 *
 * @package @msgtrace/metrics
 * @module metrics/domain
 */

import { MetricLabels, MetricSnapshot, MetricType } from './metrics-collector.interface';

/**
 * Escape a label value for the Prometheus text format (\, ", newline).
 */
export function escapeLabelValue(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n');
}

/**
 * Render labels as `{k1="v1",k2="v2"}` in insertion order, or '' when empty.
 */
export function formatLabels(labels: MetricLabels): string {
  const pairs = Object.entries(labels).map(([key, value]) => `${key}="${escapeLabelValue(value)}"`);
  return pairs.length > 0 ? `{${pairs.join(',')}}` : '';
}

/**
 * Value Object: Metric Value
 *
 * Immutable representation of a single metric observation.
 */
export class MetricValue implements MetricSnapshot {
  private constructor(
    public readonly name: string,
    public readonly type: MetricType,
    public readonly value: number,
    public readonly labels: MetricLabels,
    public readonly timestamp: number,
    public readonly help?: string
  ) {
    Object.freeze(this);
  }

  static counter(
    name: string,
    value: number,
    labels: MetricLabels = {},
    timestamp: number = Date.now(),
    help?: string
  ): MetricValue {
    return new MetricValue(name, MetricType.COUNTER, value, { ...labels }, timestamp, help);
  }

  static gauge(
    name: string,
    value: number,
    labels: MetricLabels = {},
    timestamp: number = Date.now(),
    help?: string
  ): MetricValue {
    return new MetricValue(name, MetricType.GAUGE, value, { ...labels }, timestamp, help);
  }

  /**
   * Fully qualified series name, e.g. `Enqueued_Item{Source="WebSiteA"}`
   */
  getQualifiedName(): string {
    return `${this.name}${formatLabels(this.labels)}`;
  }

  toString(): string {
    return `${this.getQualifiedName()} = ${this.value} @ ${this.timestamp}`;
  }
}
