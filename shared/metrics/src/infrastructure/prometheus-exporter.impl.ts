/**
 * PrometheusExporter - Infrastructure Layer
 *
 * Renders collected metrics for the `/metrics` endpoint.
 *
 * @see https://prometheus.io/docs/instrumenting/exposition_formats/
 *
 * @package @msgtrace/metrics
 * @module metrics/infrastructure
 */

import { getErrorMessage } from '@msgtrace/core';
import { IMetricsCollector, MetricSnapshot } from '../domain/metrics-collector.interface';
import { formatLabels } from '../domain/models';

export enum ExportFormat {
  PROMETHEUS = 'prometheus',
  JSON = 'json',
}

export interface ExportConfig {
  format: ExportFormat;
  /** Append the last-update time (Unix ms) to every sample line */
  includeTimestamps: boolean;
  /** Emit HELP and TYPE lines */
  includeMetadata: boolean;
  metricPrefix: string;
  /** Labels added to every series; series labels win on conflict */
  defaultLabels: Record<string, string>;
}

export interface JsonMetricsPayload {
  timestamp: number;
  metrics: Array<{
    name: string;
    type: string;
    value: number;
    labels: Record<string, string>;
    timestamp: number;
  }>;
}

export interface ExportResult {
  success: boolean;
  data: string | JsonMetricsPayload;
  metricsExported: number;
  timestamp: number;
  errors?: string[];
}

export interface ExporterStats {
  totalExports: number;
  successfulExports: number;
  failedExports: number;
  lastExportTimestamp: number;
}

const DEFAULT_CONFIG: ExportConfig = {
  format: ExportFormat.PROMETHEUS,
  includeTimestamps: false,
  includeMetadata: true,
  metricPrefix: '',
  defaultLabels: {},
};

export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

/**
 * @example
 * ```typescript
 * const exporter = new PrometheusExporter(collector, { includeTimestamps: true });
 * const result = await exporter.export();
 * // # HELP Enqueued_Item Items enqueued per source
 * // # TYPE Enqueued_Item counter
 * // Enqueued_Item{Source="WebSiteA"} 2 1700000000000
 * ```
 */
export class PrometheusExporter {
  private readonly config: ExportConfig;
  private stats: ExporterStats = {
    totalExports: 0,
    successfulExports: 0,
    failedExports: 0,
    lastExportTimestamp: 0,
  };

  constructor(
    private readonly collector: IMetricsCollector,
    config: Partial<ExportConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async export(): Promise<ExportResult> {
    this.stats.totalExports++;
    this.stats.lastExportTimestamp = Date.now();

    try {
      const snapshot = this.collector.getSnapshot();
      const data = this.config.format === ExportFormat.JSON
        ? this.exportJSON(snapshot)
        : this.exportPrometheus(snapshot);

      this.stats.successfulExports++;
      return {
        success: true,
        data,
        metricsExported: snapshot.length,
        timestamp: this.stats.lastExportTimestamp,
      };
    } catch (error) {
      this.stats.failedExports++;
      return {
        success: false,
        data: '',
        metricsExported: 0,
        timestamp: this.stats.lastExportTimestamp,
        errors: [getErrorMessage(error)],
      };
    }
  }

  getConfig(): ExportConfig {
    return { ...this.config };
  }

  getStats(): ExporterStats {
    return { ...this.stats };
  }

  /**
   * Text format, one block per metric name:
   * ```
   * # HELP name help text
   * # TYPE name counter
   * name{label="value"} 42 1700000000000
   * ```
   */
  private exportPrometheus(snapshot: MetricSnapshot[]): string {
    const grouped = new Map<string, MetricSnapshot[]>();
    for (const metric of snapshot) {
      const name = this.config.metricPrefix + metric.name;
      const group = grouped.get(name);
      if (group) {
        group.push(metric);
      } else {
        grouped.set(name, [metric]);
      }
    }

    const lines: string[] = [];
    for (const [name, metrics] of grouped) {
      const first = metrics[0];
      if (this.config.includeMetadata) {
        lines.push(`# HELP ${name} ${first.help ?? `${first.type} metric`}`);
        lines.push(`# TYPE ${name} ${first.type}`);
      }
      for (const metric of metrics) {
        const labels = formatLabels({ ...this.config.defaultLabels, ...metric.labels });
        const timestamp = this.config.includeTimestamps ? ` ${metric.timestamp}` : '';
        lines.push(`${name}${labels} ${metric.value}${timestamp}`);
      }
    }

    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
  }

  private exportJSON(snapshot: MetricSnapshot[]): JsonMetricsPayload {
    return {
      timestamp: Date.now(),
      metrics: snapshot.map(metric => ({
        name: this.config.metricPrefix + metric.name,
        type: metric.type,
        value: metric.value,
        labels: { ...this.config.defaultLabels, ...metric.labels },
        timestamp: metric.timestamp,
      })),
    };
  }
}
