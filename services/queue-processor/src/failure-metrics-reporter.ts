/**
 * Counts reported processing failures in `Processing_Failed{Queue}`.
 */

import type { ErrorReporter } from '@msgtrace/core';
import type { IMetricsCollector } from '@msgtrace/metrics';
import { MetricNames } from '@msgtrace/types';

export class FailureMetricsReporter implements ErrorReporter {
  constructor(
    private readonly metrics: IMetricsCollector,
    private readonly queue: string
  ) {}

  reportException(_error: Error, properties: Readonly<Record<string, string>> = {}): void {
    this.metrics.incrementCounter(MetricNames.PROCESSING_FAILED, { Queue: properties.queue ?? this.queue });
  }
}
