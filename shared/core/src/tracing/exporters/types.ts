/**
 * Span exporter contract.
 *
 * An exporter receives ended spans and pushes them to a telemetry backend.
 * Failures are reported through the result, never thrown.
 */

import type { ReadableSpan } from '../span';

export type ExportResult =
  | { code: 'success' }
  | { code: 'retryable-error'; error: Error };

export const EXPORT_SUCCESS: ExportResult = Object.freeze({ code: 'success' });

export interface SpanExporter {
  /** Identifies the backend in logs */
  readonly name: string;

  export(spans: ReadonlyArray<ReadableSpan>): Promise<ExportResult>;

  /**
   * Release backend resources. Spans exported afterwards are dropped.
   */
  shutdown(): Promise<void>;
}

/**
 * Counters kept by the HTTP exporters.
 */
export interface ExporterStats {
  exportCount: number;
  dropCount: number;
}
