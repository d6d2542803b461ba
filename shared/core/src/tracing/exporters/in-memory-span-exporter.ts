/**
 * Span exporter that keeps everything in memory.
 *
 * @example
 * ```typescript
 * const exporter = new InMemorySpanExporter();
 * const tracer = new Tracer('test', new SpanExportPipeline([exporter], new NullLogger()));
 * tracer.startSpan('work').end();
 * expect(exporter.getFinishedSpans()).toHaveLength(1);
 * ```
 */

import type { ReadableSpan } from '../span';
import { EXPORT_SUCCESS, ExportResult, SpanExporter } from './types';

export class InMemorySpanExporter implements SpanExporter {
  readonly name: string;

  private spans: ReadableSpan[] = [];
  private failure: Error | null = null;
  private stopped = false;
  private shutdownCount = 0;

  constructor(name = 'memory') {
    this.name = name;
  }

  async export(spans: ReadonlyArray<ReadableSpan>): Promise<ExportResult> {
    if (this.stopped) {
      return { code: 'retryable-error', error: new Error('Exporter is shut down') };
    }
    if (this.failure) {
      return { code: 'retryable-error', error: this.failure };
    }
    this.spans.push(...spans);
    return EXPORT_SUCCESS;
  }

  async shutdown(): Promise<void> {
    this.shutdownCount++;
    this.stopped = true;
  }

  getFinishedSpans(): ReadonlyArray<ReadableSpan> {
    return [...this.spans];
  }

  /**
   * Make every following export fail with the given error (null to recover).
   */
  failWith(error: Error | null): void {
    this.failure = error;
  }

  getShutdownCount(): number {
    return this.shutdownCount;
  }

  reset(): void {
    this.spans = [];
  }
}
