/**
 * Writes finished spans to a logger. Useful as a development sink.
 */

import type { ILogger } from '../../logging/types';
import type { ReadableSpan } from '../span';
import { EXPORT_SUCCESS, ExportResult, SpanExporter } from './types';

export class LoggingSpanExporter implements SpanExporter {
  readonly name = 'log';

  constructor(private readonly logger: ILogger) {}

  async export(spans: ReadonlyArray<ReadableSpan>): Promise<ExportResult> {
    for (const span of spans) {
      this.logger.info('Span finished', {
        span: span.name,
        kind: span.kind,
        traceId: span.traceId,
        spanId: span.id,
        parentId: span.parentId,
        durationMs: (span.endTime ?? span.startTime) - span.startTime,
        status: span.status.code,
        tags: span.tags,
      });
    }
    return EXPORT_SUCCESS;
  }

  async shutdown(): Promise<void> {
    // nothing buffered
  }
}
