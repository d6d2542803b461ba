/**
 * SpanExportPipeline
 *
 * Fans ended spans out to every registered exporter. Exports run in the
 * background; pending exports are tracked so that forceFlush() and
 * shutdown() can wait for them. Spans without the sampled flag are skipped.
 */

import type { ILogger } from '../logging/types';
import { DisposalError, getErrorMessage } from '../errors/error-handling';
import type { ReadableSpan } from './span';
import { isSampled } from './trace-context';
import type { SpanExporter } from './exporters/types';

export interface ExportPipelineStats {
  exported: number;
  failed: number;
  skipped: number;
  pending: number;
}

export class SpanExportPipeline {
  private readonly exporters: SpanExporter[];
  private readonly pending = new Set<Promise<void>>();
  private shutdownPromise: Promise<void> | null = null;
  private exported = 0;
  private failed = 0;
  private skipped = 0;

  constructor(exporters: ReadonlyArray<SpanExporter>, private readonly logger: ILogger) {
    this.exporters = [...exporters];
  }

  get exporterCount(): number {
    return this.exporters.length;
  }

  isShutdown(): boolean {
    return this.shutdownPromise !== null;
  }

  /**
   * Hand an ended span to every exporter without waiting for them.
   */
  exportSpan(span: ReadableSpan): void {
    if (this.shutdownPromise) {
      this.logger.debug('Dropping span after shutdown', { span: span.name, traceId: span.traceId });
      this.skipped++;
      return;
    }
    if (!isSampled(span.context)) {
      this.skipped++;
      return;
    }

    for (const exporter of this.exporters) {
      const task: Promise<void> = this.exportTo(exporter, span).then(() => {
        this.pending.delete(task);
      });
      this.pending.add(task);
    }
  }

  /**
   * Wait until every export started so far has settled.
   */
  async forceFlush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  /**
   * Flush, then shut every exporter down. Idempotent; exporter failures
   * are logged and suppressed.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown();
    }
    return this.shutdownPromise;
  }

  getStats(): ExportPipelineStats {
    return {
      exported: this.exported,
      failed: this.failed,
      skipped: this.skipped,
      pending: this.pending.size,
    };
  }

  private async exportTo(exporter: SpanExporter, span: ReadableSpan): Promise<void> {
    try {
      const result = await exporter.export([span]);
      if (result.code === 'success') {
        this.exported++;
        return;
      }
      this.failed++;
      this.logger.warn('Span export failed', {
        exporter: exporter.name,
        traceId: span.traceId,
        error: result.error.message,
      });
    } catch (error) {
      this.failed++;
      this.logger.warn('Span exporter threw', {
        exporter: exporter.name,
        traceId: span.traceId,
        error: getErrorMessage(error),
      });
    }
  }

  private async runShutdown(): Promise<void> {
    await this.forceFlush();
    for (const exporter of this.exporters) {
      try {
        await exporter.shutdown();
      } catch (error) {
        const suppressed = new DisposalError(
          `Failed to shut down ${exporter.name} exporter`,
          exporter.name,
          { cause: error instanceof Error ? error : undefined }
        );
        this.logger.warn(suppressed.message, { error: getErrorMessage(error), code: suppressed.code });
      }
    }
  }
}
