/**
 * Tracer
 *
 * Creates spans for code that instruments itself directly (the queue
 * consumer) instead of going through a DiagnosticSource. There is no
 * ambient "current span": the parent is passed explicitly.
 */

import type { ILogger } from '../logging/types';
import { getErrorMessage } from '../errors/error-handling';
import { Span, SpanKind, errorStatus } from './span';
import type { SpanExportPipeline } from './span-export';
import { TraceContext, createChildContext, createRootContext } from './trace-context';

export interface StartSpanOptions {
  kind?: SpanKind;
  /** Parent context or span; a new root is minted when absent */
  parent?: TraceContext | Span;
  tags?: Readonly<Record<string, string>>;
}

function resolveParent(parent: TraceContext | Span | undefined): TraceContext | undefined {
  return parent instanceof Span ? parent.context : parent;
}

export class Tracer {
  constructor(
    readonly name: string,
    private readonly pipeline: SpanExportPipeline,
    private readonly logger?: ILogger
  ) {}

  /**
   * Create and start a span. Ending it forwards it to the export pipeline.
   *
   * @example
   * ```typescript
   * const span = tracer.startSpan('Process message', { kind: 'consumer', parent: extracted });
   * try {
   *   await work();
   * } finally {
   *   span.end();
   * }
   * ```
   */
  startSpan(name: string, options: StartSpanOptions = {}): Span {
    const parentContext = resolveParent(options.parent);
    const span = new Span({
      name,
      kind: options.kind,
      context: parentContext ? createChildContext(parentContext) : createRootContext(),
      parentId: parentContext?.spanId,
      logger: this.logger,
    });

    span.onEnd(readable => this.pipeline.exportSpan(readable));
    span.start();
    if (options.tags) {
      span.setTags(options.tags);
    }
    return span;
  }

  /**
   * Run fn inside a span. The span ends with an error status when fn throws;
   * the error is rethrown.
   */
  async withSpan<T>(name: string, options: StartSpanOptions, fn: (span: Span) => Promise<T>): Promise<T> {
    const span = this.startSpan(name, options);
    try {
      return await fn(span);
    } catch (error) {
      span.setStatus(errorStatus(getErrorMessage(error)));
      throw error;
    } finally {
      span.end();
    }
  }
}
