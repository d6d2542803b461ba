/**
 * Collector
 *
 * Bridges diagnostic events to spans. A collector subscribes to named
 * DiagnosticSources, dispatches each event through a callback table keyed
 * by event kind, and forwards ended spans to its exporters.
 *
 * Several collectors may coexist (typically one per exporter family); each
 * sees only the sources it subscribed to.
 *
 * Lifecycle:
 * - subscribe() after dispose() throws
 * - dispose() is idempotent; concurrent callers await one teardown
 */

import type { ILogger } from '../logging/types';
import { ErrorCode, MsgtraceError, getErrorMessage } from '../errors/error-handling';
import { DiagnosticRegistry, ExceptionEvent, StartEvent, StopEvent } from './diagnostic-source';
import { OK_STATUS, Span, errorStatus } from './span';
import { SpanExportPipeline } from './span-export';
import { createChildContext, createRootContext } from './trace-context';
import type { SpanExporter } from './exporters/types';

// =============================================================================
// Types
// =============================================================================

/**
 * Callback table. Kinds without a callback are ignored.
 */
export interface DiagnosticHandler {
  onStart?(event: StartEvent): void;
  onStop?(event: StopEvent): void;
  onException?(event: ExceptionEvent): void;
}

export interface SubscriptionHandle {
  readonly id: number;
  readonly sourceName: string;
  isActive(): boolean;
  /** Idempotent */
  unsubscribe(): void;
}

export interface CollectorOptions {
  /** Used in logs to tell collectors apart */
  name: string;
  registry: DiagnosticRegistry;
  exporters: ReadonlyArray<SpanExporter>;
  logger: ILogger;
}

interface SubscriptionEntry {
  readonly handle: SubscriptionHandle;
  readonly detach: () => void;
}

// =============================================================================
// Span Bridge
// =============================================================================

export interface SpanBridge extends DiagnosticHandler {
  /** Spans started but not yet stopped */
  activeSpanCount(): number;
}

/**
 * Default handler: start events become spans, stop events end them.
 *
 * The span identity is, in order of preference, the context attached to the
 * start event, a child of the supplied parent span, or a new root.
 */
export function createSpanBridge(pipeline: SpanExportPipeline, logger: ILogger): SpanBridge {
  const spans = new Map<string, Span>();

  return {
    onStart(event: StartEvent): void {
      let span: Span;
      if (event.context) {
        span = new Span({
          name: event.operationName,
          kind: event.spanKind,
          context: event.context,
          parentId: event.parentSpanId,
          logger,
        });
      } else if (event.parentSpan) {
        span = new Span({
          name: event.operationName,
          kind: event.spanKind,
          context: createChildContext(event.parentSpan.context),
          parentId: event.parentSpan.id,
          logger,
        });
      } else {
        span = new Span({
          name: event.operationName,
          kind: event.spanKind,
          context: createRootContext(),
          logger,
        });
      }

      span.onEnd(readable => pipeline.exportSpan(readable));
      span.start().setTags(event.tags);
      spans.set(event.correlationKey, span);
    },

    onException(event: ExceptionEvent): void {
      const span = spans.get(event.correlationKey);
      if (!span) {
        logger.debug('Exception event without matching span', { correlationKey: event.correlationKey });
        return;
      }
      span.addEvent('exception', {
        'exception.type': event.error.name,
        'exception.message': event.error.message,
      });
      span.setStatus(errorStatus(event.error.message));
    },

    onStop(event: StopEvent): void {
      const span = spans.get(event.correlationKey);
      if (!span) {
        logger.debug('Stop event without matching span', { correlationKey: event.correlationKey });
        return;
      }
      spans.delete(event.correlationKey);
      span.end(span.getStatus().code === 'unset' ? OK_STATUS : undefined);
    },

    activeSpanCount(): number {
      return spans.size;
    },
  };
}

// =============================================================================
// Collector
// =============================================================================

export class Collector {
  readonly name: string;

  private readonly registry: DiagnosticRegistry;
  private readonly logger: ILogger;
  private readonly pipeline: SpanExportPipeline;
  private readonly bridge: SpanBridge;
  private readonly subscriptions = new Map<number, SubscriptionEntry>();
  private nextSubscriptionId = 1;
  private disposePromise: Promise<void> | null = null;

  constructor(options: CollectorOptions) {
    this.name = options.name;
    this.registry = options.registry;
    this.logger = options.logger.child({ collector: options.name });
    this.pipeline = new SpanExportPipeline(options.exporters, this.logger);
    this.bridge = createSpanBridge(this.pipeline, this.logger);
  }

  /**
   * Subscribe a handler to every event of the named source.
   *
   * @param handler - Callback table; defaults to the span bridge
   * @throws MsgtraceError (INVALID_STATE) once disposed
   *
   * @example
   * ```typescript
   * const collector = new Collector({ name: 'otlp', registry, exporters, logger });
   * collector.subscribe(BROKER_DIAGNOSTIC_SOURCE);
   * ```
   */
  subscribe(sourceName: string, handler: DiagnosticHandler = this.bridge): SubscriptionHandle {
    if (this.disposePromise) {
      throw new MsgtraceError('Collector is disposed', ErrorCode.INVALID_STATE, {
        context: { collector: this.name, sourceName },
      });
    }

    const id = this.nextSubscriptionId++;
    const source = this.registry.getSource(sourceName);
    const detach = source.subscribe(event => {
      switch (event.kind) {
        case 'start':
          handler.onStart?.(event);
          break;
        case 'stop':
          handler.onStop?.(event);
          break;
        case 'exception':
          handler.onException?.(event);
          break;
      }
    });

    const handle: SubscriptionHandle = {
      id,
      sourceName,
      isActive: () => this.subscriptions.has(id),
      unsubscribe: () => this.removeSubscription(id),
    };
    this.subscriptions.set(id, { handle, detach });

    this.logger.debug('Subscribed to diagnostic source', { sourceName, subscriptionId: id });
    return handle;
  }

  getSubscriptionCount(): number {
    return this.subscriptions.size;
  }

  getPipeline(): SpanExportPipeline {
    return this.pipeline;
  }

  isDisposed(): boolean {
    return this.disposePromise !== null;
  }

  /**
   * Release every subscription and shut the exporters down.
   */
  dispose(): Promise<void> {
    if (!this.disposePromise) {
      this.disposePromise = this.teardown();
    }
    return this.disposePromise;
  }

  private removeSubscription(id: number): void {
    const entry = this.subscriptions.get(id);
    if (!entry) {
      return;
    }
    this.subscriptions.delete(id);
    entry.detach();
  }

  private async teardown(): Promise<void> {
    for (const id of [...this.subscriptions.keys()]) {
      this.removeSubscription(id);
    }

    const open = this.bridge.activeSpanCount();
    if (open > 0) {
      this.logger.debug('Disposing collector with open spans', { open });
    }

    try {
      await this.pipeline.shutdown();
    } catch (error) {
      this.logger.warn('Collector disposal failed', { error: getErrorMessage(error) });
    }
    this.logger.info('Collector disposed', { stats: this.pipeline.getStats() });
  }
}
