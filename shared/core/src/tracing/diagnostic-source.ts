/**
 * Diagnostic Sources
 *
 * Instrumented code writes start/stop/exception events to a named
 * DiagnosticSource; collectors subscribe to sources by name and turn the
 * events into spans. Sources live in an explicit DiagnosticRegistry owned
 * by the composition root.
 */

import type { ILogger } from '../logging/types';
import { getErrorMessage } from '../errors/error-handling';
import type { Span, SpanKind } from './span';
import { TraceContext, createChildContext, createRootContext } from './trace-context';

// =============================================================================
// Types
// =============================================================================

export type DiagnosticEventKind = 'start' | 'stop' | 'exception';

/**
 * Instrumentation-side record of a unit of work.
 */
export interface Activity {
  readonly operationName: string;
  readonly kind: SpanKind;
  /** Identity of the unit of work; serialized into outgoing headers */
  readonly context: TraceContext;
  readonly parentSpanId?: string;
  readonly tags: Readonly<Record<string, string>>;
}

interface DiagnosticEventBase {
  readonly sourceName: string;
  /** Ties the stop/exception event to its start event */
  readonly correlationKey: string;
  readonly operationName: string;
}

export interface StartEvent extends DiagnosticEventBase {
  readonly kind: 'start';
  readonly spanKind: SpanKind;
  readonly tags: Readonly<Record<string, string>>;
  /** Identity to adopt for the span, when the instrumentation minted one */
  readonly context?: TraceContext;
  /** Span id of the parent of `context` */
  readonly parentSpanId?: string;
  /** In-process parent when no identity was attached */
  readonly parentSpan?: Span;
}

export interface StopEvent extends DiagnosticEventBase {
  readonly kind: 'stop';
}

export interface ExceptionEvent extends DiagnosticEventBase {
  readonly kind: 'exception';
  readonly error: Error;
}

export type DiagnosticEvent = StartEvent | StopEvent | ExceptionEvent;

export type DiagnosticListener = (event: DiagnosticEvent) => void;

export interface StartActivityOptions {
  kind?: SpanKind;
  /** Parent context; the activity gets a fresh root when absent */
  parent?: TraceContext;
  tags?: Readonly<Record<string, string>>;
}

// =============================================================================
// DiagnosticSource
// =============================================================================

export class DiagnosticSource {
  private readonly listeners = new Set<DiagnosticListener>();
  private readonly open = new Set<string>();

  constructor(readonly name: string, private readonly logger?: ILogger) {}

  /**
   * True while at least one listener is subscribed.
   */
  isEnabled(): boolean {
    return this.listeners.size > 0;
  }

  /**
   * @returns Function that removes the listener
   */
  subscribe(listener: DiagnosticListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Deliver an event to every listener. Delivery iterates a snapshot so that
   * listeners may unsubscribe while an event is in flight; a throwing
   * listener is logged and does not affect the others.
   */
  write(event: DiagnosticEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.logger?.warn('Diagnostic listener failed', {
          source: this.name,
          event: event.kind,
          error: getErrorMessage(error),
        });
      }
    }
  }

  /**
   * Mint an activity identity and announce it with a start event.
   */
  startActivity(operationName: string, options: StartActivityOptions = {}): Activity {
    const activity: Activity = Object.freeze({
      operationName,
      kind: options.kind ?? 'internal',
      context: options.parent ? createChildContext(options.parent) : createRootContext(),
      parentSpanId: options.parent?.spanId,
      tags: Object.freeze({ ...options.tags }),
    });

    const correlationKey = activity.context.spanId;
    this.open.add(correlationKey);
    this.write({
      kind: 'start',
      sourceName: this.name,
      correlationKey,
      operationName,
      spanKind: activity.kind,
      tags: activity.tags,
      context: activity.context,
      parentSpanId: activity.parentSpanId,
    });
    return activity;
  }

  /**
   * Announce a failure of an open activity. Must precede stopActivity().
   */
  reportException(activity: Activity, error: Error): void {
    const correlationKey = activity.context.spanId;
    if (!this.open.has(correlationKey)) {
      return;
    }
    this.write({
      kind: 'exception',
      sourceName: this.name,
      correlationKey,
      operationName: activity.operationName,
      error,
    });
  }

  /**
   * Announce the end of an activity. Idempotent.
   */
  stopActivity(activity: Activity): void {
    const correlationKey = activity.context.spanId;
    if (!this.open.delete(correlationKey)) {
      return;
    }
    this.write({
      kind: 'stop',
      sourceName: this.name,
      correlationKey,
      operationName: activity.operationName,
    });
  }
}

// =============================================================================
// DiagnosticRegistry
// =============================================================================

export class DiagnosticRegistry {
  private readonly sources = new Map<string, DiagnosticSource>();

  constructor(private readonly logger?: ILogger) {}

  /**
   * Get the source with this name, creating it on first use. Producers and
   * collectors resolving the same name share one source regardless of order.
   */
  getSource(name: string): DiagnosticSource {
    let source = this.sources.get(name);
    if (!source) {
      source = new DiagnosticSource(name, this.logger);
      this.sources.set(name, source);
    }
    return source;
  }
}
