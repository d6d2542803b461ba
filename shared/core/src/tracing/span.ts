/**
 * Span
 *
 * In-memory unit of work with parent linkage, tags, events and a status.
 *
 * State machine: CREATED -> STARTED -> ENDED
 * - start() is idempotent
 * - tags and events are accepted only while STARTED; anything else is
 *   dropped with a debug log
 * - end() is idempotent; end listeners (exporters) run exactly once
 *
 * After end() the span is immutable and handed to exporters as a frozen
 * {@link ReadableSpan}.
 */

import type { ILogger } from '../logging/types';
import { getErrorMessage } from '../errors/error-handling';
import type { TraceContext } from './trace-context';

// =============================================================================
// Types
// =============================================================================

export type SpanKind = 'internal' | 'producer' | 'consumer' | 'client' | 'server';

export type SpanStatus =
  | { code: 'unset' }
  | { code: 'ok' }
  | { code: 'error'; description: string };

export enum SpanState {
  CREATED = 'created',
  STARTED = 'started',
  ENDED = 'ended'
}

export interface SpanEvent {
  name: string;
  timestamp: number;
  attributes?: Readonly<Record<string, string>>;
}

/**
 * Immutable snapshot of an ended span, as seen by exporters.
 */
export interface ReadableSpan {
  readonly id: string;
  readonly traceId: string;
  readonly parentId?: string;
  readonly name: string;
  readonly kind: SpanKind;
  readonly context: TraceContext;
  readonly tags: Readonly<Record<string, string>>;
  readonly events: ReadonlyArray<SpanEvent>;
  readonly status: SpanStatus;
  /** Unix epoch milliseconds */
  readonly startTime: number;
  readonly endTime?: number;
}

export type SpanEndListener = (span: ReadableSpan) => void;

export interface SpanOptions {
  name: string;
  /** Identity of this span; its spanId becomes the span id */
  context: TraceContext;
  kind?: SpanKind;
  /** Span id of the parent, absent for a root */
  parentId?: string;
  logger?: ILogger;
  /** Millisecond clock, defaults to Date.now */
  clock?: () => number;
}

export const OK_STATUS: SpanStatus = Object.freeze({ code: 'ok' });
export const UNSET_STATUS: SpanStatus = Object.freeze({ code: 'unset' });

export function errorStatus(description: string): SpanStatus {
  return { code: 'error', description };
}

// =============================================================================
// Span
// =============================================================================

export class Span {
  readonly name: string;
  readonly kind: SpanKind;
  readonly context: TraceContext;
  readonly parentId?: string;

  private state = SpanState.CREATED;
  private status: SpanStatus = UNSET_STATUS;
  private readonly tags: Record<string, string> = {};
  private readonly events: SpanEvent[] = [];
  private startTime = 0;
  private endTime?: number;
  private readonly endListeners: SpanEndListener[] = [];
  private readonly logger?: ILogger;
  private readonly clock: () => number;

  constructor(options: SpanOptions) {
    this.name = options.name;
    this.kind = options.kind ?? 'internal';
    this.context = options.context;
    this.parentId = options.parentId;
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
  }

  get id(): string {
    return this.context.spanId;
  }

  get traceId(): string {
    return this.context.traceId;
  }

  getState(): SpanState {
    return this.state;
  }

  getStatus(): SpanStatus {
    return this.status;
  }

  isRecording(): boolean {
    return this.state === SpanState.STARTED;
  }

  start(): this {
    if (this.state !== SpanState.CREATED) {
      return this;
    }
    this.startTime = this.clock();
    this.state = SpanState.STARTED;
    return this;
  }

  setTag(key: string, value: string): this {
    if (!this.isRecording()) {
      this.logger?.debug('Ignoring tag on span that is not recording', { span: this.name, key, state: this.state });
      return this;
    }
    this.tags[key] = value;
    return this;
  }

  setTags(tags: Readonly<Record<string, string>>): this {
    for (const [key, value] of Object.entries(tags)) {
      this.setTag(key, value);
    }
    return this;
  }

  addEvent(name: string, attributes?: Readonly<Record<string, string>>): this {
    if (!this.isRecording()) {
      this.logger?.debug('Ignoring event on span that is not recording', { span: this.name, event: name, state: this.state });
      return this;
    }
    this.events.push({ name, timestamp: this.clock(), attributes });
    return this;
  }

  setStatus(status: SpanStatus): this {
    if (this.state === SpanState.ENDED) {
      return this;
    }
    this.status = status;
    return this;
  }

  /**
   * Register a callback for the single end transition.
   * Registering on an already ended span is a no-op.
   */
  onEnd(listener: SpanEndListener): this {
    if (this.state !== SpanState.ENDED) {
      this.endListeners.push(listener);
    }
    return this;
  }

  /**
   * End the span. A span that was never started gets startTime = endTime.
   * Calling end() again leaves the first end untouched.
   */
  end(status?: SpanStatus): void {
    if (this.state === SpanState.ENDED) {
      return;
    }
    if (status) {
      this.status = status;
    }
    this.endTime = this.clock();
    if (this.state === SpanState.CREATED) {
      this.startTime = this.endTime;
    }
    this.state = SpanState.ENDED;

    const snapshot = this.toReadable();
    const listeners = this.endListeners.splice(0);
    for (const listener of listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        this.logger?.warn('Span end listener failed', { span: this.name, error: getErrorMessage(error) });
      }
    }
  }

  toReadable(): ReadableSpan {
    return Object.freeze({
      id: this.id,
      traceId: this.traceId,
      parentId: this.parentId,
      name: this.name,
      kind: this.kind,
      context: this.context,
      tags: Object.freeze({ ...this.tags }),
      events: Object.freeze(this.events.map(event => Object.freeze({ ...event }))),
      status: this.status,
      startTime: this.startTime,
      endTime: this.endTime,
    });
  }
}
