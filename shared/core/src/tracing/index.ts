/**
 * Tracing Module
 *
 * traceparent codec, span model, tracer, diagnostic sources, the
 * event-to-span collector and span exporters.
 */

export {
  TRACEPARENT_HEADER,
  SUPPORTED_VERSION,
  SAMPLED_FLAG,
  generateTraceId,
  generateSpanId,
  createRootContext,
  createChildContext,
  isSampled,
  parseTraceParent,
  formatTraceParent,
  injectTraceParent,
  extractTraceParent,
  requireTraceParent,
} from './trace-context';
export type { TraceContext, MessageHeaders } from './trace-context';

export { Span, SpanState, OK_STATUS, UNSET_STATUS, errorStatus } from './span';
export type { SpanKind, SpanStatus, SpanEvent, ReadableSpan, SpanEndListener, SpanOptions } from './span';

export { SpanExportPipeline } from './span-export';
export type { ExportPipelineStats } from './span-export';

export { Tracer } from './tracer';
export type { StartSpanOptions } from './tracer';

export { DiagnosticSource, DiagnosticRegistry } from './diagnostic-source';
export type {
  Activity,
  DiagnosticEvent,
  DiagnosticEventKind,
  DiagnosticListener,
  StartEvent,
  StopEvent,
  ExceptionEvent,
  StartActivityOptions,
} from './diagnostic-source';

export { Collector, createSpanBridge } from './collector';
export type { CollectorOptions, DiagnosticHandler, SubscriptionHandle, SpanBridge } from './collector';

export * from './exporters';
