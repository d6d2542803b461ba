/**
 * Trace Context Codec
 *
 * Canonical W3C `traceparent` representation of a distributed-trace identity
 * and its propagation through message headers.
 *
 * Format: `VV-TTTTTTTTTTTTTTTTTTTTTTTTTTTTTTTT-SSSSSSSSSSSSSSSS-FF`
 * - VV: version, always `00`
 * - T: 16-byte trace id, 32 lowercase hex chars
 * - S: 8-byte span id, 16 lowercase hex chars
 * - FF: flags, bit 0 = sampled
 *
 * Parsing is strict: anything that deviates from the format above is a
 * FormatError. Contexts are frozen once constructed.
 *
 * @see https://www.w3.org/TR/trace-context/#traceparent-header
 */

import { randomBytes } from 'crypto';
import { ErrorCode, FormatError } from '../errors/error-handling';

// =============================================================================
// Types
// =============================================================================

export interface TraceContext {
  readonly version: number;
  /** 32 lowercase hex characters */
  readonly traceId: string;
  /** 16 lowercase hex characters */
  readonly spanId: string;
  readonly flags: number;
}

/**
 * Message metadata as carried by the broker.
 */
export type MessageHeaders = Record<string, string>;

// =============================================================================
// Constants
// =============================================================================

/** Header key carrying the serialized context */
export const TRACEPARENT_HEADER = 'traceparent';

export const SUPPORTED_VERSION = 0;

/** Bit 0 of the flags byte */
export const SAMPLED_FLAG = 0x01;

const TRACEPARENT_PATTERN = /^([0-9a-f]{2})-([0-9a-f]{32})-([0-9a-f]{16})-([0-9a-f]{2})$/;
const INVALID_TRACE_ID = '0'.repeat(32);
const INVALID_SPAN_ID = '0'.repeat(16);

// =============================================================================
// ID Generation
// =============================================================================

export function generateTraceId(): string {
  return randomBytes(16).toString('hex');
}

export function generateSpanId(): string {
  return randomBytes(8).toString('hex');
}

function freeze(version: number, traceId: string, spanId: string, flags: number): TraceContext {
  return Object.freeze({ version, traceId, spanId, flags });
}

// =============================================================================
// Context Lifecycle
// =============================================================================

/**
 * Create a new root context with random ids and the sampled flag set.
 *
 * @example
 * ```typescript
 * const ctx = createRootContext();
 * headers[TRACEPARENT_HEADER] = formatTraceParent(ctx);
 * ```
 */
export function createRootContext(): TraceContext {
  return freeze(SUPPORTED_VERSION, generateTraceId(), generateSpanId(), SAMPLED_FLAG);
}

/**
 * Create a context that continues the parent's trace with a new span id.
 * Flags are inherited; recording the parent's span id is up to the Span.
 */
export function createChildContext(parent: TraceContext): TraceContext {
  return freeze(SUPPORTED_VERSION, parent.traceId, generateSpanId(), parent.flags);
}

export function isSampled(context: TraceContext): boolean {
  return (context.flags & SAMPLED_FLAG) === SAMPLED_FLAG;
}

// =============================================================================
// Codec
// =============================================================================

function toHexByte(value: number): string {
  return value.toString(16).padStart(2, '0');
}

/**
 * Parse a `traceparent` string.
 *
 * @throws FormatError when the field count, field lengths or alphabet are
 * wrong, the version is not `00`, or an id is all zeros
 *
 * @example
 * ```typescript
 * const ctx = parseTraceParent('00-cd4262a7f7adf040bdd892959cf8c4fc-4a28d39ff0e725f2-01');
 * ctx.traceId; // 'cd4262a7f7adf040bdd892959cf8c4fc'
 * ```
 */
export function parseTraceParent(value: string): TraceContext {
  const match = TRACEPARENT_PATTERN.exec(value);
  if (!match) {
    throw new FormatError('Invalid traceparent format', { input: value });
  }

  const [, versionHex, traceId, spanId, flagsHex] = match;
  const version = parseInt(versionHex, 16);

  if (version !== SUPPORTED_VERSION) {
    throw new FormatError(`Unsupported traceparent version: ${versionHex}`, { input: value });
  }
  if (traceId === INVALID_TRACE_ID) {
    throw new FormatError('Trace id must not be all zeros', { input: value });
  }
  if (spanId === INVALID_SPAN_ID) {
    throw new FormatError('Span id must not be all zeros', { input: value });
  }

  return freeze(version, traceId, spanId, parseInt(flagsHex, 16));
}

/**
 * Serialize a context. Inverse of {@link parseTraceParent}.
 */
export function formatTraceParent(context: TraceContext): string {
  return `${toHexByte(context.version)}-${context.traceId}-${context.spanId}-${toHexByte(context.flags)}`;
}

// =============================================================================
// Propagation (inject/extract for message headers)
// =============================================================================

/**
 * Write the context into message headers.
 *
 * @returns New headers object (does not mutate input)
 */
export function injectTraceParent(headers: MessageHeaders, context: TraceContext): MessageHeaders {
  return { ...headers, [TRACEPARENT_HEADER]: formatTraceParent(context) };
}

/**
 * Read the context from message headers.
 *
 * @returns null when the header is absent
 * @throws FormatError when the header is present but malformed
 */
export function extractTraceParent(headers: MessageHeaders): TraceContext | null {
  const value = headers[TRACEPARENT_HEADER];
  if (value === undefined) {
    return null;
  }
  return parseTraceParent(value);
}

/**
 * Like {@link extractTraceParent} but treats an absent header as an error.
 *
 * @throws FormatError with code MISSING_TRACE_CONTEXT when the header is absent
 */
export function requireTraceParent(headers: MessageHeaders): TraceContext {
  const context = extractTraceParent(headers);
  if (!context) {
    throw new FormatError('Trace information not found in message', {
      code: ErrorCode.MISSING_TRACE_CONTEXT,
    });
  }
  return context;
}
