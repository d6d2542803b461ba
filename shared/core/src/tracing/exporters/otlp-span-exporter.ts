/**
 * OTLP/HTTP JSON span exporter.
 *
 * Lightweight exporter that does not depend on the OpenTelemetry SDK; spans
 * are converted to the OTLP JSON shape and POSTed with native `fetch` to
 * `{endpoint}/v1/traces`.
 *
 * OTLP/HTTP JSON protocol reference:
 * https://opentelemetry.io/docs/specs/otlp/#otlphttp
 */

import type { ReadableSpan, SpanKind, SpanStatus } from '../span';
import { postJson, FetchFn } from './http-export';
import { ExportResult, ExporterStats, SpanExporter } from './types';

// =============================================================================
// Types
// =============================================================================

export interface OtlpSpanExporterConfig {
  /** OTEL collector endpoint (e.g., "http://localhost:4318") */
  endpoint: string;
  /** Value of the `service.name` resource attribute */
  serviceName: string;
  /** Request timeout in ms */
  requestTimeoutMs?: number;
  resourceAttributes?: Record<string, string>;
  fetchImpl?: FetchFn;
}

interface OtlpKeyValue {
  key: string;
  value: { stringValue: string };
}

export interface OtlpSpan {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  name: string;
  kind: number;
  startTimeUnixNano: string;
  endTimeUnixNano: string;
  attributes: OtlpKeyValue[];
  events: Array<{ timeUnixNano: string; name: string; attributes: OtlpKeyValue[] }>;
  status: { code: number; message?: string };
}

export interface OtlpTraceExportRequest {
  resourceSpans: Array<{
    resource: { attributes: OtlpKeyValue[] };
    scopeSpans: Array<{
      scope: { name: string; version: string };
      spans: OtlpSpan[];
    }>;
  }>;
}

/**
 * OTLP SpanKind numbers.
 * @see https://opentelemetry.io/docs/specs/otel/trace/api/#spankind
 */
const OTLP_SPAN_KIND: Record<SpanKind, number> = {
  internal: 1,
  server: 2,
  client: 3,
  producer: 4,
  consumer: 5,
};

const SCOPE = { name: '@msgtrace/core', version: '1.0.0' };

// =============================================================================
// Conversion
// =============================================================================

function toKeyValues(record: Readonly<Record<string, string>> | undefined): OtlpKeyValue[] {
  if (!record) return [];
  return Object.entries(record).map(([key, value]) => ({ key, value: { stringValue: value } }));
}

function toUnixNano(ms: number): string {
  return String(BigInt(ms) * 1_000_000n);
}

function toOtlpStatus(status: SpanStatus): OtlpSpan['status'] {
  switch (status.code) {
    case 'unset':
      return { code: 0 };
    case 'ok':
      return { code: 1 };
    case 'error':
      return { code: 2, message: status.description };
  }
}

export function toOtlpSpan(span: ReadableSpan): OtlpSpan {
  const otlp: OtlpSpan = {
    traceId: span.traceId,
    spanId: span.id,
    name: span.name,
    kind: OTLP_SPAN_KIND[span.kind],
    startTimeUnixNano: toUnixNano(span.startTime),
    endTimeUnixNano: toUnixNano(span.endTime ?? span.startTime),
    attributes: toKeyValues(span.tags),
    events: span.events.map(event => ({
      timeUnixNano: toUnixNano(event.timestamp),
      name: event.name,
      attributes: toKeyValues(event.attributes),
    })),
    status: toOtlpStatus(span.status),
  };
  if (span.parentId) {
    otlp.parentSpanId = span.parentId;
  }
  return otlp;
}

// =============================================================================
// Exporter
// =============================================================================

export class OtlpSpanExporter implements SpanExporter {
  readonly name = 'otlp';

  private readonly url: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: FetchFn;
  private readonly resourceAttributes: OtlpKeyValue[];
  private stopped = false;
  private exportCount = 0;
  private dropCount = 0;

  constructor(config: OtlpSpanExporterConfig) {
    this.url = `${config.endpoint.replace(/\/+$/, '')}/v1/traces`;
    this.requestTimeoutMs = config.requestTimeoutMs ?? 5000;
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.resourceAttributes = toKeyValues({
      'service.name': config.serviceName,
      ...config.resourceAttributes,
    });
  }

  buildRequest(spans: ReadonlyArray<ReadableSpan>): OtlpTraceExportRequest {
    return {
      resourceSpans: [
        {
          resource: { attributes: this.resourceAttributes },
          scopeSpans: [{ scope: SCOPE, spans: spans.map(toOtlpSpan) }],
        },
      ],
    };
  }

  async export(spans: ReadonlyArray<ReadableSpan>): Promise<ExportResult> {
    if (this.stopped) {
      this.dropCount += spans.length;
      return { code: 'retryable-error', error: new Error('OTLP exporter is shut down') };
    }

    const result = await postJson(this.fetchImpl, this.url, this.buildRequest(spans), this.requestTimeoutMs);
    if (result.code === 'success') {
      this.exportCount += spans.length;
    } else {
      this.dropCount += spans.length;
    }
    return result;
  }

  async shutdown(): Promise<void> {
    this.stopped = true;
  }

  getStats(): ExporterStats {
    return { exportCount: this.exportCount, dropCount: this.dropCount };
  }
}
