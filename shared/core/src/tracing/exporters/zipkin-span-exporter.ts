/**
 * Zipkin v2 JSON span exporter.
 *
 * @see https://zipkin.io/zipkin-api/#/default/post_spans
 */

import type { ReadableSpan, SpanKind } from '../span';
import { postJson, FetchFn } from './http-export';
import { ExportResult, ExporterStats, SpanExporter } from './types';

export interface ZipkinSpanExporterConfig {
  /** Full collector URL, e.g. "http://localhost:9411/api/v2/spans" */
  url: string;
  serviceName: string;
  requestTimeoutMs?: number;
  fetchImpl?: FetchFn;
}

export interface ZipkinSpan {
  traceId: string;
  id: string;
  parentId?: string;
  name: string;
  kind?: 'CLIENT' | 'SERVER' | 'PRODUCER' | 'CONSUMER';
  /** Epoch microseconds */
  timestamp: number;
  /** Microseconds */
  duration: number;
  localEndpoint: { serviceName: string };
  tags: Record<string, string>;
  annotations: Array<{ timestamp: number; value: string }>;
}

const ZIPKIN_KIND: Record<SpanKind, ZipkinSpan['kind']> = {
  internal: undefined,
  server: 'SERVER',
  client: 'CLIENT',
  producer: 'PRODUCER',
  consumer: 'CONSUMER',
};

export function toZipkinSpan(span: ReadableSpan, serviceName: string): ZipkinSpan {
  const endTime = span.endTime ?? span.startTime;
  const tags: Record<string, string> = { ...span.tags };
  if (span.status.code === 'error') {
    tags['otel.status_code'] = 'ERROR';
    tags.error = span.status.description;
  } else if (span.status.code === 'ok') {
    tags['otel.status_code'] = 'OK';
  }

  const zipkin: ZipkinSpan = {
    traceId: span.traceId,
    id: span.id,
    name: span.name,
    timestamp: span.startTime * 1000,
    duration: (endTime - span.startTime) * 1000,
    localEndpoint: { serviceName },
    tags,
    annotations: span.events.map(event => ({ timestamp: event.timestamp * 1000, value: event.name })),
  };
  const kind = ZIPKIN_KIND[span.kind];
  if (kind) {
    zipkin.kind = kind;
  }
  if (span.parentId) {
    zipkin.parentId = span.parentId;
  }
  return zipkin;
}

export class ZipkinSpanExporter implements SpanExporter {
  readonly name = 'zipkin';

  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: FetchFn;
  private stopped = false;
  private exportCount = 0;
  private dropCount = 0;

  constructor(private readonly config: ZipkinSpanExporterConfig) {
    this.requestTimeoutMs = config.requestTimeoutMs ?? 5000;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async export(spans: ReadonlyArray<ReadableSpan>): Promise<ExportResult> {
    if (this.stopped) {
      this.dropCount += spans.length;
      return { code: 'retryable-error', error: new Error('Zipkin exporter is shut down') };
    }

    const payload = spans.map(span => toZipkinSpan(span, this.config.serviceName));
    const result = await postJson(this.fetchImpl, this.config.url, payload, this.requestTimeoutMs);
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
