export { EXPORT_SUCCESS } from './types';
export type { ExportResult, ExporterStats, SpanExporter } from './types';
export { OtlpSpanExporter, toOtlpSpan } from './otlp-span-exporter';
export type { OtlpSpanExporterConfig, OtlpSpan, OtlpTraceExportRequest } from './otlp-span-exporter';
export { ZipkinSpanExporter, toZipkinSpan } from './zipkin-span-exporter';
export type { ZipkinSpanExporterConfig, ZipkinSpan } from './zipkin-span-exporter';
export { LoggingSpanExporter } from './logging-span-exporter';
export { InMemorySpanExporter } from './in-memory-span-exporter';
export type { FetchFn } from './http-export';
