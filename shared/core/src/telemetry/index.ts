export { setupTelemetry, createSpanExporters, NO_TRACING_SINK_MESSAGE } from './setup';
export type { Telemetry, TelemetryOptions } from './setup';
