/**
 * @msgtrace/core - Core Library
 *
 * Trace context propagation over message queues: the traceparent codec,
 * spans and exporters, diagnostic sources and collectors, the traced
 * producer and consumer, and the Redis Streams broker they run on.
 *
 * @module @msgtrace/core
 */

// =============================================================================
// Errors
// =============================================================================

export * from './errors';

// =============================================================================
// Logging (Pino)
// =============================================================================

export * from './logging';

// =============================================================================
// Async Primitives
// =============================================================================

export * from './async';

// =============================================================================
// Tracing
// =============================================================================

export * from './tracing';
export * from './telemetry';

// =============================================================================
// Messaging
// =============================================================================

export * from './messaging';
export * from './redis';

// =============================================================================
// Service Lifecycle
// =============================================================================

export * from './service-lifecycle';
