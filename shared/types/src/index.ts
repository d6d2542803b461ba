// Shared types for the traced messaging services

// =============================================================================
// Queues & Instrumentation Names
// =============================================================================

/**
 * Queue (stream) names. Single source of truth for producers and consumers.
 */
export const Queues = {
  WEB: 'msgtrace:web-queue',
} as const;

/**
 * Diagnostic source written by the broker producer.
 */
export const BROKER_DIAGNOSTIC_SOURCE = 'Msgtrace.Broker';

/**
 * Operation names used for spans.
 */
export const SpanNames = {
  PUBLISH: 'Publish to queue',
  PROCESS: 'Process single queue message',
  ENQUEUE_REQUEST: 'Enqueue request',
} as const;

export const MetricNames = {
  ENQUEUED_ITEM: 'Enqueued_Item',
  PROCESSED_ITEM: 'Processed_Item',
  PROCESSING_FAILED: 'Processing_Failed',
} as const;

// =============================================================================
// Messages
// =============================================================================

/**
 * Body of a message published by the web API.
 */
export interface EnqueuedMessage {
  eventName: string;
  source: string;
  /** Unix epoch milliseconds */
  enqueuedAt: number;
}

export function isEnqueuedMessage(value: unknown): value is EnqueuedMessage {
  if (!value || typeof value !== 'object') {
    return false;
  }
  return (
    'eventName' in value && typeof value.eventName === 'string' &&
    'source' in value && typeof value.source === 'string' &&
    'enqueuedAt' in value && typeof value.enqueuedAt === 'number'
  );
}
