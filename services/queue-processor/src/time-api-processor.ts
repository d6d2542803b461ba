/**
 * Time API Processor
 *
 * Processing step for web queue messages: call the downstream time API
 * under a client span that carries `traceparent`, then record the message's
 * event name on the consumer span.
 */

import {
  ErrorCode,
  FormatError,
  ProcessingError,
  TRACEPARENT_HEADER,
  Tracer,
  errorStatus,
  formatTraceParent,
  getErrorMessage,
} from '@msgtrace/core';
import type { MessageProcessor, Span } from '@msgtrace/core';
import type { IMetricsCollector } from '@msgtrace/metrics';
import { MetricNames, isEnqueuedMessage } from '@msgtrace/types';
import type { EnqueuedMessage } from '@msgtrace/types';

export const DB_TIME_PATH = '/api/time/dbtime';

export interface TimeApiProcessorOptions {
  apiUrl: string;
  tracer: Tracer;
  metrics: IMetricsCollector;
  /** Default: global fetch */
  fetchImpl?: typeof fetch;
  requestTimeoutMs?: number;
}

/**
 * @throws FormatError when the body is not an EnqueuedMessage
 */
export function parseEnqueuedMessage(body: string): EnqueuedMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new FormatError(`Message body is not JSON: ${getErrorMessage(error)}`, { code: ErrorCode.INVALID_ARGUMENT, input: body });
  }
  if (!isEnqueuedMessage(parsed)) {
    throw new FormatError('Message body is not an enqueued message', { code: ErrorCode.INVALID_ARGUMENT, input: body });
  }
  return parsed;
}

export function createTimeApiProcessor(options: TimeApiProcessorOptions): MessageProcessor {
  const fetchImpl = options.fetchImpl ?? fetch;
  const requestTimeoutMs = options.requestTimeoutMs ?? 5000;
  const url = `${options.apiUrl.replace(/\/+$/, '')}${DB_TIME_PATH}`;

  async function fetchDbTime(parent: Span): Promise<string> {
    const span = options.tracer.startSpan(`GET ${DB_TIME_PATH}`, {
      parent,
      kind: 'client',
      tags: { 'http.method': 'GET', 'http.url': url },
    });

    try {
      const response = await fetchImpl(url, {
        headers: { [TRACEPARENT_HEADER]: formatTraceParent(span.context) },
        signal: AbortSignal.timeout(requestTimeoutMs),
      });
      span.setTag('http.status_code', String(response.status));
      if (!response.ok) {
        throw new ProcessingError(`Time API responded with HTTP ${response.status}`, {
          traceId: span.traceId,
          context: { url },
        });
      }
      return await response.text();
    } catch (error) {
      span.setStatus(errorStatus(getErrorMessage(error)));
      throw error;
    } finally {
      span.end();
    }
  }

  return async (delivery, { span, logger }) => {
    const time = await fetchDbTime(span);

    const message = parseEnqueuedMessage(delivery.body);
    if (message.eventName) {
      span.addEvent(message.eventName, { source: message.source });
    }

    options.metrics.incrementCounter(MetricNames.PROCESSED_ITEM, { Queue: delivery.queue });
    logger.debug('Processed message', { messageId: delivery.id, body: delivery.body, time });
  };
}
