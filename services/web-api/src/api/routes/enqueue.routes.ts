/**
 * Enqueue Routes
 *
 * POST /api/enqueue/:source publishes an EnqueuedMessage to the web queue.
 * The request runs under a server span that continues an incoming
 * `traceparent`; the publish span becomes its child.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import {
  FormatError,
  TRACEPARENT_HEADER,
  errorStatus,
  extractTraceParent,
  getErrorMessage,
} from '@msgtrace/core';
import type { TraceContext } from '@msgtrace/core';
import { MetricNames, SpanNames } from '@msgtrace/types';
import type { EnqueuedMessage } from '@msgtrace/types';
import type { WebApiDependencies } from '../types';

export const DEFAULT_EVENT_NAME = 'Item enqueued';

const SourceSchema = z
  .string()
  .regex(/^[A-Za-z0-9._-]{1,64}$/, 'Source must be 1-64 letters, digits, dots, dashes or underscores');

const EnqueueBodySchema = z
  .object({
    eventName: z.string().trim().min(1).max(200).optional(),
  })
  .default({});

/**
 * An unreadable incoming header starts a new trace rather than failing the
 * request.
 */
function incomingContext(req: Request, deps: WebApiDependencies): TraceContext | undefined {
  const raw = req.header(TRACEPARENT_HEADER);
  if (!raw) {
    return undefined;
  }
  try {
    return extractTraceParent({ [TRACEPARENT_HEADER]: raw }) ?? undefined;
  } catch (error) {
    if (error instanceof FormatError) {
      deps.logger.debug('Ignoring malformed incoming traceparent', { error: error.message });
      return undefined;
    }
    throw error;
  }
}

export function createEnqueueRoutes(deps: WebApiDependencies): Router {
  const router = Router();

  router.post('/enqueue/:source', async (req: Request, res: Response) => {
    const source = SourceSchema.safeParse(req.params.source);
    const body = EnqueueBodySchema.safeParse(req.body ?? {});
    if (!source.success || !body.success) {
      const issues = [
        ...(source.success ? [] : source.error.errors),
        ...(body.success ? [] : body.error.errors),
      ].map(issue => issue.message);
      res.status(400).json({ error: 'Invalid enqueue request', issues });
      return;
    }

    const span = deps.tracer.startSpan(SpanNames.ENQUEUE_REQUEST, {
      kind: 'server',
      parent: incomingContext(req, deps),
      tags: { 'http.method': 'POST', source: source.data },
    });

    const message: EnqueuedMessage = {
      eventName: body.data.eventName ?? DEFAULT_EVENT_NAME,
      source: source.data,
      enqueuedAt: Date.now(),
    };

    try {
      const result = await deps.publisher.publish(message, { parent: span.context });
      deps.metrics.incrementCounter(MetricNames.ENQUEUED_ITEM, { Source: source.data });
      span.setTag('messaging.message_id', result.messageId);

      res.status(202).json({
        messageId: result.messageId,
        traceId: result.traceContext.traceId,
        source: source.data,
      });
    } catch (error) {
      span.setStatus(errorStatus(getErrorMessage(error)));
      deps.logger.error('Enqueue failed', { source: source.data, error: getErrorMessage(error) });
      res.status(503).json({ error: 'Failed to enqueue message' });
    } finally {
      span.end();
    }
  });

  return router;
}
