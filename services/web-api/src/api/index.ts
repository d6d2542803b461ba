/**
 * Express application factory.
 */

import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { getErrorMessage } from '@msgtrace/core';
import { createEnqueueRoutes } from './routes/enqueue.routes';
import { createHealthRoutes, createMetricsRoutes } from './routes/health.routes';
import type { WebApiDependencies } from './types';

export function createApp(deps: WebApiDependencies): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '16kb' }));

  app.use('/api', createEnqueueRoutes(deps));
  app.use(createHealthRoutes(deps.serviceName, deps.health));
  app.use(createMetricsRoutes(deps.exporter));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Express recognizes error handlers by their four parameters
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = error instanceof SyntaxError ? 400 : 500;
    deps.logger.warn('Request failed', { status, error: getErrorMessage(error) });
    res.status(status).json({ error: status === 400 ? 'Malformed request body' : 'Internal server error' });
  });

  return app;
}

export type { WebApiDependencies, MessagePublisher, HealthStateProvider } from './types';
export { DEFAULT_EVENT_NAME } from './routes/enqueue.routes';
