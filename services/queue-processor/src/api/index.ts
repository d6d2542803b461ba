/**
 * Health and metrics endpoints of the queue processor.
 */

import express from 'express';
import type { Express, Request, Response } from 'express';
import { ConsumerState } from '@msgtrace/core';
import type { ConsumerStats } from '@msgtrace/core';
import { PROMETHEUS_CONTENT_TYPE } from '@msgtrace/metrics';
import type { PrometheusExporter } from '@msgtrace/metrics';

export interface ProcessorStateProvider {
  getConsumerStats(): ConsumerStats;
}

export function createProcessorApp(
  serviceName: string,
  state: ProcessorStateProvider,
  exporter: PrometheusExporter
): Express {
  const app = express();
  app.disable('x-powered-by');

  /**
   * GET /health
   * 200 while consuming; 503 while connecting or disconnected.
   */
  app.get('/health', (_req: Request, res: Response) => {
    const stats = state.getConsumerStats();
    const consuming = stats.state === ConsumerState.CONSUMING;
    res.status(consuming ? 200 : 503).json({
      service: serviceName,
      status: consuming ? 'healthy' : 'unhealthy',
      consumer: stats,
      timestamp: Date.now(),
    });
  });

  app.get('/metrics', async (_req: Request, res: Response) => {
    const result = await exporter.export();
    if (!result.success) {
      res.status(500).json({ error: 'Metrics export failed', errors: result.errors ?? [] });
      return;
    }
    res.type(PROMETHEUS_CONTENT_TYPE).send(result.data);
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
