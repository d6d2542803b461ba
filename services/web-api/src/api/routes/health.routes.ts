/**
 * Health and Metrics Routes
 */

import { Router, Request, Response } from 'express';
import { PROMETHEUS_CONTENT_TYPE } from '@msgtrace/metrics';
import type { PrometheusExporter } from '@msgtrace/metrics';
import type { HealthStateProvider } from '../types';

export function createHealthRoutes(serviceName: string, state: HealthStateProvider): Router {
  const router = Router();

  /**
   * GET /health
   * 200 while running, 503 otherwise.
   */
  router.get('/health', (_req: Request, res: Response) => {
    const running = state.getIsRunning();
    res.status(running ? 200 : 503).json({
      service: serviceName,
      status: running ? 'healthy' : 'unhealthy',
      timestamp: Date.now(),
    });
  });

  return router;
}

export function createMetricsRoutes(exporter: PrometheusExporter): Router {
  const router = Router();

  /**
   * GET /metrics
   * Prometheus text exposition.
   */
  router.get('/metrics', async (_req: Request, res: Response) => {
    const result = await exporter.export();
    if (!result.success) {
      res.status(500).json({ error: 'Metrics export failed', errors: result.errors ?? [] });
      return;
    }
    res.type(PROMETHEUS_CONTENT_TYPE).send(result.data);
  });

  return router;
}
