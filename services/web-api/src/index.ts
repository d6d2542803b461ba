/**
 * Web API Entry Point
 *
 * Environment: see @msgtrace/config (SERVICE_NAME, REDIS_URL, QUEUE_NAME,
 * PORT, USE_OPENTELEMETRY, OTEL_EXPORTER_ENDPOINT, ZIPKIN_URL, LOG_SPANS).
 */

export { WebApiService } from './web-api';
export { createApp } from './api';

import { createLogger, runServiceMain, setupServiceShutdown } from '@msgtrace/core';
import { loadConfig, safeParseInt } from '@msgtrace/config';
import { Queues } from '@msgtrace/types';
import { WebApiService } from './web-api';

const SERVICE_NAME = 'web-api';

async function main(): Promise<void> {
  const config = loadConfig(process.env, {
    serviceName: SERVICE_NAME,
    queueName: Queues.WEB,
    port: 5001,
    metricsPort: 5001,
  });
  const logger = createLogger({ name: config.serviceName, level: config.logLevel });

  const service = new WebApiService({ config, logger });
  await service.start();

  setupServiceShutdown({
    logger,
    serviceName: config.serviceName,
    shutdownTimeoutMs: safeParseInt(process.env.SHUTDOWN_TIMEOUT_MS, 10000),
    onShutdown: () => service.stop(),
  });
}

runServiceMain({ main, serviceName: SERVICE_NAME });
