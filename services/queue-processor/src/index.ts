/**
 * Queue Processor Entry Point
 *
 * Environment: see @msgtrace/config (REDIS_URL, API_URL, QUEUE_NAME,
 * METRICS_PORT, CONSUMER_RETRY_DELAY_MS, USE_OPENTELEMETRY, ...).
 */

export { QueueProcessorService } from './queue-processor';
export { createTimeApiProcessor, parseEnqueuedMessage } from './time-api-processor';
export { FailureMetricsReporter } from './failure-metrics-reporter';

import { createLogger, runServiceMain, setupServiceShutdown } from '@msgtrace/core';
import { loadConfig, safeParseInt } from '@msgtrace/config';
import { Queues } from '@msgtrace/types';
import { QueueProcessorService } from './queue-processor';

const SERVICE_NAME = 'queue-processor';

async function main(): Promise<void> {
  const config = loadConfig(process.env, {
    serviceName: SERVICE_NAME,
    queueName: Queues.WEB,
    port: 5003,
    metricsPort: 5003,
  });
  const logger = createLogger({ name: config.serviceName, level: config.logLevel });
  const service = new QueueProcessorService({ config, logger });

  // Abort the connect loop too if shutdown arrives before the broker is up
  const lifetime = new AbortController();

  setupServiceShutdown({
    logger,
    serviceName: config.serviceName,
    shutdownTimeoutMs: safeParseInt(process.env.SHUTDOWN_TIMEOUT_MS, 10000),
    onShutdown: async (deadline) => {
      lifetime.abort();
      await service.stop(deadline);
    },
  });

  await service.start(lifetime.signal);
}

runServiceMain({ main, serviceName: SERVICE_NAME });
