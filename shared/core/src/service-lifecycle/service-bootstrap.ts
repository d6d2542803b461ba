/**
 * Service Bootstrap Utilities
 *
 * Shutdown signal handling, the service entry point wrapper and HTTP server
 * closing shared by the web API and the queue processor.
 */

import type { Server } from 'http';
import type { ILogger } from '../logging/types';
import { getErrorMessage } from '../errors/error-handling';

// =============================================================================
// Types
// =============================================================================

export interface ServiceShutdownConfig {
  logger: ILogger;

  /**
   * Stops services and closes connections. Receives a signal that aborts
   * when the shutdown deadline passes.
   */
  onShutdown: (signal: AbortSignal) => Promise<void>;

  serviceName: string;

  /** Max time (ms) to wait for graceful shutdown before force-exiting (default: 10000) */
  shutdownTimeoutMs?: number;

  /** Process exit hook, replaced in tests (default: process.exit) */
  exit?: (code: number) => void;
}

/**
 * Removes every handler registered by setupServiceShutdown.
 */
export type ServiceShutdownCleanup = () => void;

export interface RunServiceMainConfig {
  main: () => Promise<void>;
  serviceName: string;
  logger?: ILogger;
}

// =============================================================================
// Graceful Shutdown
// =============================================================================

/**
 * Registers SIGTERM/SIGINT handlers that run `onShutdown` once, then exit.
 *
 * When `shutdownTimeoutMs` elapses the signal passed to `onShutdown` aborts,
 * giving in-flight work a chance to stop waiting; the process exits with
 * code 1 shortly after if `onShutdown` still has not returned.
 */
export function setupServiceShutdown(config: ServiceShutdownConfig): ServiceShutdownCleanup {
  const { logger, onShutdown, serviceName, shutdownTimeoutMs = 10000 } = config;
  const exit = config.exit ?? ((code: number) => process.exit(code));

  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.debug(`Already shutting down ${serviceName}, ignoring ${signal}`);
      return;
    }
    isShuttingDown = true;

    logger.info(`Received ${signal}, shutting down ${serviceName} gracefully`);

    const deadline = new AbortController();
    const deadlineTimer = setTimeout(() => {
      logger.warn(`${serviceName} shutdown exceeded ${shutdownTimeoutMs}ms, abandoning in-flight work`);
      deadline.abort();
    }, shutdownTimeoutMs);
    deadlineTimer.unref();

    const forceExitTimer = setTimeout(() => {
      logger.error(`${serviceName} shutdown timed out, forcing exit`);
      exit(1);
    }, shutdownTimeoutMs * 2);
    forceExitTimer.unref();

    try {
      await onShutdown(deadline.signal);
      exit(0);
    } catch (error) {
      logger.error(`Error during ${serviceName} shutdown`, {
        error: getErrorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      exit(1);
    } finally {
      clearTimeout(deadlineTimer);
      clearTimeout(forceExitTimer);
    }
  };

  const sigtermHandler = (): void => {
    void shutdown('SIGTERM');
  };
  const sigintHandler = (): void => {
    void shutdown('SIGINT');
  };
  const rejectionHandler = (reason: unknown): void => {
    logger.error(`Unhandled rejection in ${serviceName}`, { reason: getErrorMessage(reason) });
  };

  process.on('SIGTERM', sigtermHandler);
  process.on('SIGINT', sigintHandler);
  process.on('unhandledRejection', rejectionHandler);

  return () => {
    process.off('SIGTERM', sigtermHandler);
    process.off('SIGINT', sigintHandler);
    process.off('unhandledRejection', rejectionHandler);
  };
}

// =============================================================================
// Service Runner
// =============================================================================

/**
 * Runs a service's main() with a top-level catch. Skipped under Jest so that
 * importing an entry module from a test does not start the service.
 */
export function runServiceMain(config: RunServiceMainConfig): void {
  const { main, serviceName, logger } = config;

  if (process.env.JEST_WORKER_ID) {
    return;
  }

  main().catch((error: unknown) => {
    const message = `Unhandled error in ${serviceName}`;
    if (logger) {
      logger.fatal(message, { error: getErrorMessage(error) });
    } else {
      console.error(`${message}:`, error);
    }
    process.exit(1);
  });
}

/**
 * Close an HTTP server, resolving after `timeoutMs` at the latest.
 */
export async function closeServer(server: Server | null, timeoutMs = 5000): Promise<void> {
  if (!server || !server.listening) {
    return;
  }

  await new Promise<void>((resolve) => {
    let resolved = false;
    const safeResolve = (): void => {
      if (!resolved) {
        resolved = true;
        resolve();
      }
    };

    const timer = setTimeout(safeResolve, timeoutMs);

    server.close(() => {
      clearTimeout(timer);
      safeResolve();
    });
  });
}
