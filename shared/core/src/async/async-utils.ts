/**
 * Shared Async Utilities
 *
 * Timeouts, cancellable delays and shutdown helpers used by the broker
 * consumer, the exporters and the service entry points.
 */

import { OperationCancelledError, TimeoutError, getErrorMessage } from '../errors/error-handling';

// =============================================================================
// Timeout Utilities
// =============================================================================

/**
 * @throws TimeoutError if the operation does not settle within timeoutMs
 */
async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operationName?: string
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
    throw new TypeError(`withTimeout: timeoutMs must be a non-negative finite number, got ${timeoutMs}`);
  }

  let timeoutId: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(operationName || 'operation', timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

// =============================================================================
// Delay Utilities
// =============================================================================

/**
 * Sleep that can be interrupted through an AbortSignal.
 *
 * Rejects with OperationCancelledError immediately when the signal is
 * already aborted or aborts while waiting. The timer is cleared on abort.
 *
 * @example
 * ```ts
 * try {
 *   await delay(3000, signal);
 * } catch (error) {
 *   if (error instanceof OperationCancelledError) return;
 *   throw error;
 * }
 * ```
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCancelledError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new OperationCancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Resolve when the signal aborts. Never resolves for an absent signal.
 */
export function whenAborted(signal?: AbortSignal): Promise<void> {
  return new Promise<void>(resolve => {
    if (!signal) return;
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

// =============================================================================
// Deferred
// =============================================================================

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason?: unknown) => void;
}

export function createDeferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason?: unknown) => void = () => undefined;

  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
}

// =============================================================================
// Shutdown
// =============================================================================

/**
 * Run cleanup functions in order, each bounded by timeoutMs.
 * A failing or slow cleanup is logged and the next one still runs.
 */
export async function gracefulShutdown(
  resources: Array<{ name: string; cleanup: () => Promise<void> }>,
  timeoutMs: number,
  logger?: { warn: (msg: string, meta?: Record<string, unknown>) => void }
): Promise<void> {
  for (const resource of resources) {
    try {
      await withTimeout(resource.cleanup(), timeoutMs, `${resource.name} cleanup`);
    } catch (error) {
      if (error instanceof TimeoutError) {
        logger?.warn(`${resource.name} cleanup timed out`, { timeoutMs });
      } else {
        logger?.warn(`${resource.name} cleanup failed`, { error: getErrorMessage(error) });
      }
    }
  }
}
