/**
 * Async Module
 *
 * Mutex, cancellable delays and timer helpers.
 */

export { AsyncMutex } from './async-mutex';

export {
  delay,
  whenAborted,
  createDeferred,
  gracefulShutdown,
} from './async-utils';
export type { Deferred } from './async-utils';

export { clearTimeoutSafe } from './lifecycle-utils';
