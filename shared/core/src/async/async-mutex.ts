/**
 * AsyncMutex
 *
 * Mutual exclusion for async operations. Callers queue in FIFO order and the
 * lock is handed directly to the next waiter on release, so a new caller can
 * never slip in between a release and the waiter's wake-up.
 *
 * @example
 * ```ts
 * const mutex = new AsyncMutex();
 *
 * await mutex.runExclusive(async () => {
 *   await channel.publish(queue, headers, body);
 * });
 * ```
 */

export class AsyncMutex {
  private locked = false;
  private waitQueue: Array<{ resolve: () => void; reject: (err: Error) => void }> = [];

  /**
   * Acquire the mutex, waiting if it is held.
   *
   * @returns A release function that MUST be called when done
   */
  async acquire(): Promise<() => void> {
    if (this.locked) {
      await new Promise<void>((resolve, reject) => {
        this.waitQueue.push({ resolve, reject });
      });
    }

    this.locked = true;
    return this.createRelease();
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  /**
   * Reject every queued waiter with the given error.
   *
   * @returns The number of waiters that were cancelled
   */
  cancelWaiters(reason: Error): number {
    const waiters = this.waitQueue.splice(0);
    for (const waiter of waiters) {
      waiter.reject(reason);
    }
    return waiters.length;
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waitQueue.shift();
      if (next) {
        // Hand off without unlocking; setImmediate keeps long queues off the stack
        setImmediate(() => next.resolve());
      } else {
        this.locked = false;
      }
    };
  }
}
