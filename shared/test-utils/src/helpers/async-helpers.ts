/**
 * Async Test Helpers
 */

/**
 * Wait for a condition to be true with exponential backoff
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  options: { timeout?: number; initialInterval?: number; maxInterval?: number } = {}
): Promise<void> {
  const { timeout = 2000, initialInterval = 5, maxInterval = 50 } = options;
  const startTime = Date.now();
  let interval = initialInterval;

  while (Date.now() - startTime < timeout) {
    if (await condition()) {
      return;
    }
    await new Promise(resolve => setTimeout(resolve, interval));
    interval = Math.min(interval * 2, maxInterval);
  }

  throw new Error(`waitFor timeout after ${timeout}ms`);
}

/**
 * Let pending promise callbacks run. Works under fake timers.
 */
export async function flushPromises(rounds = 5): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
