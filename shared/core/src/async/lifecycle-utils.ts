/**
 * Lifecycle Utilities
 *
 * Clears a timer and returns null for direct assignment:
 *
 * ```typescript
 * this.pollTimer = clearTimeoutSafe(this.pollTimer);
 * ```
 */

export function clearTimeoutSafe(timeout: NodeJS.Timeout | null): null {
  if (timeout) {
    clearTimeout(timeout);
  }
  return null;
}
