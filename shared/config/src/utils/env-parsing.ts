/**
 * Environment Variable Parsing Utilities
 *
 * Value-based parsing functions that accept a raw string value and return
 * a parsed value or a safe default, composable with `??` and `||`.
 *
 * Conventions:
 * - Returns `defaultValue` for `undefined`, empty string, or invalid input
 * - Does NOT throw
 */

/**
 * Parse a string value as an integer, returning `defaultValue` if
 * the value is undefined, empty, or not a valid integer.
 *
 * @example
 * ```typescript
 * const timeout = safeParseInt(process.env.SHUTDOWN_TIMEOUT_MS, 10000);
 * ```
 */
export function safeParseInt(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

/**
 * Parse an on/off flag. `'1'`, `'true'`, `'yes'` and `'on'` enable it
 * (case-insensitive); the negative spellings disable it; anything else
 * yields `defaultValue`.
 */
export function parseBooleanFlag(value: string | undefined, defaultValue = false): boolean {
  if (!value) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return defaultValue;
}
