/**
 * Centralized Numeric and String Limits
 *
 * Integer bounds used by the range checks, and the truncation
 * applied when a value is rendered into a violation message.
 */

// =============================================================================
// Integer Bounds
// =============================================================================

/**
 * Largest signed 32-bit integer
 */
export const INT32_MAX = 2147483647;

/**
 * Largest unsigned 32-bit integer
 */
export const UINT32_MAX = 4294967295;

/**
 * Sentinel meaning "no upper bound" for vocabulary sizes
 */
export const UNBOUNDED_VOCAB_SIZE = -1;

// =============================================================================
// String Truncation Limits
// =============================================================================

/**
 * Truncation for values embedded in violation messages
 */
export const TRUNCATE_VALUE = 80;

/**
 * Truncation for CLI output of a whole bundle
 */
export const TRUNCATE_BUNDLE = 2000;

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Truncate a string to the specified length with ellipsis
 *
 * @param maxLength - Maximum length (default: TRUNCATE_VALUE)
 * @param suffix - Suffix to add when truncated (default: '...')
 */
export function truncate(
  str: string,
  maxLength: number = TRUNCATE_VALUE,
  suffix: string = '...'
): string {
  if (!str || str.length <= maxLength) {
    return str;
  }
  return str.slice(0, maxLength - suffix.length) + suffix;
}

/**
 * Render an arbitrary value for a human-readable message
 */
export function describeValue(value: unknown, maxLength: number = TRUNCATE_VALUE): string {
  if (value === undefined) return 'undefined';
  if (typeof value === 'function') {
    return value.name ? `[function ${value.name}]` : '[function]';
  }
  if (typeof value === 'bigint' || typeof value === 'symbol') {
    return truncate(value.toString(), maxLength);
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return String(value);
  }
  if (value instanceof Set) {
    return truncate(`{${[...value].map((v) => toJson(v)).join(', ')}}`, maxLength);
  }
  if (value instanceof Map) {
    return truncate(`Map(${value.size})`, maxLength);
  }
  return truncate(toJson(value), maxLength);
}

/**
 * JSON rendering for message text. Cyclic structures and nested bigints
 * cannot be serialized and fall back to a coarse tag.
 */
function toJson(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch (error) {
    if (!(error instanceof TypeError)) throw error;
    return Array.isArray(value) ? '[array]' : '[object]';
  }
}
