/**
 * Formatting utilities for cell values, bounds and allowed sets.
 */

/**
 * Render a single value for display in a report line.
 *
 * Strings are shown raw, dates as ISO-8601, arrays and plain objects as JSON.
 */
export function formatValue(value: unknown): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (value instanceof RegExp) {
    return formatPattern(value);
  }
  if (typeof value === 'object' && value !== null) {
    try {
      return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v));
    } catch {
      return Object.prototype.toString.call(value);
    }
  }
  return String(value);
}

/**
 * Render a list of values as `{a, b, c}`, keeping the given order.
 */
export function formatSet(values: readonly unknown[]): string {
  return `{${values.map(formatValue).join(', ')}}`;
}

/**
 * Render a regular expression: plain source, or `/source/flags` when flags are set.
 */
export function formatPattern(pattern: RegExp): string {
  return pattern.flags ? `/${pattern.source}/${pattern.flags}` : pattern.source;
}

/**
 * Pluralize a count: `1 violation`, `2 violations`.
 */
export function pluralize(count: number, noun: string): string {
  return `${count} ${count === 1 ? noun : `${noun}s`}`;
}
