/**
 * Semantic type tags and the value classifier.
 *
 * Coercion policy:
 * - `integer` accepts numbers for which `Number.isInteger` holds and bigints.
 *   JavaScript has one number type, so `3.0` is the integer `3`.
 * - `float` accepts every number except NaN (integers and ±Infinity included) and bigints.
 * - `string`, `boolean` accept only their primitive type; nothing is parsed.
 * - `timestamp` accepts `Date` instances with a valid time value.
 * - NaN, invalid dates, null and undefined never match any tag.
 */

export const TYPE_TAGS = ['integer', 'float', 'string', 'boolean', 'timestamp'] as const;

export type TypeTag = (typeof TYPE_TAGS)[number];

/**
 * What a value actually is, as shown in the `got <actual>` part of a type mismatch.
 */
export type ActualType =
  | 'integer'
  | 'float'
  | 'string'
  | 'boolean'
  | 'timestamp'
  | 'nan'
  | 'invalid-date'
  | 'null'
  | 'undefined'
  | 'array'
  | 'object'
  | 'function'
  | 'symbol';

/**
 * Types whose values have a native ordering usable by min/max.
 */
export type OrderableTag = Exclude<TypeTag, 'boolean'>;

export function isTypeTag(value: unknown): value is TypeTag {
  return TYPE_TAGS.some((tag) => tag === value);
}

export function isOrderableTag(tag: TypeTag): tag is OrderableTag {
  return tag !== 'boolean';
}

/**
 * Classify a runtime value into the tag used for reporting.
 * Integral numbers classify as `integer` even when declared as floats.
 */
export function classifyValue(value: unknown): ActualType {
  if (value === null) return 'null';
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'invalid-date' : 'timestamp';
  }
  if (Array.isArray(value)) return 'array';

  switch (typeof value) {
    case 'number':
      if (Number.isNaN(value)) return 'nan';
      return Number.isInteger(value) ? 'integer' : 'float';
    case 'bigint':
      return 'integer';
    case 'string':
      return 'string';
    case 'boolean':
      return 'boolean';
    case 'undefined':
      return 'undefined';
    case 'function':
      return 'function';
    case 'symbol':
      return 'symbol';
    default:
      return 'object';
  }
}

/**
 * Whether a value satisfies a type tag under the coercion policy above.
 */
export function matchesType(value: unknown, tag: TypeTag): boolean {
  const actual = classifyValue(value);
  if (tag === 'float') {
    return actual === 'integer' || actual === 'float';
  }
  return actual === tag;
}

/**
 * Orderable value narrowed for comparison.
 */
export type Comparable = number | bigint | string | Date;

export function isComparable(value: unknown): value is Comparable {
  return (
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'string' ||
    value instanceof Date
  );
}

/**
 * Compare two well-typed values of the same orderable tag.
 * Returns a negative number, zero or a positive number like a sort comparator.
 */
export function compareValues(a: Comparable, b: Comparable): number {
  const left = a instanceof Date ? a.getTime() : a;
  const right = b instanceof Date ? b.getTime() : b;
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * The tag a bound implies on a field that declares no type.
 */
export function tagForBound(bound: Comparable): OrderableTag {
  if (bound instanceof Date) return 'timestamp';
  if (typeof bound === 'string') return 'string';
  return 'float';
}

/**
 * Create the key function used for uniqueness and set membership:
 * SameValueZero for primitives, time value for dates, identity for other objects.
 *
 * Dates map to symbols owned by the returned function, so no cell value
 * can share a key with a date. Use one key function per comparison.
 */
export function createEqualityKey(): (value: unknown) => unknown {
  const dateKeys = new Map<number, symbol>();

  return (value) => {
    if (!(value instanceof Date)) return value;
    const time = value.getTime();
    let key = dateKeys.get(time);
    if (key === undefined) {
      key = Symbol(`date:${time}`);
      dateKeys.set(time, key);
    }
    return key;
  };
}

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Parse an ISO-8601 date or date-time string.
 * Returns undefined for anything else, including impossible dates.
 */
export function parseTimestamp(text: string): Date | undefined {
  if (!ISO_TIMESTAMP.test(text)) return undefined;
  const date = new Date(text);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
