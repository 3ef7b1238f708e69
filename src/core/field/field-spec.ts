/**
 * FieldSpec: the constraints for one named column.
 */
import { ContractDefinitionError, ErrorCodes } from '../../utils/errors.js';
import { formatPattern, formatSet, formatValue } from '../../utils/format.js';
import { evaluateColumn } from '../evaluator/evaluator.js';
import type { Violation } from '../report/violation.js';
import {
  compareValues,
  isComparable,
  isOrderableTag,
  isTypeTag,
  matchesType,
  tagForBound,
  type TypeTag,
} from '../types/value-types.js';
import type { Bound, FieldOptions, ResolvedField } from './types.js';

/**
 * Constraints attached to one column. Immutable once built.
 *
 * Misconfiguration throws ContractDefinitionError here rather than at
 * validation time, since a contract is defined once and reused.
 *
 * @example
 * const age = new FieldSpec({ name: 'age', type: 'integer', min: 0, max: 120 });
 * age.check([25, 999]); // one AboveMax violation for row 1
 */
export class FieldSpec implements ResolvedField {
  readonly name: string;
  readonly type: TypeTag | undefined;
  readonly effectiveType: TypeTag | undefined;
  readonly required: boolean;
  readonly min: Bound | undefined;
  readonly max: Bound | undefined;
  readonly allowed: readonly unknown[] | undefined;
  readonly pattern: RegExp | undefined;
  readonly unique: boolean;
  readonly description: string | undefined;

  constructor(options: FieldOptions) {
    this.name = checkName(options.name);
    this.type = checkType(this.name, options.type);
    this.required = options.required ?? false;
    this.unique = options.unique ?? false;
    this.description = options.description;
    this.pattern = compilePattern(this.name, this.type, options.pattern);

    this.effectiveType = this.type ?? inferType(this.pattern, options.min, options.max);
    this.min = checkBound(this.name, 'min', options.min, this.effectiveType);
    this.max = checkBound(this.name, 'max', options.max, this.effectiveType);
    if (this.min !== undefined && this.max !== undefined && compareValues(this.min, this.max) > 0) {
      throw new ContractDefinitionError(
        ErrorCodes.MIN_GREATER_THAN_MAX,
        `Field '${this.name}': min must not be greater than max`,
        { field: this.name }
      );
    }

    this.allowed = checkAllowed(this.name, options.allowed);
    Object.freeze(this);
  }

  /**
   * Check a present column's values. Presence itself is the contract's concern.
   * Holes in a sparse array are checked as `undefined`.
   */
  check(values: readonly unknown[]): Violation[] {
    return evaluateColumn(this, Array.from(values));
  }

  /**
   * Constraint summary, used by the `inspect` command.
   */
  describe(): string[] {
    const parts: string[] = [];
    parts.push(`type=${this.type ?? (this.effectiveType ? `${this.effectiveType} (implied)` : 'any')}`);
    if (this.required) parts.push('required');
    if (this.min !== undefined) parts.push(`min=${formatValue(this.min)}`);
    if (this.max !== undefined) parts.push(`max=${formatValue(this.max)}`);
    if (this.allowed !== undefined) parts.push(`allowed=${formatSet(this.allowed)}`);
    if (this.pattern !== undefined) parts.push(`pattern=${formatPattern(this.pattern)}`);
    if (this.unique) parts.push('unique');
    return parts;
  }
}

function checkName(name: unknown): string {
  if (typeof name !== 'string' || name.trim() === '') {
    throw new ContractDefinitionError(ErrorCodes.EMPTY_FIELD_NAME, 'Field name must be a non-empty string');
  }
  return name;
}

function checkType(name: string, type: unknown): TypeTag | undefined {
  if (type === undefined) return undefined;
  if (!isTypeTag(type)) {
    throw new ContractDefinitionError(
      ErrorCodes.UNKNOWN_TYPE,
      `Field '${name}': unknown type '${String(type)}'`,
      { field: name, type: String(type) }
    );
  }
  return type;
}

function compilePattern(
  name: string,
  type: TypeTag | undefined,
  pattern: string | RegExp | undefined
): RegExp | undefined {
  if (pattern === undefined) return undefined;

  if (type !== undefined && type !== 'string') {
    throw new ContractDefinitionError(
      ErrorCodes.PATTERN_REQUIRES_STRING,
      `Field '${name}': pattern requires type string, got ${type}`,
      { field: name, type }
    );
  }

  // g and y make test() stateful through lastIndex
  if (pattern instanceof RegExp) {
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  }
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new ContractDefinitionError(
      ErrorCodes.INVALID_PATTERN,
      `Field '${name}': invalid pattern '${pattern}': ${error instanceof Error ? error.message : String(error)}`,
      { field: name, pattern }
    );
  }
}

/**
 * Type implied when none is declared: a pattern implies string,
 * otherwise the kind of the first bound given.
 */
function inferType(pattern: RegExp | undefined, min: unknown, max: unknown): TypeTag | undefined {
  if (pattern !== undefined) return 'string';
  const bound = min ?? max;
  if (bound === undefined || !isComparable(bound)) return undefined;
  return tagForBound(bound);
}

function checkBound(
  name: string,
  which: 'min' | 'max',
  bound: unknown,
  type: TypeTag | undefined
): Bound | undefined {
  if (bound === undefined) return undefined;

  if (type !== undefined && !isOrderableTag(type)) {
    throw new ContractDefinitionError(
      ErrorCodes.BOUNDS_NOT_ORDERABLE,
      `Field '${name}': ${which} is not supported for type ${type}`,
      { field: name, type }
    );
  }

  if (!isComparable(bound) || type === undefined || !matchesType(bound, type)) {
    throw new ContractDefinitionError(
      ErrorCodes.BOUND_TYPE_MISMATCH,
      `Field '${name}': ${which} must be a ${type ?? 'number, string or date'} value`,
      { field: name, bound: String(bound) }
    );
  }

  return bound instanceof Date ? new Date(bound.getTime()) : bound;
}

function checkAllowed(name: string, allowed: readonly unknown[] | undefined): readonly unknown[] | undefined {
  if (allowed === undefined) return undefined;
  if (!Array.isArray(allowed) || allowed.length === 0) {
    throw new ContractDefinitionError(
      ErrorCodes.EMPTY_ALLOWED_SET,
      `Field '${name}': allowed must be a non-empty list`,
      { field: name }
    );
  }
  return Object.freeze([...allowed]);
}
