/**
 * FieldSpec type definitions.
 */
import type { Comparable, TypeTag } from '../types/value-types.js';

/**
 * Value accepted for `min` / `max`.
 */
export type Bound = Comparable;

/**
 * Options a caller passes to build a FieldSpec.
 */
export interface FieldOptions {
  /** Column name, unique within a contract */
  name: string;
  /** Expected element type; omit for a type-agnostic column */
  type?: TypeTag;
  /** Column must be present in the dataset (default: false) */
  required?: boolean;
  /** Inclusive lower bound */
  min?: Bound;
  /** Inclusive upper bound */
  max?: Bound;
  /** Permitted values, in display order */
  allowed?: readonly unknown[];
  /** Regular expression each string value must match (unanchored unless the pattern says otherwise) */
  pattern?: string | RegExp;
  /** Every value must be distinct (default: false) */
  unique?: boolean;
  /** Free-text note shown by `inspect` */
  description?: string;
}

/**
 * Options for a field declared under its name as a key, as in `defineContract`.
 */
export type ColumnOptions = Omit<FieldOptions, 'name'>;

/**
 * A field's constraints after construction-time checks.
 * This is what the rules read; FieldSpec implements it.
 */
export interface ResolvedField {
  readonly name: string;
  /** Declared type */
  readonly type: TypeTag | undefined;
  /** Type the values are checked against: the declared type, or the one implied by pattern or bounds */
  readonly effectiveType: TypeTag | undefined;
  readonly required: boolean;
  readonly min: Bound | undefined;
  readonly max: Bound | undefined;
  readonly allowed: readonly unknown[] | undefined;
  readonly pattern: RegExp | undefined;
  readonly unique: boolean;
}
