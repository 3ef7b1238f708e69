/**
 * Violation records.
 */
import type { ActualType, Comparable, TypeTag } from '../types/value-types.js';

export const VIOLATION_KINDS = [
  'MissingColumn',
  'TypeMismatch',
  'BelowMin',
  'AboveMax',
  'NotAllowed',
  'PatternMismatch',
  'DuplicateValue',
] as const;

export type ViolationKind = (typeof VIOLATION_KINDS)[number];

interface CellViolationBase {
  /** The FieldSpec's name */
  readonly column: string;
  /** Zero-based row position in the dataset */
  readonly rowIndex: number;
  /** The offending cell value, unrendered */
  readonly value: unknown;
}

export interface MissingColumnViolation {
  readonly kind: 'MissingColumn';
  readonly column: string;
}

export interface TypeMismatchViolation extends CellViolationBase {
  readonly kind: 'TypeMismatch';
  readonly expected: TypeTag;
  readonly actual: ActualType;
}

export interface BelowMinViolation extends CellViolationBase {
  readonly kind: 'BelowMin';
  readonly bound: Comparable;
}

export interface AboveMaxViolation extends CellViolationBase {
  readonly kind: 'AboveMax';
  readonly bound: Comparable;
}

export interface NotAllowedViolation extends CellViolationBase {
  readonly kind: 'NotAllowed';
  readonly allowed: readonly unknown[];
}

export interface PatternMismatchViolation extends CellViolationBase {
  readonly kind: 'PatternMismatch';
  readonly pattern: RegExp;
}

export interface DuplicateValueViolation extends CellViolationBase {
  readonly kind: 'DuplicateValue';
  /** Row of the first occurrence of this value */
  readonly firstRowIndex: number;
}

/**
 * One failed check. Dataset-wide violations (MissingColumn) carry no row or value.
 */
export type Violation =
  | MissingColumnViolation
  | TypeMismatchViolation
  | BelowMinViolation
  | AboveMaxViolation
  | NotAllowedViolation
  | PatternMismatchViolation
  | DuplicateValueViolation;

/**
 * Violations that point at a specific cell.
 */
export type CellViolation = Exclude<Violation, MissingColumnViolation>;

/**
 * Freeze a violation record so reports cannot be edited after evaluation.
 */
export function createViolation<V extends Violation>(violation: V): V {
  return Object.freeze(violation);
}

export function isCellViolation(violation: Violation): violation is CellViolation {
  return violation.kind !== 'MissingColumn';
}
