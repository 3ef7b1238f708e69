/**
 * Constraint rule type definitions.
 */
import type { ResolvedField } from '../field/types.js';
import type { Violation } from '../report/violation.js';

/**
 * Closed set of per-value rule kinds, listed in evaluation order.
 * Presence (`required`) is decided by the evaluator before any rule runs.
 */
export const RULE_KINDS = ['type', 'range', 'allowed', 'pattern', 'unique'] as const;

export type RuleKind = (typeof RULE_KINDS)[number];

/**
 * Column data handed to a rule.
 */
export interface RuleContext {
  /** The full column, in row order */
  readonly values: readonly unknown[];
  /** Rows that passed the type check, ascending. Every row when no type applies. */
  readonly eligibleRows: readonly number[];
}

/**
 * Result from a rule.
 */
export interface RuleResult {
  /** Whether the rule passed */
  passed: boolean;
  /** Violations in row order */
  violations: Violation[];
}

/**
 * Interface for constraint rules.
 */
export interface IConstraintRule {
  readonly kind: RuleKind;

  /**
   * Whether the field configures this rule at all.
   */
  appliesTo(field: ResolvedField): boolean;

  /**
   * Check a present column. Only called when `appliesTo` holds.
   */
  check(field: ResolvedField, context: RuleContext): RuleResult;
}
