import type { ResolvedField } from '../field/types.js';
import { createViolation, type Violation } from '../report/violation.js';
import type { IConstraintRule, RuleContext, RuleKind, RuleResult } from './types.js';

/**
 * Base class for constraint rules.
 * Provides row iteration and result assembly.
 */
export abstract class BaseConstraintRule implements IConstraintRule {
  abstract readonly kind: RuleKind;

  abstract appliesTo(field: ResolvedField): boolean;

  abstract check(field: ResolvedField, context: RuleContext): RuleResult;

  /**
   * Visit rows that passed the type check, in row order, collecting
   * whatever violation the visitor returns.
   */
  protected collectEligible(
    context: RuleContext,
    visit: (value: unknown, rowIndex: number) => Violation | undefined
  ): RuleResult {
    const violations: Violation[] = [];
    for (const rowIndex of context.eligibleRows) {
      const violation = visit(context.values[rowIndex], rowIndex);
      if (violation) {
        violations.push(createViolation(violation));
      }
    }
    return this.result(violations);
  }

  protected result(violations: Violation[]): RuleResult {
    return { passed: violations.length === 0, violations };
  }
}
