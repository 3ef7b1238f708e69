import type { ResolvedField } from '../field/types.js';
import { classifyValue, matchesType } from '../types/value-types.js';
import { createViolation, type Violation } from '../report/violation.js';
import { BaseConstraintRule } from './base.js';
import type { RuleContext, RuleResult } from './types.js';

/**
 * Checks every value against the field's effective type.
 * Runs over the whole column; the evaluator drops mismatched rows
 * from the rules that follow.
 */
export class TypeCheckRule extends BaseConstraintRule {
  readonly kind = 'type' as const;

  appliesTo(field: ResolvedField): boolean {
    return field.effectiveType !== undefined;
  }

  check(field: ResolvedField, context: RuleContext): RuleResult {
    const expected = field.effectiveType;
    const violations: Violation[] = [];
    if (expected === undefined) {
      return this.result(violations);
    }

    context.values.forEach((value, rowIndex) => {
      if (!matchesType(value, expected)) {
        violations.push(
          createViolation({
            kind: 'TypeMismatch',
            column: field.name,
            rowIndex,
            value,
            expected,
            actual: classifyValue(value),
          })
        );
      }
    });

    return this.result(violations);
  }
}
