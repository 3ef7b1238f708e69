import type { ResolvedField } from '../field/types.js';
import { createEqualityKey } from '../types/value-types.js';
import { createViolation, type Violation } from '../report/violation.js';
import { BaseConstraintRule } from './base.js';
import type { RuleContext, RuleResult } from './types.js';

/**
 * Every value must be distinct. Runs over the full column, type-mismatched
 * values included. The first occurrence is never flagged; every later
 * repeat is.
 */
export class UniqueRule extends BaseConstraintRule {
  readonly kind = 'unique' as const;

  appliesTo(field: ResolvedField): boolean {
    return field.unique;
  }

  check(field: ResolvedField, context: RuleContext): RuleResult {
    const equalityKey = createEqualityKey();
    const firstSeen = new Map<unknown, number>();
    const violations: Violation[] = [];

    context.values.forEach((value, rowIndex) => {
      const key = equalityKey(value);
      const firstRowIndex = firstSeen.get(key);
      if (firstRowIndex === undefined) {
        firstSeen.set(key, rowIndex);
        return;
      }
      violations.push(
        createViolation({ kind: 'DuplicateValue', column: field.name, rowIndex, value, firstRowIndex })
      );
    });

    return this.result(violations);
  }
}
