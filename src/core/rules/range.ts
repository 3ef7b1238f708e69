import type { ResolvedField } from '../field/types.js';
import { compareValues, isComparable } from '../types/value-types.js';
import { BaseConstraintRule } from './base.js';
import type { RuleContext, RuleResult } from './types.js';

/**
 * Inclusive min/max bounds, checked row by row.
 * A value can only be below min or above max, never both, since min <= max
 * is enforced when the field is built.
 */
export class RangeRule extends BaseConstraintRule {
  readonly kind = 'range' as const;

  appliesTo(field: ResolvedField): boolean {
    return field.min !== undefined || field.max !== undefined;
  }

  check(field: ResolvedField, context: RuleContext): RuleResult {
    const { min, max } = field;

    return this.collectEligible(context, (value, rowIndex) => {
      // Eligible rows are well-typed, so this only filters type-agnostic surprises
      if (!isComparable(value)) return undefined;

      if (min !== undefined && compareValues(value, min) < 0) {
        return { kind: 'BelowMin', column: field.name, rowIndex, value, bound: min };
      }
      if (max !== undefined && compareValues(value, max) > 0) {
        return { kind: 'AboveMax', column: field.name, rowIndex, value, bound: max };
      }
      return undefined;
    });
  }
}
