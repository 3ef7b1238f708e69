import type { ResolvedField } from '../field/types.js';
import { BaseConstraintRule } from './base.js';
import type { RuleContext, RuleResult } from './types.js';

/**
 * String values must match the field's regular expression.
 */
export class PatternRule extends BaseConstraintRule {
  readonly kind = 'pattern' as const;

  appliesTo(field: ResolvedField): boolean {
    return field.pattern !== undefined;
  }

  check(field: ResolvedField, context: RuleContext): RuleResult {
    const { pattern } = field;

    return this.collectEligible(context, (value, rowIndex) => {
      if (pattern === undefined || typeof value !== 'string') return undefined;
      return pattern.test(value)
        ? undefined
        : { kind: 'PatternMismatch', column: field.name, rowIndex, value, pattern };
    });
  }
}
