import type { ResolvedField } from '../field/types.js';
import { createEqualityKey } from '../types/value-types.js';
import { BaseConstraintRule } from './base.js';
import type { RuleContext, RuleResult } from './types.js';

/**
 * Categorical constraint: each value must be one of the allowed values.
 * Membership uses SameValueZero, with dates compared by time value.
 */
export class AllowedSetRule extends BaseConstraintRule {
  readonly kind = 'allowed' as const;

  appliesTo(field: ResolvedField): boolean {
    return field.allowed !== undefined;
  }

  check(field: ResolvedField, context: RuleContext): RuleResult {
    const allowed = field.allowed ?? [];
    const equalityKey = createEqualityKey();
    const members = new Set(allowed.map(equalityKey));

    return this.collectEligible(context, (value, rowIndex) =>
      members.has(equalityKey(value))
        ? undefined
        : { kind: 'NotAllowed', column: field.name, rowIndex, value, allowed }
    );
  }
}
