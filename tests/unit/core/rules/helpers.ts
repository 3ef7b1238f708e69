import { FieldSpec } from '../../../../src/core/field/field-spec.js';
import type { FieldOptions } from '../../../../src/core/field/types.js';
import type { RuleContext } from '../../../../src/core/rules/types.js';

export const field = (options: Omit<FieldOptions, 'name'>): FieldSpec =>
  new FieldSpec({ name: 'col', ...options });

export const context = (values: unknown[], eligibleRows?: number[]): RuleContext => ({
  values,
  eligibleRows: eligibleRows ?? values.map((_v, i) => i),
});
