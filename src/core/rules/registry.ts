/**
 * Rule registry - the fixed evaluation pipeline.
 */
import type { IConstraintRule } from './types.js';
import { TypeCheckRule } from './type-check.js';
import { RangeRule } from './range.js';
import { AllowedSetRule } from './allowed.js';
import { PatternRule } from './pattern.js';
import { UniqueRule } from './unique.js';

/**
 * Rules in the order they run. The order is part of the report contract:
 * type first, so a mistyped cell yields one violation instead of cascading
 * into range, set and pattern failures; uniqueness last, over the raw column.
 */
const pipeline: readonly IConstraintRule[] = Object.freeze([
  new TypeCheckRule(),
  new RangeRule(),
  new AllowedSetRule(),
  new PatternRule(),
  new UniqueRule(),
]);

/**
 * All rules, in evaluation order.
 */
export function getRulePipeline(): readonly IConstraintRule[] {
  return pipeline;
}
