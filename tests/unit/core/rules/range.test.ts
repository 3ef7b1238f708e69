import { describe, it, expect } from 'vitest';
import { RangeRule } from '../../../../src/core/rules/range.js';
import { field, context } from './helpers.js';

describe('RangeRule', () => {
  const rule = new RangeRule();

  it('should apply when min or max is set', () => {
    expect(rule.appliesTo(field({ type: 'integer', min: 0 }))).toBe(true);
    expect(rule.appliesTo(field({ type: 'integer', max: 0 }))).toBe(true);
    expect(rule.appliesTo(field({ type: 'integer' }))).toBe(false);
  });

  it('should treat bounds as inclusive', () => {
    const result = rule.check(field({ type: 'integer', min: 0, max: 120 }), context([0, 120]));

    expect(result.passed).toBe(true);
  });

  it('should report values below min and above max in row order', () => {
    const result = rule.check(field({ type: 'integer', min: 0, max: 120 }), context([150, -1, 30, 999]));

    expect(result.violations).toEqual([
      { kind: 'AboveMax', column: 'col', rowIndex: 0, value: 150, bound: 120 },
      { kind: 'BelowMin', column: 'col', rowIndex: 1, value: -1, bound: 0 },
      { kind: 'AboveMax', column: 'col', rowIndex: 3, value: 999, bound: 120 },
    ]);
  });

  it('should only look at eligible rows', () => {
    const result = rule.check(field({ type: 'integer', max: 10 }), context([50, 60, 70], [1]));

    expect(result.violations).toHaveLength(1);
    expect(result.violations[0]).toMatchObject({ rowIndex: 1, value: 60 });
  });

  it('should compare timestamps by time', () => {
    const min = new Date('2024-01-01T00:00:00.000Z');
    const early = new Date('2023-12-31T23:59:59.000Z');
    const result = rule.check(field({ type: 'timestamp', min }), context([early, min]));

    expect(result.violations).toHaveLength(1);
    expect(result.violations[0]).toMatchObject({ kind: 'BelowMin', rowIndex: 0 });
  });

  it('should compare bigint values against number bounds', () => {
    const result = rule.check(field({ type: 'integer', max: 100 }), context([101n, 100n]));

    expect(result.violations).toHaveLength(1);
    expect(result.violations[0]).toMatchObject({ kind: 'AboveMax', rowIndex: 0 });
  });
});
