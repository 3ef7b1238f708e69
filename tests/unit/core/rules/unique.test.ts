import { describe, it, expect } from 'vitest';
import { UniqueRule } from '../../../../src/core/rules/unique.js';
import { field, context } from './helpers.js';

describe('UniqueRule', () => {
  const rule = new UniqueRule();

  it('should apply only when unique is set', () => {
    expect(rule.appliesTo(field({ unique: true }))).toBe(true);
    expect(rule.appliesTo(field({}))).toBe(false);
  });

  it('should flag every repeat but never the first occurrence', () => {
    const result = rule.check(field({ unique: true }), context([5, 5, 7, 5]));

    expect(result.violations).toEqual([
      { kind: 'DuplicateValue', column: 'col', rowIndex: 1, value: 5, firstRowIndex: 0 },
      { kind: 'DuplicateValue', column: 'col', rowIndex: 3, value: 5, firstRowIndex: 0 },
    ]);
  });

  it('should check the whole column regardless of eligible rows', () => {
    const result = rule.check(field({ unique: true }), context(['x', 'x'], []));

    expect(result.violations).toHaveLength(1);
    expect(result.violations[0]).toMatchObject({ rowIndex: 1 });
  });

  it('should treat NaN as equal to NaN', () => {
    const result = rule.check(field({ unique: true }), context([NaN, 1, NaN]));

    expect(result.violations).toHaveLength(1);
    expect(result.violations[0]).toMatchObject({ rowIndex: 2, firstRowIndex: 0 });
  });

  it('should compare dates by time value', () => {
    const result = rule.check(field({ unique: true }), context([new Date(0), new Date(0)]));

    expect(result.violations).toHaveLength(1);
  });

  it('should not equate a date with any string', () => {
    const result = rule.check(
      field({ unique: true }),
      context([new Date(0), 'date:0', '\u0000date:0', new Date(0).toISOString()])
    );

    expect(result.passed).toBe(true);
  });

  it('should not equate values of different types', () => {
    const result = rule.check(field({ unique: true }), context([1, '1', true]));

    expect(result.passed).toBe(true);
  });
});
