import { describe, it, expect, vi, afterEach } from 'vitest';
import { evaluateColumn, evaluateField, evaluateFields } from '../../../../src/core/evaluator/evaluator.js';
import { FieldSpec } from '../../../../src/core/field/field-spec.js';
import { Table } from '../../../../src/core/dataset/table.js';
import { logger } from '../../../../src/utils/logger.js';

describe('evaluateField', () => {
  const table = Table.fromColumns({ present: [1, 2] });

  it('should report one MissingColumn for an absent required column', () => {
    const field = new FieldSpec({ name: 'user_id', type: 'integer', required: true, unique: true, min: 1 });

    expect(evaluateField(field, table)).toEqual([{ kind: 'MissingColumn', column: 'user_id' }]);
  });

  it('should skip an absent optional column', () => {
    const field = new FieldSpec({ name: 'nickname', type: 'string' });

    expect(evaluateField(field, table)).toEqual([]);
  });

  it('should check a present column', () => {
    const field = new FieldSpec({ name: 'present', type: 'integer', max: 1 });

    expect(evaluateField(field, table)).toEqual([
      { kind: 'AboveMax', column: 'present', rowIndex: 1, value: 2, bound: 1 },
    ]);
  });
});

describe('evaluateColumn', () => {
  it('should report a hole in a column the same way as a missing row key', () => {
    const field = new FieldSpec({ name: 'code', type: 'string', allowed: ['a', 'b'] });
    const fromColumns = evaluateField(field, Table.fromColumns({ code: ['a', , 'b'] }));
    const fromRows = evaluateField(field, Table.fromRows([{ code: 'a' }, {}, { code: 'b' }]));

    expect(fromColumns).toEqual([
      { kind: 'TypeMismatch', column: 'code', rowIndex: 1, value: undefined, expected: 'string', actual: 'undefined' },
    ]);
    expect(fromColumns).toEqual(fromRows);
  });

  it('should not cascade a type mismatch into range, set or pattern checks', () => {
    const field = new FieldSpec({
      name: 'code',
      type: 'string',
      min: 'b',
      allowed: ['bb', 'cc'],
      pattern: '^[a-z]+$',
    });

    const violations = evaluateColumn(field, [42, 'cc']);

    expect(violations).toEqual([
      { kind: 'TypeMismatch', column: 'code', rowIndex: 0, value: 42, expected: 'string', actual: 'integer' },
    ]);
  });

  it('should still count mismatched values for uniqueness', () => {
    const field = new FieldSpec({ name: 'id', type: 'integer', unique: true });

    const violations = evaluateColumn(field, ['x', 'x', 1]);

    expect(violations.map((v) => v.kind)).toEqual(['TypeMismatch', 'TypeMismatch', 'DuplicateValue']);
    expect(violations[2]).toMatchObject({ rowIndex: 1, value: 'x' });
  });

  it('should exclude NaN from range checks and report it as a type mismatch', () => {
    const field = new FieldSpec({ name: 'score', type: 'float', min: 0, max: 1 });

    const violations = evaluateColumn(field, [NaN, 0.5, 2]);

    expect(violations).toEqual([
      { kind: 'TypeMismatch', column: 'score', rowIndex: 0, value: NaN, expected: 'float', actual: 'nan' },
      { kind: 'AboveMax', column: 'score', rowIndex: 2, value: 2, bound: 1 },
    ]);
  });

  it('should order violations by rule, then by row', () => {
    const field = new FieldSpec({ name: 'n', type: 'integer', max: 10, allowed: [1, 2, 50], unique: true });

    const violations = evaluateColumn(field, [50, 'z', 3, 50]);

    expect(violations.map((v) => [v.kind, 'rowIndex' in v ? v.rowIndex : null])).toEqual([
      ['TypeMismatch', 1],
      ['AboveMax', 0],
      ['AboveMax', 3],
      ['NotAllowed', 2],
      ['DuplicateValue', 3],
    ]);
  });

  it('should let null through unchecked when the field has no effective type', () => {
    const field = new FieldSpec({ name: 'tag', allowed: ['a', null] });

    expect(evaluateColumn(field, ['a', null])).toEqual([]);
  });
});

describe('evaluateFields', () => {
  afterEach(() => {
    logger.setLevel('info');
    vi.restoreAllMocks();
  });

  it('should aggregate fields in declaration order', () => {
    const table = Table.fromRows([{ b: 'x', a: -1 }]);
    const fields = [
      new FieldSpec({ name: 'a', type: 'integer', min: 0 }),
      new FieldSpec({ name: 'b', type: 'integer' }),
      new FieldSpec({ name: 'c', required: true }),
    ];

    const report = evaluateFields(fields, table);

    expect(report.violations.map((v) => `${v.column}:${v.kind}`)).toEqual([
      'a:BelowMin',
      'b:TypeMismatch',
      'c:MissingColumn',
    ]);
  });

  it('should trace each field at debug level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    logger.setLevel('debug');

    evaluateFields([new FieldSpec({ name: 'a' })], Table.fromColumns({ a: [1] }));

    expect(spy.mock.calls.some(([line]) => String(line).includes("Evaluated field 'a'"))).toBe(true);
  });
});
