/**
 * Evaluator - runs each field's rules against the dataset.
 */
import type { ResolvedField } from '../field/types.js';
import type { TabularData } from '../dataset/table.js';
import { ContractReport } from '../report/report.js';
import { createViolation, type Violation } from '../report/violation.js';
import { getRulePipeline } from '../rules/registry.js';
import { logger } from '../../utils/logger.js';

/**
 * Run the rule pipeline over a column that is present in the dataset.
 *
 * Type mismatches are reported once and the mismatched rows are withheld
 * from range, allowed-set and pattern checks. Uniqueness still sees them.
 */
export function evaluateColumn(field: ResolvedField, values: readonly unknown[]): Violation[] {
  const violations: Violation[] = [];
  let eligibleRows: readonly number[] = values.map((_value, rowIndex) => rowIndex);

  for (const rule of getRulePipeline()) {
    if (!rule.appliesTo(field)) continue;

    const result = rule.check(field, { values, eligibleRows });
    violations.push(...result.violations);

    if (rule.kind === 'type' && !result.passed) {
      const mismatched = new Set<number>();
      for (const violation of result.violations) {
        if (violation.kind === 'TypeMismatch') mismatched.add(violation.rowIndex);
      }
      eligibleRows = eligibleRows.filter((rowIndex) => !mismatched.has(rowIndex));
    }
  }

  return violations;
}

/**
 * Evaluate one field against the dataset, including the presence check.
 */
export function evaluateField(field: ResolvedField, data: TabularData): Violation[] {
  const values = data.column(field.name);

  if (values === undefined) {
    return field.required ? [createViolation({ kind: 'MissingColumn', column: field.name })] : [];
  }

  return evaluateColumn(field, values);
}

/**
 * Evaluate every field in declaration order and aggregate the results.
 */
export function evaluateFields(fields: readonly ResolvedField[], data: TabularData): ContractReport {
  const debug = logger.isEnabled('debug');

  return ContractReport.aggregate(
    fields.map((field) => {
      const violations = evaluateField(field, data);
      if (debug) {
        logger.debug(`Evaluated field '${field.name}'`, {
          rows: data.rowCount,
          present: data.column(field.name) !== undefined,
          violations: violations.length,
        });
      }
      return violations;
    })
  );
}
