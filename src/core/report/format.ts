/**
 * Line templates for violations and the report header.
 *
 * The exact text is a compatibility surface for anything that parses or
 * displays reports; change it only together with its tests.
 */
import { formatPattern, formatSet, formatValue, pluralize } from '../../utils/format.js';
import type { CellViolation, Violation } from './violation.js';

function locator(violation: CellViolation): string {
  return `(row ${violation.rowIndex}, value=${formatValue(violation.value)})`;
}

/**
 * Render one violation as a single line of text.
 */
export function formatViolation(violation: Violation): string {
  const subject = `Column '${violation.column}'`;

  switch (violation.kind) {
    case 'MissingColumn':
      return `${subject} missing required column.`;
    case 'TypeMismatch':
      return `${subject} expected type ${violation.expected}, got ${violation.actual} ${locator(violation)}.`;
    case 'BelowMin':
      return `${subject} below min ${formatValue(violation.bound)} ${locator(violation)}.`;
    case 'AboveMax':
      return `${subject} above max ${formatValue(violation.bound)} ${locator(violation)}.`;
    case 'NotAllowed':
      return `${subject} value not in allowed set ${formatSet(violation.allowed)} ${locator(violation)}.`;
    case 'PatternMismatch':
      return `${subject} does not match pattern ${formatPattern(violation.pattern)} ${locator(violation)}.`;
    case 'DuplicateValue':
      return `${subject} duplicate value ${locator(violation)}.`;
  }
}

/**
 * Summary header placed above the violation lines.
 */
export function formatHeader(count: number): string {
  return `Data contract violated: ${pluralize(count, 'violation')} found.`;
}
