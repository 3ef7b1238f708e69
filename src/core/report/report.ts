/**
 * ContractReport: the ordered, complete result of one validation.
 */
import { formatValue } from '../../utils/format.js';
import { formatHeader, formatViolation } from './format.js';
import { isCellViolation, type Violation, type ViolationKind } from './violation.js';

/**
 * Serializable form of a report, used by the JSON formatter.
 */
export interface ReportJson {
  passed: boolean;
  violation_count: number;
  counts: Record<ViolationKind, number>;
  violations: Array<{
    column: string;
    kind: ViolationKind;
    row: number | null;
    value: string | null;
    message: string;
  }>;
}

/**
 * Immutable collection of violations in evaluation order
 * (column declaration order, then rule order, then row order).
 * Violations are never sorted, merged or deduplicated.
 */
export class ContractReport {
  readonly violations: readonly Violation[];

  constructor(violations: Iterable<Violation>) {
    this.violations = Object.freeze([...violations]);
    Object.freeze(this);
  }

  /**
   * Concatenate per-field violation sequences, keeping their order.
   */
  static aggregate(perField: Iterable<readonly Violation[]>): ContractReport {
    const all: Violation[] = [];
    for (const violations of perField) {
      all.push(...violations);
    }
    return new ContractReport(all);
  }

  get size(): number {
    return this.violations.length;
  }

  get isEmpty(): boolean {
    return this.violations.length === 0;
  }

  /**
   * Group violations by column. Map iteration follows first appearance,
   * which is column declaration order.
   */
  byColumn(): Map<string, Violation[]> {
    const groups = new Map<string, Violation[]>();
    for (const violation of this.violations) {
      const group = groups.get(violation.column);
      if (group) {
        group.push(violation);
      } else {
        groups.set(violation.column, [violation]);
      }
    }
    return groups;
  }

  countsByKind(): Record<ViolationKind, number> {
    const counts = emptyCounts();
    for (const violation of this.violations) {
      counts[violation.kind] += 1;
    }
    return counts;
  }

  /**
   * One rendered line per violation.
   */
  lines(): string[] {
    return this.violations.map(formatViolation);
  }

  /**
   * Full report text: summary header followed by every line.
   * Empty string when there is nothing to report.
   */
  render(): string {
    if (this.isEmpty) return '';
    return [formatHeader(this.size), ...this.lines()].join('\n');
  }

  toJSON(): ReportJson {
    return {
      passed: this.isEmpty,
      violation_count: this.size,
      counts: this.countsByKind(),
      violations: this.violations.map((violation) => ({
        column: violation.column,
        kind: violation.kind,
        row: isCellViolation(violation) ? violation.rowIndex : null,
        value: isCellViolation(violation) ? formatValue(violation.value) : null,
        message: formatViolation(violation),
      })),
    };
  }
}

function emptyCounts(): Record<ViolationKind, number> {
  return {
    MissingColumn: 0,
    TypeMismatch: 0,
    BelowMin: 0,
    AboveMax: 0,
    NotAllowed: 0,
    PatternMismatch: 0,
    DuplicateValue: 0,
  };
}
