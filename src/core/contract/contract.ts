/**
 * Contract: the ordered field specs for one dataset shape, and the
 * validate() entry point.
 */
import { ContractDefinitionError, ContractViolationError, ErrorCodes } from '../../utils/errors.js';
import { Table, type TabularInput } from '../dataset/table.js';
import { evaluateFields } from '../evaluator/evaluator.js';
import { FieldSpec } from '../field/field-spec.js';
import type { ColumnOptions, FieldOptions } from '../field/types.js';
import type { ContractReport } from '../report/report.js';

/**
 * Structured outcome of evaluating a dataset.
 */
export type ContractResult<T> =
  | { ok: true; data: T }
  | { ok: false; report: ContractReport };

export interface ContractOptions {
  /** Display name, used in CLI output */
  name?: string;
}

/**
 * Immutable, reusable set of field constraints.
 *
 * Holds no state between calls, so one contract can validate any number
 * of datasets, including concurrently.
 */
export class Contract {
  readonly name: string | undefined;
  readonly fields: readonly FieldSpec[];

  constructor(fields: Iterable<FieldSpec | FieldOptions>, options: ContractOptions = {}) {
    const specs: FieldSpec[] = [];
    const seen = new Set<string>();

    for (const field of fields) {
      const spec = field instanceof FieldSpec ? field : new FieldSpec(field);
      if (seen.has(spec.name)) {
        throw new ContractDefinitionError(
          ErrorCodes.DUPLICATE_FIELD,
          `Duplicate field '${spec.name}' in contract`,
          { field: spec.name }
        );
      }
      seen.add(spec.name);
      specs.push(spec);
    }

    this.name = options.name;
    this.fields = Object.freeze(specs);
    Object.freeze(this);
  }

  get columnNames(): string[] {
    return this.fields.map((field) => field.name);
  }

  field(name: string): FieldSpec | undefined {
    return this.fields.find((field) => field.name === name);
  }

  /**
   * Evaluate every field and return the full report, empty when the data conforms.
   * Throws DatasetShapeError when the input is not tabular.
   */
  report(dataset: TabularInput): ContractReport {
    return evaluateFields(this.fields, Table.from(dataset));
  }

  /**
   * Structured variant of validate(): never throws for data problems.
   */
  evaluate<T extends TabularInput>(dataset: T): ContractResult<T> {
    const report = this.report(dataset);
    return report.isEmpty ? { ok: true, data: dataset } : { ok: false, report };
  }

  /**
   * Validate a dataset, returning it unchanged for chaining.
   * Throws ContractViolationError carrying every violation when it does not conform.
   */
  validate<T extends TabularInput>(dataset: T): T {
    const result = this.evaluate(dataset);
    if (!result.ok) {
      throw new ContractViolationError(result.report);
    }
    return result.data;
  }
}

/**
 * Build a contract from an object keyed by column name.
 * Key order is declaration order.
 *
 * @example
 * const users = defineContract({
 *   user_id: { type: 'integer', required: true, unique: true },
 *   age: { type: 'integer', min: 0, max: 120 },
 * });
 */
export function defineContract(
  columns: Readonly<Record<string, ColumnOptions>>,
  options: ContractOptions = {}
): Contract {
  return new Contract(
    Object.entries(columns).map(([name, column]) => ({ ...column, name })),
    options
  );
}
