/**
 * Read-only tabular view over the inputs validate() accepts.
 */
import { DatasetShapeError } from '../../utils/errors.js';

/**
 * Anything exposing named columns with row-indexed values.
 */
export interface TabularData {
  /** Column names, in dataset order */
  readonly columnNames: readonly string[];
  /** Number of rows; every column has exactly this many values */
  readonly rowCount: number;
  /** Values of a column in row order, or undefined when the column is absent */
  column(name: string): readonly unknown[] | undefined;
}

export type Row = Readonly<Record<string, unknown>>;

export type ColumnMap = Readonly<Record<string, readonly unknown[]>>;

/**
 * Inputs accepted by Contract.validate().
 */
export type TabularInput = TabularData | readonly Row[] | ColumnMap;

/**
 * Column-oriented table. Built once per validation from the caller's input;
 * the caller's data is never written to.
 */
export class Table implements TabularData {
  readonly columnNames: readonly string[];
  readonly rowCount: number;
  private readonly columns: ReadonlyMap<string, readonly unknown[]>;

  private constructor(columns: Map<string, readonly unknown[]>, rowCount: number) {
    this.columns = columns;
    this.columnNames = Object.freeze([...columns.keys()]);
    this.rowCount = rowCount;
  }

  /**
   * Build from row objects. Columns are the union of row keys in order of
   * first appearance; a row lacking a key contributes `undefined`.
   */
  static fromRows(rows: readonly unknown[]): Table {
    const columns = new Map<string, unknown[]>();

    rows.forEach((row, rowIndex) => {
      if (!isRecord(row)) {
        throw new DatasetShapeError(`Row ${rowIndex} is not an object`, { rowIndex, actual: describe(row) });
      }
      for (const name of Object.keys(row)) {
        let column = columns.get(name);
        if (!column) {
          column = new Array<unknown>(rows.length).fill(undefined);
          columns.set(name, column);
        }
        column[rowIndex] = row[name];
      }
    });

    return new Table(columns, rows.length);
  }

  /**
   * Build from a map of column name to values. All columns must have the same length.
   * Columns are copied; holes in sparse arrays become `undefined`.
   */
  static fromColumns(input: Readonly<Record<string, unknown>>): Table {
    const columns = new Map<string, readonly unknown[]>();
    let rowCount: number | undefined;

    for (const [name, values] of Object.entries(input)) {
      if (!Array.isArray(values)) {
        throw new DatasetShapeError(`Column '${name}' is not an array`, { column: name, actual: describe(values) });
      }
      if (rowCount !== undefined && values.length !== rowCount) {
        throw new DatasetShapeError(
          `Column '${name}' has ${values.length} values, expected ${rowCount}`,
          { column: name, length: values.length, expected: rowCount }
        );
      }
      rowCount = values.length;
      columns.set(name, Array.from(values));
    }

    return new Table(columns, rowCount ?? 0);
  }

  /**
   * Normalize any accepted input into a Table.
   * Throws DatasetShapeError for anything that is not tabular.
   */
  static from(input: unknown): Table {
    if (input instanceof Table) return input;
    if (Array.isArray(input)) return Table.fromRows(input);
    if (isTabularData(input)) return Table.fromTabular(input);
    if (isRecord(input)) return Table.fromColumns(input);
    throw new DatasetShapeError(
      `Expected an array of rows, a column map or a table, got ${describe(input)}`,
      { actual: describe(input) }
    );
  }

  private static fromTabular(data: TabularData): Table {
    const { rowCount } = data;
    if (!Number.isInteger(rowCount) || rowCount < 0) {
      throw new DatasetShapeError(`Invalid row count: ${String(rowCount)}`, { rowCount });
    }
    const columns = new Map<string, readonly unknown[]>();
    for (const name of data.columnNames) {
      const values = data.column(name);
      if (!Array.isArray(values) || values.length !== rowCount) {
        throw new DatasetShapeError(
          `Column '${name}' does not provide ${rowCount} values`,
          { column: name, expected: rowCount }
        );
      }
      columns.set(name, Array.from(values));
    }
    return new Table(columns, rowCount);
  }

  /**
   * Copy of this table with one column's values mapped. Unknown columns are ignored.
   */
  mapColumn(name: string, transform: (value: unknown) => unknown): Table {
    const values = this.columns.get(name);
    if (values === undefined) return this;
    const columns = new Map(this.columns);
    columns.set(name, values.map(transform));
    return new Table(columns, this.rowCount);
  }

  hasColumn(name: string): boolean {
    return this.columns.has(name);
  }

  column(name: string): readonly unknown[] | undefined {
    return this.columns.get(name);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof Map) &&
    !(value instanceof Set)
  );
}

function isTabularData(value: unknown): value is TabularData {
  return (
    isRecord(value) &&
    Array.isArray(value.columnNames) &&
    typeof value.rowCount === 'number' &&
    typeof value.column === 'function'
  );
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Map) return 'Map';
  if (value instanceof Set) return 'Set';
  if (value instanceof Date) return 'Date';
  return typeof value;
}
