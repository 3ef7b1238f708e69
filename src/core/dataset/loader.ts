/**
 * Dataset file loading for the CLI.
 */
import { ErrorCodes, SystemError } from '../../utils/errors.js';
import { extname, readFile } from '../../utils/file-system.js';
import { parseYaml } from '../../utils/yaml.js';
import { parseTimestamp } from '../types/value-types.js';
import { Table } from './table.js';

export interface DatasetLoadOptions {
  /**
   * Columns whose ISO-8601 string cells are parsed into Dates, since JSON and
   * YAML have no date values. Strings that do not parse are kept as they are.
   */
  timestampColumns?: Iterable<string>;
}

/**
 * Parse ISO-8601 strings in the given columns into Dates.
 */
export function parseTimestampColumns(table: Table, columns: Iterable<string>): Table {
  let result = table;
  for (const name of columns) {
    result = result.mapColumn(name, (value) =>
      typeof value === 'string' ? parseTimestamp(value) ?? value : value
    );
  }
  return result;
}

/**
 * Parse dataset text. `format` is taken from the file extension by loadDataset.
 */
export function parseDataset(
  content: string,
  format: 'json' | 'yaml',
  source = '<inline>',
  options: DatasetLoadOptions = {}
): Table {
  const table = format === 'yaml' ? Table.from(parseYaml(content)) : Table.from(parseJson(content, source));
  return parseTimestampColumns(table, options.timestampColumns ?? []);
}

function parseJson(content: string, source: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse JSON dataset ${source}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { source }
    );
  }
}

/**
 * Load a dataset from a `.json`, `.yaml` or `.yml` file holding either
 * an array of row objects or a map of column name to values.
 */
export async function loadDataset(filePath: string, options: DatasetLoadOptions = {}): Promise<Table> {
  const ext = extname(filePath);
  const content = await readFile(filePath);
  return parseDataset(content, ext === '.yaml' || ext === '.yml' ? 'yaml' : 'json', filePath, options);
}
