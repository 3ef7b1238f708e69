/**
 * Contract file loading (YAML or JSON, which YAML parses too).
 */
import { z } from 'zod';
import { ContractDefinitionError, ErrorCodes } from '../../utils/errors.js';
import { readFile } from '../../utils/file-system.js';
import { checkSchema, parseYaml } from '../../utils/yaml.js';
import type { FieldOptions } from '../field/types.js';
import { parseTimestamp } from '../types/value-types.js';
import { Contract } from './contract.js';
import { ContractFileSchema, type ContractFile, type FieldDefinition } from './schema.js';

/**
 * Convert a parsed field definition into FieldSpec options.
 * Timestamp fields take ISO strings for bounds and allowed values.
 */
export function toFieldOptions(definition: FieldDefinition): FieldOptions {
  const { name, type, required, unique, min, max, allowed, pattern, description } = definition;
  const asTimestamp = type === 'timestamp';

  return {
    name,
    type,
    required,
    unique,
    min: asTimestamp ? parseDateString(min) : min,
    max: asTimestamp ? parseDateString(max) : max,
    allowed: asTimestamp && allowed ? allowed.map(parseDateString) : allowed,
    pattern,
    description,
  };
}

function parseDateString<T>(value: T): T | Date {
  return typeof value === 'string' ? parseTimestamp(value) ?? value : value;
}

/**
 * Build a contract from already-parsed data.
 */
export function contractFromDefinition(data: unknown, source = '<inline>'): Contract {
  const checked = checkSchema(data, ContractFileSchema);
  if (!checked.success) {
    throw invalidContract(`${checked.message} (source: ${source})`, checked.issues);
  }
  const file: ContractFile = checked.data;
  return new Contract(file.fields.map(toFieldOptions), { name: file.name });
}

/**
 * Parse contract text.
 */
export function parseContract(content: string, source = '<inline>'): Contract {
  return contractFromDefinition(parseYaml(content), source);
}

/**
 * Load a contract from a file.
 */
export async function loadContract(filePath: string): Promise<Contract> {
  const content = await readFile(filePath);
  return parseContract(content, filePath);
}

function invalidContract(message: string, issues: z.ZodIssue[]): ContractDefinitionError {
  return new ContractDefinitionError(ErrorCodes.INVALID_CONTRACT, `Invalid contract: ${message}`, {
    issues: issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  });
}
