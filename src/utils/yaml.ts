/**
 * YAML parsing with zod validation.
 */
import { parse } from 'yaml';
import { z } from 'zod';
import { SystemError, ErrorCodes } from './errors.js';
import { readFile } from './file-system.js';

/**
 * Parse YAML content. The result is untyped until a schema checks it.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { error }
    );
  }
}

/**
 * Result of checking parsed data against a schema.
 */
export type SchemaCheck<T> =
  | { success: true; data: T }
  | { success: false; message: string; issues: z.ZodIssue[] };

/**
 * Run a zod schema over already-parsed data, folding the issues into one message.
 */
export function checkSchema<T extends z.ZodTypeAny>(data: unknown, schema: T): SchemaCheck<z.infer<T>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, message: formatZodError(result.error), issues: result.error.issues };
}

/**
 * Load a YAML file and validate it against a schema.
 * Schema failures are reported through `onInvalid` so each caller picks its error type.
 */
export async function loadYamlWithSchema<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T,
  onInvalid: (message: string, issues: z.ZodIssue[]) => Error
): Promise<z.infer<T>> {
  const content = await readFile(filePath);
  const checked = checkSchema(parseYaml(content), schema);
  if (!checked.success) {
    throw onInvalid(`${checked.message} (file: ${filePath})`, checked.issues);
  }
  return checked.data;
}

/**
 * Format Zod errors into a readable string.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
