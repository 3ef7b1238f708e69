/**
 * File system reads used by the contract, dataset and config loaders.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { SystemError, ErrorCodes } from './errors.js';

/**
 * Read a file and return its contents as a string.
 * A missing file becomes a SystemError naming the path.
 */
export async function readFile(filePath: string): Promise<string> {
  try {
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `File not found: ${filePath}`, { filePath });
    }
    throw error;
  }
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Get the lower-cased extension of a path, including the dot.
 */
export function extname(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
