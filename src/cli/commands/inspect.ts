/**
 * `inspect` command: load a contract file and list its fields.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'node:path';
import { loadContract } from '../../core/contract/loader.js';
import type { Contract } from '../../core/contract/contract.js';
import { isUsageError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { usageExitCode } from './shared.js';

export interface InspectOptions {
  color?: boolean;
}

/**
 * Render a contract's fields, one line each, in declaration order.
 */
export function describeContract(contract: Contract, label: string, colors = true): string {
  const paint = (text: string): string => (colors ? chalk.bold(text) : text);
  const lines = [`${paint(contract.name ?? label)}: ${contract.fields.length} field(s)`];
  for (const field of contract.fields) {
    lines.push(`  ${paint(field.name)}  ${field.describe().join(', ')}`);
    if (field.description) {
      lines.push(`      ${field.description}`);
    }
  }
  return lines.join('\n');
}

export async function runInspect(
  contractPath: string,
  options: InspectOptions,
  write: (text: string) => void = (text) => console.log(text),
  projectRoot: string = process.cwd()
): Promise<number> {
  try {
    const contract = await loadContract(path.resolve(projectRoot, contractPath));
    write(describeContract(contract, contractPath, options.color !== false));
    return 0;
  } catch (error) {
    if (isUsageError(error)) {
      logger.error(error.message);
      return usageExitCode();
    }
    throw error;
  }
}

/**
 * Create the inspect command.
 */
export function createInspectCommand(): Command {
  return new Command('inspect')
    .description('Show the fields and constraints of a contract file')
    .argument('<contract>', 'Contract file (.yaml, .yml or .json)')
    .option('--no-color', 'Disable colored output')
    .action(async (contractPath: string, options: InspectOptions) => {
      process.exitCode = await runInspect(contractPath, options);
    });
}
