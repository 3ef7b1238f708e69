/**
 * `check` command: validate a dataset file against a contract file.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import { OutputFormatSchema, type Config } from '../../core/config/schema.js';
import { loadContract } from '../../core/contract/loader.js';
import { loadDataset } from '../../core/dataset/loader.js';
import { isUsageError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { createFormatter } from '../formatters/index.js';
import { applyLogging, usageExitCode } from './shared.js';

export interface CheckOptions {
  contract: string;
  format?: string;
  color?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  config?: string;
}

/**
 * Run a check and return the process exit code.
 * Output goes through `write`; diagnostics go to the logger.
 */
export async function runCheck(
  dataPath: string,
  options: CheckOptions,
  write: (text: string) => void = (text) => console.log(text),
  projectRoot: string = process.cwd()
): Promise<number> {
  let config: Config;
  try {
    config = await loadConfig(projectRoot, options.config);
  } catch (error) {
    logger.error('Failed to load configuration', error instanceof Error ? error : undefined);
    return usageExitCode();
  }

  const colors = options.color !== false && config.output.colors;
  applyLogging(config, { quiet: options.quiet, verbose: options.verbose, colors });

  const format = OutputFormatSchema.safeParse(options.format ?? config.output.format);
  if (!format.success) {
    logger.error(`Unknown output format '${String(options.format)}'. Use human, json or compact.`);
    return config.exit_codes.usage_error;
  }

  try {
    const contract = await loadContract(path.resolve(projectRoot, options.contract));
    const table = await loadDataset(path.resolve(projectRoot, dataPath), {
      timestampColumns: contract.fields
        .filter((field) => field.effectiveType === 'timestamp')
        .map((field) => field.name),
    });
    const contractLabel = contract.name ?? options.contract;

    if (format.data === 'human') {
      logger.info(`Validating ${dataPath} against ${contractLabel}...`);
    }

    const report = contract.report(table);
    const output = createFormatter({ format: format.data, colors }).formatReport(report, {
      dataset: dataPath,
      contract: contractLabel,
      rowCount: table.rowCount,
      columnCount: table.columnNames.length,
    });
    if (output) {
      write(output);
    }

    return report.isEmpty ? config.exit_codes.success : config.exit_codes.violations;
  } catch (error) {
    if (isUsageError(error)) {
      logger.error(error.message);
      return config.exit_codes.usage_error;
    }
    throw error;
  }
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Validate a dataset file against a contract')
    .argument('<data>', 'Dataset file (.json, .yaml or .yml)')
    .requiredOption('-c, --contract <path>', 'Contract file (.yaml, .yml or .json)')
    .option('--format <format>', 'Output format: human, json or compact')
    .option('--no-color', 'Disable colored output')
    .option('--quiet', 'Only log warnings and errors')
    .option('--verbose', 'Log per-field evaluation details')
    .option('--config <path>', 'Path to config file')
    .action(async (dataPath: string, options: CheckOptions) => {
      process.exitCode = await runCheck(dataPath, options);
    });
}
