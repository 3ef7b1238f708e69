/**
 * CLI program definition.
 */
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createCheckCommand } from './commands/check.js';
import { createInspectCommand } from './commands/inspect.js';

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const packagePath = resolve(dirname(fileURLToPath(import.meta.url)), '../../package.json');
  return PackageJsonSchema.parse(JSON.parse(readFileSync(packagePath, 'utf-8'))).version;
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('datacontracts')
    .description('Validate tabular data against declarative column contracts')
    .version(readVersion());
  [createCheckCommand, createInspectCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
