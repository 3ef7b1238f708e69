import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { fileExists } from '../../utils/file-system.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { ConfigError, DataContractError, ErrorCodes } from '../../utils/errors.js';

const DEFAULT_CONFIG_PATH = '.datacontracts/config.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(projectRoot: string, configPath?: string): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(
      fullPath,
      ConfigSchema,
      (message, issues) =>
        new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Invalid config: ${message}`, {
          path: fullPath,
          issues: issues.map((issue) => issue.message),
        })
    );
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        {
          path: fullPath,
          originalError: error.message,
          originalCode: error instanceof DataContractError ? error.code : undefined,
        }
      );
    }
    throw error;
  }
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: Partial<Config>): Config {
  return ConfigSchema.parse(partial);
}

/**
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}
