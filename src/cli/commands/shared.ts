import type { Config } from '../../core/config/schema.js';
import { getDefaultConfig } from '../../core/config/loader.js';
import { logger } from '../../utils/logger.js';

/**
 * Exit code for usage errors raised before a config file could be read.
 */
export function usageExitCode(): number {
  return getDefaultConfig().exit_codes.usage_error;
}

/**
 * Apply logging settings: --verbose wins over --quiet, both win over config.
 */
export function applyLogging(
  config: Config,
  flags: { quiet?: boolean; verbose?: boolean; colors: boolean }
): void {
  if (flags.verbose) {
    logger.setLevel('debug');
  } else if (flags.quiet) {
    logger.setLevel('warn');
  } else {
    logger.setLevel(config.logging.level);
  }
  logger.setColors(flags.colors);
}
