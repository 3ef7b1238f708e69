/**
 * Tool configuration schema (`.datacontracts/config.yaml`).
 */
import { z } from 'zod';

/**
 * Make an object field optional and apply its inner defaults when missing.
 * Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Output format for validation reports. */
export const OutputFormatSchema = z.enum(['human', 'json', 'compact']);

/** Report output settings. */
export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('human'),
  colors: z.boolean().default(true),
});

/** Logging settings. */
export const LoggingSettingsSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

/** Process exit codes for `check`. */
export const ExitCodesSchema = z.object({
  success: z.number().int().min(0).default(0),
  violations: z.number().int().min(0).default(1),
  usage_error: z.number().int().min(0).default(2),
});

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  output: withDefaults(OutputSettingsSchema),
  logging: withDefaults(LoggingSettingsSchema),
  exit_codes: withDefaults(ExitCodesSchema),
});

export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;
export type ExitCodes = z.infer<typeof ExitCodesSchema>;
export type Config = z.infer<typeof ConfigSchema>;
