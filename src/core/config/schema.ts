/**
 * Configuration schema for .phonescope.yaml.
 */
import { z } from 'zod';
import { isSupportedCountry } from 'libphonenumber-js/max';

/** ISO 3166-1 alpha-2 code that the phone metadata knows, e.g. "US" */
export const RegionCodeSchema = z
  .string()
  .trim()
  .toUpperCase()
  .refine(isSupportedCountry, (value) => ({ message: `Unsupported region code: ${value}` }));

export const OutputFormatSchema = z.enum(['human', 'json']);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const ConfigSchema = z.object({
  /** Region assumed for numbers typed without +country code */
  default_region: RegionCodeSchema.default('US'),
  output: OutputFormatSchema.default('human'),
  colors: z.boolean().default(true),
  banner: z.boolean().default(true),
  /** Include clock-dependent timezone fields */
  local_time: z.boolean().default(false),
  log_level: LogLevelSchema.default('info'),
});

export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
