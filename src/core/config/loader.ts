/**
 * Configuration loading. A missing default file means defaults;
 * a missing file the user named explicitly is an error.
 */
import * as path from 'node:path';
import { ConfigSchema, type Config, type ConfigInput } from './schema.js';
import { loadYamlWithSchema, fileExists, formatZodError } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_FILE = '.phonescope.yaml';

/**
 * Default configuration values.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from `configPath`, or from .phonescope.yaml in `cwd`.
 */
export async function loadConfig(cwd: string, configPath?: string): Promise<Config> {
  const fullPath = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    return getDefaultConfig();
  }

  return loadYamlWithSchema(fullPath, ConfigSchema);
}

/**
 * Apply overrides (e.g. from CLI flags) on top of a loaded config.
 * Undefined overrides leave the loaded value alone.
 */
export function mergeConfig(base: Config, overrides: ConfigInput): Config {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const result = ConfigSchema.safeParse({ ...base, ...defined });
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_CONFIG,
      `Invalid option: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return result.data;
}
