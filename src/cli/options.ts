/**
 * Options shared by the report commands, and their resolution
 * against the config file.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, mergeConfig, type Config } from '../core/config/index.js';
import { analyzePhoneNumber } from '../core/pipeline.js';
import { logger } from '../utils/logger.js';
import type { Analyzer } from './session.js';

export interface ReportFlags {
  region?: string;
  json?: boolean;
  color?: boolean;
  localTime?: boolean;
  banner?: boolean;
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Add the report options to a command.
 * --color/--no-color are both declared so that neither is set by default
 * and the config file decides.
 */
export function addReportOptions(command: Command): Command {
  return command
    .option('-r, --region <code>', 'Default region for numbers without a country code (e.g. US, GB)')
    .option('--json', 'Output as JSON')
    .option('--color', 'Force colored output')
    .option('--no-color', 'Disable colored output')
    .option('--local-time', 'Include the current local time in the timezone section')
    .option('-c, --config <path>', 'Path to config file (default: .phonescope.yaml)')
    .option('-v, --verbose', 'Show debug logging')
    .option('-q, --quiet', 'Only log errors');
}

/**
 * Load the config file and apply flags on top of it.
 */
export async function resolveConfig(flags: ReportFlags, cwd: string): Promise<Config> {
  const config = mergeConfig(await loadConfig(cwd, flags.config), {
    default_region: flags.region,
    output: flags.json ? 'json' : undefined,
    colors: flags.color,
    local_time: flags.localTime,
    banner: flags.banner,
    log_level: flags.verbose ? 'debug' : flags.quiet ? 'error' : undefined,
  });

  logger.setLevel(config.log_level);
  if (!config.colors) {
    chalk.level = 0;
  }
  return config;
}

/**
 * Analyzer bound to the resolved config.
 */
export function createAnalyzer(config: Config): Analyzer {
  return (raw) =>
    analyzePhoneNumber(raw, {
      defaultRegion: config.default_region,
      now: config.local_time ? new Date() : undefined,
    });
}
