import { Command } from 'commander';
import chalk from 'chalk';
import { renderBanner } from '../banner.js';
import { createFormatter } from '../formatters/index.js';
import { addReportOptions, createAnalyzer, resolveConfig, type ReportFlags } from '../options.js';
import { createReadlineIO, runSession } from '../session.js';
import { runLookup } from './lookup.js';
import { logger as log } from '../../utils/logger.js';

/**
 * Create the interactive command (the default when no command is given).
 */
export function createInteractiveCommand(): Command {
  return addReportOptions(
    new Command('interactive')
      .description('Prompt for phone numbers and print a report for each')
      .argument('[number]', 'Analyze this number once instead of prompting')
      .option('--banner', 'Show the startup banner')
      .option('--no-banner', 'Skip the startup banner')
  ).action(async (number: string | undefined, options: ReportFlags) => {
    try {
      if (number !== undefined) {
        await runLookup(number, options);
        return;
      }
      await runInteractive(options);
    } catch (error) {
      log.error(error instanceof Error ? error.message : 'Unknown error');
      process.exit(1);
    }
  });
}

async function runInteractive(options: ReportFlags): Promise<void> {
  const config = await resolveConfig(options, process.cwd());
  const formatter = createFormatter({ format: config.output, colors: config.colors });
  const human = config.output === 'human';

  if (config.banner && human) {
    console.log(renderBanner(config.colors));
    console.log();
  }

  const io = createReadlineIO();
  try {
    const stats = await runSession(io, createAnalyzer(config), formatter);
    log.debug('Session ended', { analyzed: stats.analyzed, rejected: stats.rejected });
  } finally {
    io.close();
  }

  if (human) {
    console.log(chalk.dim('🔍 Analysis complete. Goodbye!'));
  }
}
