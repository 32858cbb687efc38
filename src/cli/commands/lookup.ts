import { Command } from 'commander';
import { createFormatter } from '../formatters/index.js';
import { addReportOptions, createAnalyzer, resolveConfig, type ReportFlags } from '../options.js';
import { analyzeInput } from '../session.js';
import { logger as log } from '../../utils/logger.js';

/**
 * Create the lookup command.
 */
export function createLookupCommand(): Command {
  return addReportOptions(
    new Command('lookup')
      .description('Analyze a single phone number and print its report')
      .argument('<number>', 'Phone number, e.g. +442079460958')
  ).action(async (number: string, options: ReportFlags) => {
    try {
      await runLookup(number, options);
    } catch (error) {
      log.error(error instanceof Error ? error.message : 'Unknown error');
      process.exit(1);
    }
  });
}

/**
 * Print the report for one number. Exits with status 1 on invalid input.
 */
export async function runLookup(number: string, options: ReportFlags): Promise<void> {
  const config = await resolveConfig(options, process.cwd());
  const formatter = createFormatter({ format: config.output, colors: config.colors });

  const outcome = await analyzeInput(number, createAnalyzer(config), formatter);
  console.log(outcome.output);

  if (!outcome.ok) {
    process.exit(1);
  }
}
