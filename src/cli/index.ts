import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createInteractiveCommand } from './commands/interactive.js';
import { createLookupCommand } from './commands/lookup.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION: string = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('phonescope')
    .description('Offline phone number intelligence: formats, validity, location, carrier and timezones')
    .version(VERSION);

  program.addCommand(createInteractiveCommand(), { isDefault: true });
  program.addCommand(createLookupCommand());
  return program;
}
