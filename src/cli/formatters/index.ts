/**
 * Formatter factory.
 */
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IReportFormatter } from './types.js';

export * from './types.js';
export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';

export function createFormatter(options: FormatOptions): IReportFormatter {
  return options.format === 'json' ? new JsonFormatter() : new HumanFormatter(options);
}
