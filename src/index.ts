/**
 * phonescope - offline phone number intelligence.
 * Main library exports barrel file.
 */

// Analysis
export * from './core/index.js';

// Presentation
export { HumanFormatter, JsonFormatter, createFormatter } from './cli/formatters/index.js';
export type { FormatOptions, IReportFormatter } from './cli/formatters/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
