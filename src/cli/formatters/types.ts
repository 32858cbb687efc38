/**
 * Formatter type definitions.
 */
import type { PhoneAnalysis } from '../../core/pipeline.js';
import type { OutputFormat } from '../../core/config/schema.js';
import type { InvalidInputError } from '../../utils/errors.js';

export type { OutputFormat };

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Output format */
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
}

/**
 * Interface for report formatters.
 */
export interface IReportFormatter {
  /**
   * Format a complete analysis (report and summary).
   */
  formatAnalysis(analysis: PhoneAnalysis): string;

  /**
   * Format the message shown for input that is not a phone number.
   */
  formatInvalidInput(error: InvalidInputError): string;
}
