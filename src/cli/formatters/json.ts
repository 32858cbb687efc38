import type { PhoneAnalysis } from '../../core/pipeline.js';
import type { InvalidInputError } from '../../utils/errors.js';
import type { IReportFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IReportFormatter {
  formatAnalysis(analysis: PhoneAnalysis): string {
    return JSON.stringify(
      {
        input: analysis.parsed.input,
        report: analysis.report,
        summary: analysis.summary,
      },
      null,
      2
    );
  }

  formatInvalidInput(error: InvalidInputError): string {
    return JSON.stringify({ error: error.toJSON() }, null, 2);
  }
}
