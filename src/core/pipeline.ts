/**
 * Single-number analysis pipeline: parse, aggregate, summarize.
 */
import type { CountryCode } from 'libphonenumber-js/max';
import { parsePhoneInput, DEFAULT_REGION, type ParsedPhone } from './parse/index.js';
import { createGeoCarrierLookup, type NumberLookup } from './lookup/index.js';
import { buildReport, summarizeReport, type PhoneReport, type ReportSummary } from './report/index.js';
import { logger } from '../utils/logger.js';

const log = logger.child('pipeline');

export interface AnalyzeOptions {
  defaultRegion?: CountryCode;
  /** Defaults to the bundled offline tables */
  lookup?: NumberLookup;
  /** Instant for local-time fields; omit for clock-independent output */
  now?: Date;
}

export interface PhoneAnalysis {
  parsed: ParsedPhone;
  report: PhoneReport;
  summary: ReportSummary;
}

/**
 * Analyze one raw input string.
 *
 * @throws InvalidInputError when the input is not a phone number
 */
export async function analyzePhoneNumber(raw: string, options: AnalyzeOptions = {}): Promise<PhoneAnalysis> {
  const defaultRegion = options.defaultRegion ?? DEFAULT_REGION;

  log.debug('Parsing number format');
  const parsed = parsePhoneInput(raw, { defaultRegion });
  if (parsed.assumedRegion) {
    log.debug(`No country code given, assumed ${parsed.assumedRegion}`);
  }

  const report = await buildReport(parsed, {
    lookup: options.lookup ?? createGeoCarrierLookup(),
    defaultRegion,
    now: options.now,
  });

  log.debug('Calculating risk assessment');
  return { parsed, report, summary: summarizeReport(report) };
}
