/**
 * Report barrel.
 */
export * from './types.js';
export { buildReport, orUnknown, listOrUnknown, analyzeAreaCode, splitLocation } from './aggregator.js';
export type { ReportOptions, AreaCodeBreakdown, LocationParts } from './aggregator.js';
export { summarizeReport, countDataPoints, scoreConfidence, assessRisk, categoryFields, RISK_FACTORS } from './summary.js';
export { labelForType, NUMBER_TYPE_LABELS } from './labels.js';
