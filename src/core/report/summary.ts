/**
 * Derived analysis: data-point count, confidence score and risk assessment.
 */
import {
  REPORT_CATEGORIES,
  UNKNOWN,
  type FieldMap,
  type PhoneReport,
  type ReportSummary,
  type RiskAssessment,
  type RiskLevel,
} from './types.js';

export const RISK_FACTORS = {
  INVALID: 'Invalid number format',
  PREMIUM_RATE: 'Premium rate number - charges may apply',
  VOIP: 'VoIP number - location may not be accurate',
  NO_LOCATION: 'Location information unavailable',
} as const;

/**
 * The field map of one category.
 */
export function categoryFields(report: PhoneReport, category: keyof PhoneReport): FieldMap {
  return report[category];
}

/**
 * Count fields that hold a real value.
 */
export function countDataPoints(report: PhoneReport): number {
  let total = 0;
  for (const category of REPORT_CATEGORIES) {
    for (const value of Object.values(categoryFields(report, category))) {
      if (value !== UNKNOWN) {
        total++;
      }
    }
  }
  return total;
}

/**
 * Weighted score of how much the lookups could tell, capped at 100.
 */
export function scoreConfidence(report: PhoneReport): number {
  const geo = report.GEOGRAPHIC_INFO;
  let score = 0;
  if (report.VALIDATION.is_valid) score += 30;
  if (geo.primary_location !== UNKNOWN) score += 25;
  if (report.SERVICE_INFO.carrier_name !== UNKNOWN) score += 20;
  if (geo.area_code !== UNKNOWN) score += 15;
  if (geo.city !== UNKNOWN) score += 10;
  return Math.min(score, 100);
}

export function assessRisk(report: PhoneReport): RiskAssessment {
  const factors: string[] = [];
  let level: RiskLevel = 'LOW';
  const valid = report.VALIDATION.is_valid;

  if (!valid) {
    factors.push(RISK_FACTORS.INVALID);
    level = 'HIGH';
  }

  if (report.SERVICE_INFO.is_premium_rate) {
    factors.push(RISK_FACTORS.PREMIUM_RATE);
    level = 'MEDIUM';
  }

  if (report.SERVICE_INFO.is_voip) {
    factors.push(RISK_FACTORS.VOIP);
    if (level === 'LOW') {
      level = 'MEDIUM';
    }
  }

  if (report.GEOGRAPHIC_INFO.primary_location === UNKNOWN) {
    factors.push(RISK_FACTORS.NO_LOCATION);
  }

  return {
    risk_level: level,
    risk_factors: factors,
    is_safe_to_call: level !== 'HIGH' && valid,
  };
}

export function summarizeReport(report: PhoneReport): ReportSummary {
  return {
    total_data_points: countDataPoints(report),
    confidence_score: scoreConfidence(report),
    risk_assessment: assessRisk(report),
  };
}
