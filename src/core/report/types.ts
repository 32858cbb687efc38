/**
 * Report structure produced by the aggregator.
 *
 * Categories are type aliases rather than interfaces so each one is
 * assignable to a plain field map for presentation.
 */

/**
 * Placeholder for a field whose lookup returned nothing.
 */
export const UNKNOWN = 'unknown';
export type Unknown = typeof UNKNOWN;

export type Maybe<T> = T | Unknown;

export type FieldValue = string | number | boolean | readonly string[];

export type FieldMap = Readonly<Record<string, FieldValue>>;

export type NumberFormats = {
  input: string;
  E164: string;
  international: string;
  national: string;
  RFC3966: string;
  IDD: Maybe<string>;
  raw_input_cleaned: string;
};

export type LengthCheck =
  | 'IS_POSSIBLE'
  | 'INVALID_COUNTRY'
  | 'NOT_A_NUMBER'
  | 'TOO_SHORT'
  | 'TOO_LONG'
  | 'INVALID_LENGTH';

export type ValidationInfo = {
  is_valid: boolean;
  is_possible: boolean;
  is_valid_for_region: boolean;
  validation_result: 'VALID' | 'INVALID';
  length_check: LengthCheck;
};

export type StructureInfo = {
  country_calling_code: string;
  national_number: string;
  national_number_length: number;
  total_digits: number;
  has_extension: boolean;
  extension: Maybe<string>;
};

export type LocationConfidence = 'high' | 'medium' | 'low';

export type GeographicInfo = {
  region_code: Maybe<string>;
  country: Maybe<string>;
  country_alpha_3: Maybe<string>;
  country_numeric_code: Maybe<string>;
  associated_regions: Maybe<readonly string[]>;
  region_count_for_calling_code: number;
  is_multi_region_calling_code: boolean;
  primary_location: Maybe<string>;
  location_spanish: Maybe<string>;
  location_french: Maybe<string>;
  city: Maybe<string>;
  state_province: Maybe<string>;
  location_confidence: LocationConfidence;
  area_code: Maybe<string>;
  exchange_code: Maybe<string>;
  subscriber_number: Maybe<string>;
  is_nanp_format: boolean;
};

export type TimezoneSummary = {
  all_timezones: Maybe<readonly string[]>;
  timezone_count: number;
  primary_timezone: Maybe<string>;
  spans_multiple_timezones: boolean;
};

/**
 * Clock-dependent fields, present only when local time is requested.
 */
export type TimezoneClock = {
  local_time: Maybe<string>;
  local_date: Maybe<string>;
  local_time_12h: Maybe<string>;
  utc_offset: Maybe<string>;
  timezone_abbreviation: Maybe<string>;
  is_dst: boolean;
};

export type TimezoneInfo = TimezoneSummary | (TimezoneSummary & TimezoneClock);

export type ServiceInfo = {
  carrier_name: Maybe<string>;
  carrier_available: boolean;
  number_type: string;
  number_type_code: string;
  is_mobile: boolean;
  is_fixed_line: boolean;
  is_fixed_or_mobile: boolean;
  is_voip: boolean;
  is_toll_free: boolean;
  is_premium_rate: boolean;
  is_special_service: boolean;
  likely_billable: boolean;
};

export type TechnicalData = {
  international_prefix: Maybe<string>;
  preferred_international_prefix: Maybe<string>;
  national_prefix: Maybe<string>;
  extension_prefix: Maybe<string>;
  possible_lengths: Maybe<readonly string[]>;
  leading_digits: Maybe<string>;
};

export type ExampleNumbers = {
  example_mobile_national: Maybe<string>;
  example_mobile_international: Maybe<string>;
  example_mobile_E164: Maybe<string>;
};

export interface PhoneReport {
  NUMBER_FORMATS: NumberFormats;
  VALIDATION: ValidationInfo;
  STRUCTURE: StructureInfo;
  GEOGRAPHIC_INFO: GeographicInfo;
  TIMEZONE_INFO: TimezoneInfo;
  SERVICE_INFO: ServiceInfo;
  TECHNICAL_DATA: TechnicalData;
  EXAMPLES: ExampleNumbers;
}

export type ReportCategory = keyof PhoneReport;

/**
 * Display order of the categories.
 */
export const REPORT_CATEGORIES: readonly ReportCategory[] = [
  'NUMBER_FORMATS',
  'VALIDATION',
  'STRUCTURE',
  'GEOGRAPHIC_INFO',
  'TIMEZONE_INFO',
  'SERVICE_INFO',
  'TECHNICAL_DATA',
  'EXAMPLES',
];

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export interface RiskAssessment {
  risk_level: RiskLevel;
  risk_factors: string[];
  is_safe_to_call: boolean;
}

export interface ReportSummary {
  /** Fields holding a real value rather than the placeholder */
  total_data_points: number;
  /** 0-100 */
  confidence_score: number;
  risk_assessment: RiskAssessment;
}
