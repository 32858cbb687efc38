/**
 * Aggregator: runs every lookup for a parsed number and copies the results
 * into the eight report categories.
 */
import { validatePhoneNumberLength, type CountryCode, type PhoneNumber } from 'libphonenumber-js/max';
import type { ParsedPhone } from '../parse/types.js';
import {
  exampleMobileNumber,
  lookupCountry,
  lookupNumberingPlan,
  nationalPrefixOf,
  readZoneClock,
  regionsForCallingCode,
  type NumberLookup,
} from '../lookup/index.js';
import { countDigits, stripToDialable } from '../../utils/string.js';
import { logger } from '../../utils/logger.js';
import { labelForType, UNKNOWN_TYPE_CODE } from './labels.js';
import {
  UNKNOWN,
  type ExampleNumbers,
  type GeographicInfo,
  type LocationConfidence,
  type Maybe,
  type NumberFormats,
  type PhoneReport,
  type ServiceInfo,
  type StructureInfo,
  type TechnicalData,
  type TimezoneClock,
  type TimezoneInfo,
  type ValidationInfo,
} from './types.js';

const log = logger.child('report');

/** Placeholder zone the timezone tables use for "no data". */
const UNKNOWN_ZONE = 'Etc/Unknown';

/** Calling code of the North American Numbering Plan. */
const NANP_CALLING_CODE = '1';

export interface ReportOptions {
  lookup: NumberLookup;
  /** Region the IDD format dials from */
  defaultRegion?: CountryCode;
  /** When set, TIMEZONE_INFO carries the local clock at this instant */
  now?: Date;
}

export function orUnknown(value: string | null | undefined): Maybe<string> {
  return value ? value : UNKNOWN;
}

export function listOrUnknown(values: readonly string[] | undefined): Maybe<readonly string[]> {
  return values && values.length > 0 ? values : UNKNOWN;
}

export interface AreaCodeBreakdown {
  area_code: Maybe<string>;
  exchange_code: Maybe<string>;
  subscriber_number: Maybe<string>;
  is_nanp_format: boolean;
}

/**
 * Split a national number into area, exchange and subscriber parts.
 * NANP numbers split 3-3-4; elsewhere this is positional only.
 */
export function analyzeAreaCode(callingCode: string, nationalNumber: string): AreaCodeBreakdown {
  const isNanp = callingCode === NANP_CALLING_CODE && nationalNumber.length === 10;
  if (isNanp || nationalNumber.length >= 6) {
    return {
      area_code: nationalNumber.slice(0, 3),
      exchange_code: nationalNumber.slice(3, 6),
      subscriber_number: orUnknown(nationalNumber.slice(6)),
      is_nanp_format: isNanp,
    };
  }
  return {
    area_code: nationalNumber.length >= 3 ? nationalNumber.slice(0, 3) : UNKNOWN,
    exchange_code: UNKNOWN,
    subscriber_number: UNKNOWN,
    is_nanp_format: false,
  };
}

export interface LocationParts {
  city: Maybe<string>;
  state_province: Maybe<string>;
  location_confidence: LocationConfidence;
}

/**
 * Break a geocoder description like "Boston, MA" into parts.
 */
export function splitLocation(description: string | undefined): LocationParts {
  if (!description) {
    return { city: UNKNOWN, state_province: UNKNOWN, location_confidence: 'low' };
  }
  const parts = description.split(',').map((part) => part.trim());
  return {
    city: orUnknown(parts[0]),
    state_province: orUnknown(parts[1]),
    location_confidence: description.includes(',') ? 'high' : 'medium',
  };
}

function buildFormats(parsed: ParsedPhone, defaultRegion: CountryCode | undefined): NumberFormats {
  const { number } = parsed;
  return {
    input: parsed.input,
    E164: number.number,
    international: number.formatInternational(),
    national: number.formatNational(),
    RFC3966: number.format('RFC3966'),
    IDD: defaultRegion ? orUnknown(number.format('IDD', { fromCountry: defaultRegion })) : UNKNOWN,
    raw_input_cleaned: stripToDialable(parsed.input),
  };
}

/**
 * Non-geographic calling codes (+800, +882...) form a region of their own,
 * so a valid number there is valid for its region too.
 */
function hasOwnRegion(number: PhoneNumber): boolean {
  return number.country !== undefined || regionsForCallingCode(number.countryCallingCode).length === 0;
}

function buildValidation(number: PhoneNumber): ValidationInfo {
  const isValid = number.isValid();
  return {
    is_valid: isValid,
    is_possible: number.isPossible(),
    is_valid_for_region: isValid && hasOwnRegion(number),
    validation_result: isValid ? 'VALID' : 'INVALID',
    length_check: validatePhoneNumberLength(number.number) ?? 'IS_POSSIBLE',
  };
}

function buildStructure(number: PhoneNumber): StructureInfo {
  return {
    country_calling_code: number.countryCallingCode,
    national_number: number.nationalNumber,
    national_number_length: number.nationalNumber.length,
    total_digits: countDigits(number.number),
    has_extension: Boolean(number.ext),
    extension: orUnknown(number.ext),
  };
}

async function buildGeographic(number: PhoneNumber, lookup: NumberLookup): Promise<GeographicInfo> {
  const region = number.country;
  const country = lookupCountry(region);
  const regions = regionsForCallingCode(number.countryCallingCode);

  const english = await lookup.describe(number, 'en');
  const spanish = await lookup.describe(number, 'es');
  const french = await lookup.describe(number, 'fr');

  return {
    region_code: orUnknown(region),
    country: orUnknown(country.name),
    country_alpha_3: orUnknown(country.alpha3),
    country_numeric_code: orUnknown(country.numeric),
    associated_regions: listOrUnknown(regions),
    region_count_for_calling_code: regions.length,
    is_multi_region_calling_code: regions.length > 1,
    primary_location: orUnknown(english),
    // Translations only count when they add something
    location_spanish: spanish !== english ? orUnknown(spanish) : UNKNOWN,
    location_french: french !== english ? orUnknown(french) : UNKNOWN,
    ...splitLocation(english),
    ...analyzeAreaCode(number.countryCallingCode, number.nationalNumber),
  };
}

function buildClock(zone: string | undefined, now: Date): TimezoneClock {
  const reading = zone ? readZoneClock(zone, now) : undefined;
  return {
    local_time: orUnknown(reading?.localTime),
    local_date: orUnknown(reading?.localDate),
    local_time_12h: orUnknown(reading?.localTime12h),
    utc_offset: orUnknown(reading?.utcOffset),
    timezone_abbreviation: orUnknown(reading?.abbreviation),
    is_dst: reading?.isDst ?? false,
  };
}

async function buildTimezone(number: PhoneNumber, lookup: NumberLookup, now: Date | undefined): Promise<TimezoneInfo> {
  const zones = (await lookup.timezones(number)).filter((zone) => zone !== UNKNOWN_ZONE);
  const summary = {
    all_timezones: listOrUnknown(zones),
    timezone_count: zones.length,
    primary_timezone: orUnknown(zones[0]),
    spans_multiple_timezones: zones.length > 1,
  };
  return now ? { ...summary, ...buildClock(zones[0], now) } : summary;
}

async function buildService(number: PhoneNumber, lookup: NumberLookup): Promise<ServiceInfo> {
  const carrier = await lookup.carrier(number);
  const type = number.getType();
  return {
    carrier_name: orUnknown(carrier),
    carrier_available: Boolean(carrier),
    number_type: labelForType(type),
    number_type_code: type ?? UNKNOWN_TYPE_CODE,
    is_mobile: type === 'MOBILE',
    is_fixed_line: type === 'FIXED_LINE',
    is_fixed_or_mobile: type === 'FIXED_LINE_OR_MOBILE',
    is_voip: type === 'VOIP',
    is_toll_free: type === 'TOLL_FREE',
    is_premium_rate: type === 'PREMIUM_RATE',
    is_special_service: type === 'PREMIUM_RATE' || type === 'SHARED_COST' || type === 'UAN',
    likely_billable: type !== 'TOLL_FREE' && type !== 'VOICEMAIL',
  };
}

function buildTechnical(number: PhoneNumber): TechnicalData {
  const plan = lookupNumberingPlan(number.country);
  return {
    international_prefix: orUnknown(plan.internationalPrefix),
    preferred_international_prefix: orUnknown(plan.preferredInternationalPrefix),
    national_prefix: orUnknown(nationalPrefixOf(number)),
    extension_prefix: orUnknown(plan.extensionPrefix?.trim()),
    possible_lengths: listOrUnknown(plan.possibleLengths.map(String)),
    leading_digits: orUnknown(plan.leadingDigits),
  };
}

function buildExamples(number: PhoneNumber): ExampleNumbers {
  const example = exampleMobileNumber(number.country);
  return {
    example_mobile_national: orUnknown(example?.national),
    example_mobile_international: orUnknown(example?.international),
    example_mobile_E164: orUnknown(example?.e164),
  };
}

/**
 * Build the full report for a parsed number.
 * Lookups run one after another; a lookup with no answer leaves UNKNOWN.
 */
export async function buildReport(parsed: ParsedPhone, options: ReportOptions): Promise<PhoneReport> {
  const { number } = parsed;
  const { lookup } = options;

  log.debug('Formatting and validating number');
  const formats = buildFormats(parsed, options.defaultRegion);
  const validation = buildValidation(number);
  const structure = buildStructure(number);

  log.debug('Gathering geographic data');
  const geographic = await buildGeographic(number, lookup);

  log.debug('Resolving timezones');
  const timezone = await buildTimezone(number, lookup, options.now);

  log.debug('Retrieving carrier information');
  const service = await buildService(number, lookup);

  return {
    NUMBER_FORMATS: formats,
    VALIDATION: validation,
    STRUCTURE: structure,
    GEOGRAPHIC_INFO: geographic,
    TIMEZONE_INFO: timezone,
    SERVICE_INFO: service,
    TECHNICAL_DATA: buildTechnical(number),
    EXAMPLES: buildExamples(number),
  };
}
