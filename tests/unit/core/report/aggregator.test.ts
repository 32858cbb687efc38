/**
 * Tests for report aggregation.
 */
import { describe, it, expect } from 'vitest';
import { parsePhoneInput } from '../../../../src/core/parse/parser.js';
import { analyzeAreaCode, buildReport, splitLocation } from '../../../../src/core/report/aggregator.js';
import { UNKNOWN } from '../../../../src/core/report/types.js';
import { createFakeLookup, LONDON_LOOKUP } from '../../../helpers/fake-lookup.js';

describe('analyzeAreaCode', () => {
  it('should split NANP numbers 3-3-4', () => {
    expect(analyzeAreaCode('1', '2015550123')).toEqual({
      area_code: '201',
      exchange_code: '555',
      subscriber_number: '0123',
      is_nanp_format: true,
    });
  });

  it('should split other long numbers positionally', () => {
    expect(analyzeAreaCode('44', '2079460958')).toEqual({
      area_code: '207',
      exchange_code: '946',
      subscriber_number: '0958',
      is_nanp_format: false,
    });
  });

  it('should only give an area code for short numbers', () => {
    expect(analyzeAreaCode('44', '1234')).toEqual({
      area_code: '123',
      exchange_code: UNKNOWN,
      subscriber_number: UNKNOWN,
      is_nanp_format: false,
    });
    expect(analyzeAreaCode('44', '12').area_code).toBe(UNKNOWN);
  });
});

describe('splitLocation', () => {
  it('should split city and state with high confidence', () => {
    expect(splitLocation('Boston, MA')).toEqual({
      city: 'Boston',
      state_province: 'MA',
      location_confidence: 'high',
    });
  });

  it('should take a bare description as the city', () => {
    expect(splitLocation('London')).toEqual({
      city: 'London',
      state_province: UNKNOWN,
      location_confidence: 'medium',
    });
  });

  it('should report low confidence without a description', () => {
    expect(splitLocation(undefined)).toEqual({
      city: UNKNOWN,
      state_province: UNKNOWN,
      location_confidence: 'low',
    });
  });
});

describe('buildReport', () => {
  const parsed = parsePhoneInput('+44 20 7946 0958');

  it('should fill the format category', async () => {
    const report = await buildReport(parsed, { lookup: createFakeLookup(LONDON_LOOKUP), defaultRegion: 'US' });

    expect(report.NUMBER_FORMATS).toEqual({
      input: '+44 20 7946 0958',
      E164: '+442079460958',
      international: '+44 20 7946 0958',
      national: '020 7946 0958',
      RFC3966: 'tel:+442079460958',
      IDD: '011 44 20 7946 0958',
      raw_input_cleaned: '+442079460958',
    });
  });

  it('should validate and break down the number', async () => {
    const report = await buildReport(parsed, { lookup: createFakeLookup(LONDON_LOOKUP) });

    expect(report.VALIDATION).toEqual({
      is_valid: true,
      is_possible: true,
      is_valid_for_region: true,
      validation_result: 'VALID',
      length_check: 'IS_POSSIBLE',
    });
    expect(report.STRUCTURE).toEqual({
      country_calling_code: '44',
      national_number: '2079460958',
      national_number_length: 10,
      total_digits: 12,
      has_extension: false,
      extension: UNKNOWN,
    });
  });

  it('should leave IDD unknown without a region to dial from', async () => {
    const report = await buildReport(parsed, { lookup: createFakeLookup(LONDON_LOOKUP) });

    expect(report.NUMBER_FORMATS.IDD).toBe(UNKNOWN);
  });

  it('should keep only translations that differ from English', async () => {
    const report = await buildReport(parsed, { lookup: createFakeLookup(LONDON_LOOKUP) });
    const geo = report.GEOGRAPHIC_INFO;

    expect(geo.primary_location).toBe('London');
    expect(geo.location_spanish).toBe('Londres');
    expect(geo.location_french).toBe(UNKNOWN);
  });

  it('should list the regions sharing the calling code', async () => {
    const report = await buildReport(parsed, { lookup: createFakeLookup(LONDON_LOOKUP) });
    const geo = report.GEOGRAPHIC_INFO;

    expect(geo.region_code).toBe('GB');
    expect(geo.country).toBe('United Kingdom');
    expect(geo.country_alpha_3).toBe('GBR');
    expect(geo.associated_regions).toEqual(['GB', 'GG', 'IM', 'JE']);
    expect(geo.region_count_for_calling_code).toBe(4);
    expect(geo.is_multi_region_calling_code).toBe(true);
  });

  it('should omit clock fields unless a time is given', async () => {
    const report = await buildReport(parsed, { lookup: createFakeLookup(LONDON_LOOKUP) });

    expect(report.TIMEZONE_INFO).toEqual({
      all_timezones: ['Europe/London'],
      timezone_count: 1,
      primary_timezone: 'Europe/London',
      spans_multiple_timezones: false,
    });
  });

  it('should add the local clock when a time is given', async () => {
    const report = await buildReport(parsed, {
      lookup: createFakeLookup(LONDON_LOOKUP),
      now: new Date('2024-07-15T12:00:00Z'),
    });

    expect(report.TIMEZONE_INFO).toEqual({
      all_timezones: ['Europe/London'],
      timezone_count: 1,
      primary_timezone: 'Europe/London',
      spans_multiple_timezones: false,
      local_time: '2024-07-15T13:00:00',
      local_date: '2024-07-15',
      local_time_12h: '01:00 PM',
      utc_offset: '+01:00',
      timezone_abbreviation: 'GMT+1',
      is_dst: true,
    });
  });

  it('should drop the placeholder zone', async () => {
    const report = await buildReport(parsed, {
      lookup: createFakeLookup({ timezones: ['Etc/Unknown'] }),
    });

    expect(report.TIMEZONE_INFO.all_timezones).toBe(UNKNOWN);
    expect(report.TIMEZONE_INFO.timezone_count).toBe(0);
    expect(report.TIMEZONE_INFO.primary_timezone).toBe(UNKNOWN);
  });

  it('should mark the carrier unknown when the lookup has none', async () => {
    const report = await buildReport(parsed, { lookup: createFakeLookup(LONDON_LOOKUP) });

    expect(report.SERVICE_INFO.carrier_name).toBe(UNKNOWN);
    expect(report.SERVICE_INFO.carrier_available).toBe(false);
    expect(report.SERVICE_INFO.number_type).toBe('Fixed Line');
    expect(report.SERVICE_INFO.number_type_code).toBe('FIXED_LINE');
    expect(report.SERVICE_INFO.is_fixed_line).toBe(true);
    expect(report.SERVICE_INFO.likely_billable).toBe(true);
  });

  it('should report the carrier when there is one', async () => {
    const mobile = parsePhoneInput('+447400123456');
    const report = await buildReport(mobile, {
      lookup: createFakeLookup({ carrier: 'Test Mobile' }),
    });

    expect(report.SERVICE_INFO.carrier_name).toBe('Test Mobile');
    expect(report.SERVICE_INFO.carrier_available).toBe(true);
    expect(report.SERVICE_INFO.is_mobile).toBe(true);
  });

  it('should fill technical data from the numbering plan', async () => {
    const report = await buildReport(parsed, { lookup: createFakeLookup(LONDON_LOOKUP) });

    expect(report.TECHNICAL_DATA.international_prefix).toBe('00');
    expect(report.TECHNICAL_DATA.national_prefix).toBe('0');
    expect(report.TECHNICAL_DATA.extension_prefix).toBe('x');
    expect(report.TECHNICAL_DATA.possible_lengths).toContain('10');
  });

  it('should give a mobile example for the region', async () => {
    const report = await buildReport(parsed, { lookup: createFakeLookup(LONDON_LOOKUP) });

    expect(report.EXAMPLES.example_mobile_E164).toMatch(/^\+447\d{9}$/);
  });

  it('should record the extension', async () => {
    const report = await buildReport(parsePhoneInput('+44 20 7946 0958 ext. 42'), {
      lookup: createFakeLookup(LONDON_LOOKUP),
    });

    expect(report.STRUCTURE.has_extension).toBe(true);
    expect(report.STRUCTURE.extension).toBe('42');
  });

  it('should keep the national prefix when there is an extension', async () => {
    const report = await buildReport(parsePhoneInput('+44 20 7946 0958 ext 123'), {
      lookup: createFakeLookup(LONDON_LOOKUP),
    });

    expect(report.STRUCTURE.extension).toBe('123');
    expect(report.TECHNICAL_DATA.national_prefix).toBe('0');
  });

  it('should treat a valid non-geographic number as valid for its region', async () => {
    const report = await buildReport(parsePhoneInput('+80012345678'), { lookup: createFakeLookup() });

    expect(report.VALIDATION.is_valid).toBe(true);
    expect(report.VALIDATION.is_valid_for_region).toBe(true);
    expect(report.GEOGRAPHIC_INFO.region_code).toBe(UNKNOWN);
  });

  it('should run lookups in a fixed order', async () => {
    const lookup = createFakeLookup(LONDON_LOOKUP);
    await buildReport(parsed, { lookup });

    expect(lookup.calls).toEqual(['describe:en', 'describe:es', 'describe:fr', 'timezones', 'carrier']);
  });
});
