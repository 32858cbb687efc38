/**
 * Lookup adapter types.
 */
import type { PhoneNumber } from 'libphonenumber-js/max';

/**
 * Languages the geocoder is asked for.
 */
export type DescriptionLocale = 'en' | 'es' | 'fr';

/**
 * Prefix-table lookups keyed by a parsed number.
 * Implementations resolve to undefined (or an empty list) when a table has no entry.
 */
export interface NumberLookup {
  /** Geographic description, e.g. "London" or "Zurich" */
  describe(number: PhoneNumber, locale: DescriptionLocale): Promise<string | undefined>;
  /** Name of the carrier the number range was originally allocated to */
  carrier(number: PhoneNumber): Promise<string | undefined>;
  /** IANA timezone names */
  timezones(number: PhoneNumber): Promise<string[]>;
}

export interface CountryInfo {
  name?: string;
  alpha3?: string;
  numeric?: string;
}

export interface NumberingPlanInfo {
  internationalPrefix?: string;
  preferredInternationalPrefix?: string;
  extensionPrefix?: string;
  possibleLengths: number[];
  leadingDigits?: string;
}

export interface ExampleNumber {
  national: string;
  international: string;
  e164: string;
}

/**
 * Wall-clock reading of one timezone at a given instant.
 */
export interface ZoneClockReading {
  timezone: string;
  /** ISO-8601 local date-time without offset, e.g. 2024-01-15T12:00:00 */
  localTime: string;
  localDate: string;
  localTime12h: string;
  /** Offset from UTC such as +05:30 */
  utcOffset: string;
  utcOffsetMinutes: number;
  abbreviation: string;
  isDst: boolean;
}
