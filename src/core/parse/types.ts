/**
 * Types for the parse/validate adapter.
 */
import type { CountryCode, PhoneNumber } from 'libphonenumber-js/max';

/**
 * Reasons the phone library gives for rejecting a string.
 */
export type ParseFailureReason =
  | 'NOT_A_NUMBER'
  | 'INVALID_COUNTRY'
  | 'TOO_SHORT'
  | 'TOO_LONG'
  | 'INVALID_LENGTH';

export interface ParseOptions {
  /** Region assumed when the input carries no +country code */
  defaultRegion?: CountryCode;
}

/**
 * A phone number accepted by the adapter.
 */
export interface ParsedPhone {
  /** Trimmed input as typed by the user */
  input: string;
  /** Structured value from the phone library */
  number: PhoneNumber;
  /** Set when the number only parsed after assuming the default region */
  assumedRegion?: CountryCode;
}
