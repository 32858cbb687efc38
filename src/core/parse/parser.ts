/**
 * Parse/validate adapter over libphonenumber-js.
 *
 * Turns raw user input into a ParsedPhone or throws InvalidInputError.
 * Validity of the number itself is not checked here; the report shows it.
 */
import { z } from 'zod';
import { parsePhoneNumberWithError, ParseError, type CountryCode, type PhoneNumber } from 'libphonenumber-js/max';
import { InvalidInputError, ErrorCodes } from '../../utils/errors.js';
import type { ParseFailureReason, ParseOptions, ParsedPhone } from './types.js';

export const DEFAULT_REGION: CountryCode = 'US';

/**
 * Digits, dialing punctuation, and an optional trailing extension.
 */
const PHONE_INPUT_PATTERN = /^[+\d\s\-.()/]+(?:\s*(?:ext\.?|x|#)\s*\d{1,7})?$/i;

export const PhoneInputSchema = z
  .string()
  .trim()
  .min(1, { message: 'No phone number provided' })
  .regex(PHONE_INPUT_PATTERN, {
    message: 'Phone numbers may only contain digits, spaces, + - . / ( ) and an extension',
  });

const REASON_MESSAGES: Record<ParseFailureReason, string> = {
  NOT_A_NUMBER: 'The input does not look like a phone number',
  INVALID_COUNTRY: 'Unknown or missing country calling code',
  TOO_SHORT: 'The number is too short',
  TOO_LONG: 'The number is too long',
  INVALID_LENGTH: 'The number length is not valid for its country',
};

type Attempt =
  | { ok: true; number: PhoneNumber }
  | { ok: false; reason: ParseFailureReason };

function isFailureReason(value: string): value is ParseFailureReason {
  return value in REASON_MESSAGES;
}

function attemptParse(text: string, region?: CountryCode): Attempt {
  try {
    return { ok: true, number: parsePhoneNumberWithError(text, region) };
  } catch (error) {
    if (error instanceof ParseError) {
      return { ok: false, reason: isFailureReason(error.message) ? error.message : 'NOT_A_NUMBER' };
    }
    throw error;
  }
}

/**
 * Parse raw input into a phone number.
 *
 * International form is tried first. Only when the library reports a missing
 * or unknown country code is the input retried in the default region.
 *
 * @throws InvalidInputError when the input is empty, malformed, or unparsable
 */
export function parsePhoneInput(raw: string, options: ParseOptions = {}): ParsedPhone {
  const checked = PhoneInputSchema.safeParse(raw);
  if (!checked.success) {
    const issue = checked.error.issues[0];
    const empty = issue?.code === 'too_small';
    throw new InvalidInputError(
      empty ? ErrorCodes.EMPTY_INPUT : ErrorCodes.MALFORMED_INPUT,
      issue?.message ?? 'Invalid input',
      { input: raw }
    );
  }

  const input = checked.data;
  const region = options.defaultRegion ?? DEFAULT_REGION;

  const international = attemptParse(input);
  if (international.ok) {
    return { input, number: international.number };
  }

  if (international.reason === 'INVALID_COUNTRY' && !input.startsWith('+')) {
    const regional = attemptParse(input, region);
    if (regional.ok) {
      return { input, number: regional.number, assumedRegion: region };
    }
    throw unparsable(input, regional.reason, region);
  }

  throw unparsable(input, international.reason);
}

function unparsable(input: string, reason: ParseFailureReason, region?: CountryCode): InvalidInputError {
  return new InvalidInputError(
    ErrorCodes.UNPARSABLE_NUMBER,
    REASON_MESSAGES[reason],
    region ? { input, reason, region } : { input, reason }
  );
}

