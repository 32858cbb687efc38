/**
 * Numbering-plan metadata, example numbers and calling-code sharing,
 * all read from the tables bundled with libphonenumber-js.
 */
import {
  Metadata,
  getCountries,
  getCountryCallingCode,
  getExampleNumber,
  getExtPrefix,
  parsePhoneNumberWithError,
  type CountryCode,
  type PhoneNumber,
} from 'libphonenumber-js/max';
import examples from 'libphonenumber-js/mobile/examples';
import type { ExampleNumber, NumberingPlanInfo } from './types.js';

/**
 * Dialing metadata for a region. Unknown regions give an empty plan.
 * The compressed metadata stores 0 for "no value"; those become undefined.
 */
export function lookupNumberingPlan(region: CountryCode | undefined): NumberingPlanInfo {
  if (!region) {
    return { possibleLengths: [] };
  }

  const metadata = new Metadata();
  metadata.selectNumberingPlan(region);
  const plan = metadata.numberingPlan;
  if (!plan) {
    return { possibleLengths: [], extensionPrefix: getExtPrefix(region) };
  }

  return {
    internationalPrefix: plan.IDDPrefix() || undefined,
    preferredInternationalPrefix: plan.defaultIDDPrefix() || undefined,
    extensionPrefix: getExtPrefix(region) || undefined,
    possibleLengths: [...(plan.possibleLengths() || [])],
    leadingDigits: plan.leadingDigits() || undefined,
  };
}

/**
 * Every region that dials with the given calling code, sorted.
 * Non-geographic codes such as +800 have none.
 */
export function regionsForCallingCode(callingCode: string): CountryCode[] {
  return getCountries()
    .filter((country) => getCountryCallingCode(country) === callingCode)
    .sort();
}

/**
 * Trunk prefix as dialled in front of the national number.
 *
 * Read off the national format, so it is only found where the region's
 * formatting rules print it (the "0" of "020 7946 0958"). The extension
 * is left out, since national formatting appends it.
 */
export function nationalPrefixOf(number: PhoneNumber): string | undefined {
  const withoutExtension = number.ext ? parsePhoneNumberWithError(number.number) : number;
  const nationalDigits = withoutExtension.formatNational().replace(/\D/g, '');
  if (nationalDigits.length <= number.nationalNumber.length || !nationalDigits.endsWith(number.nationalNumber)) {
    return undefined;
  }
  return nationalDigits.slice(0, nationalDigits.length - number.nationalNumber.length);
}

/**
 * Example mobile number for a region.
 */
export function exampleMobileNumber(region: CountryCode | undefined): ExampleNumber | undefined {
  if (!region) {
    return undefined;
  }
  const example = getExampleNumber(region, examples);
  if (!example) {
    return undefined;
  }
  return {
    national: example.formatNational(),
    international: example.formatInternational(),
    e164: example.number,
  };
}
