/**
 * Country metadata lookup (ISO 3166-1) via i18n-iso-countries.
 */
import { createRequire } from 'node:module';
import countries, { type LocaleData } from 'i18n-iso-countries';
import type { CountryInfo } from './types.js';

const require = createRequire(import.meta.url);

let englishRegistered = false;

function ensureEnglishNames(): void {
  if (englishRegistered) return;
  const english: LocaleData = require('i18n-iso-countries/langs/en.json');
  countries.registerLocale(english);
  englishRegistered = true;
}

/**
 * Look up a region code such as "GB".
 * Region codes with no ISO entry (e.g. "AC", "XK") come back with only what is known.
 */
export function lookupCountry(regionCode: string | undefined): CountryInfo {
  if (!regionCode) {
    return {};
  }
  ensureEnglishNames();
  return {
    name: countries.getName(regionCode, 'en'),
    alpha3: countries.alpha2ToAlpha3(regionCode),
    numeric: countries.alpha2ToNumeric(regionCode),
  };
}
