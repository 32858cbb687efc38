/**
 * NumberLookup backed by the offline geocoder, carrier and timezone tables
 * shipped with phonenumber-geo-carrier.
 */
import { carrier, geocoder, timezones } from 'phonenumber-geo-carrier';
import type { NumberLookup } from './types.js';

function present(value: string | null | undefined): string | undefined {
  return value ? value : undefined;
}

export function createGeoCarrierLookup(): NumberLookup {
  return {
    async describe(number, locale) {
      return present(await geocoder(number, locale));
    },
    async carrier(number) {
      return present(await carrier(number, 'en'));
    },
    async timezones(number) {
      const zones = await timezones(number);
      return zones ? [...zones] : [];
    },
  };
}
