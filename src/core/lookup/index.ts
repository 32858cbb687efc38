/**
 * Lookup adapters barrel.
 */
export * from './types.js';
export { createGeoCarrierLookup } from './geo-carrier.js';
export { lookupCountry } from './country.js';
export {
  lookupNumberingPlan,
  regionsForCallingCode,
  nationalPrefixOf,
  exampleMobileNumber,
} from './numbering-plan.js';
export { readZoneClock, formatOffset } from './time.js';
