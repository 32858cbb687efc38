/**
 * Parse/validate adapter barrel.
 */
export * from './types.js';
export { parsePhoneInput, PhoneInputSchema, DEFAULT_REGION } from './parser.js';
