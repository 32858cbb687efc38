/**
 * String helpers for display.
 */

/**
 * Turn a snake_case field key into a display label.
 * Only the first letter of each word is raised, so `RFC3966` stays intact.
 *
 * @example toLabel('is_valid_for_region') // 'Is Valid For Region'
 */
export function toLabel(key: string): string {
  return key
    .split('_')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Keep only digits and the plus sign.
 */
export function stripToDialable(input: string): string {
  return input.replace(/[^0-9+]/g, '');
}

/**
 * Count the decimal digits in a string.
 */
export function countDigits(input: string): number {
  return input.replace(/\D/g, '').length;
}
