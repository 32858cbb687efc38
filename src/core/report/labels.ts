/**
 * Display labels for library number types.
 */
import type { NumberType } from 'libphonenumber-js/max';

export type KnownNumberType = Exclude<NumberType, undefined>;

export const NUMBER_TYPE_LABELS: Record<KnownNumberType, string> = {
  FIXED_LINE: 'Fixed Line',
  MOBILE: 'Mobile',
  FIXED_LINE_OR_MOBILE: 'Fixed Line or Mobile',
  VOIP: 'VoIP',
  TOLL_FREE: 'Toll Free',
  PREMIUM_RATE: 'Premium Rate',
  SHARED_COST: 'Shared Cost',
  PERSONAL_NUMBER: 'Personal Number',
  PAGER: 'Pager',
  UAN: 'Universal Access Number',
  VOICEMAIL: 'Voicemail',
};

export const UNKNOWN_TYPE_LABEL = 'Unknown';
export const UNKNOWN_TYPE_CODE = 'UNKNOWN';

export function labelForType(type: NumberType): string {
  return type ? NUMBER_TYPE_LABELS[type] : UNKNOWN_TYPE_LABEL;
}
