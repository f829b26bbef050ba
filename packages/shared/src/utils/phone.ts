import {
  DEFAULT_PHONE_CONVENTION,
  EMPTY_PHONE,
  INTERNATIONAL_CALL_PREFIX,
  type PhoneConvention
} from './constants.js';

/**
 * Canonicalizes a raw phone string into a comparable key.
 *
 * Numbers that can be placed in the convention's country come back as
 * `+<countryCode><national>`; explicit international numbers keep their own
 * country code; anything shorter (local extensions, partial numbers) is kept as
 * bare digits. Input without digits maps to {@link EMPTY_PHONE}.
 */
export function normalizePhone(
  raw: string | null | undefined,
  convention: PhoneConvention = DEFAULT_PHONE_CONVENTION
): string {
  const trimmed = String(raw ?? '').trim();
  const digits = trimmed.replace(/\D/g, '');
  if (!digits) return EMPTY_PHONE;

  if (trimmed.startsWith('+')) return `+${digits}`;
  if (digits.startsWith(INTERNATIONAL_CALL_PREFIX) && digits.length > INTERNATIONAL_CALL_PREFIX.length) {
    return `+${digits.slice(INTERNATIONAL_CALL_PREFIX.length)}`;
  }

  const { countryCode, nationalNumberLength, trunkPrefix } = convention;

  if (digits.length === countryCode.length + nationalNumberLength && digits.startsWith(countryCode)) {
    return `+${digits}`;
  }
  if (trunkPrefix && digits.length === trunkPrefix.length + nationalNumberLength && digits.startsWith(trunkPrefix)) {
    return `+${countryCode}${digits.slice(trunkPrefix.length)}`;
  }
  if (digits.length === nationalNumberLength) {
    return `+${countryCode}${digits}`;
  }

  return digits;
}
