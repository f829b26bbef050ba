// Platform-wide constants and configuration

/** Canonical value of a phone that carries no digits. */
export const EMPTY_PHONE = '';

export interface PhoneConvention {
  /** Country calling code without the leading `+`. */
  countryCode: string;
  /** Digits in a national significant number. */
  nationalNumberLength: number;
  /** Prefix dialled before a national number inside the country, if any. */
  trunkPrefix: string;
}

export const PHONE_CONVENTIONS = {
  NANP: { countryCode: '1', nationalNumberLength: 10, trunkPrefix: '' },
  UA: { countryCode: '380', nationalNumberLength: 9, trunkPrefix: '0' },
  UK: { countryCode: '44', nationalNumberLength: 10, trunkPrefix: '0' }
} as const satisfies Record<string, PhoneConvention>;

export const DEFAULT_PHONE_CONVENTION: PhoneConvention = PHONE_CONVENTIONS.NANP;

export const INTERNATIONAL_CALL_PREFIX = '00';

export const FULL_NAME_MAX_LENGTH = 200;
export const ORGANIZATION_NAME_MAX_LENGTH = 200;
export const TAX_NUMBER_MAX_LENGTH = 32;
export const PHONE_MAX_LENGTH = 32;
export const PLATE_MAX_LENGTH = 16;
export const VIN_MAX_LENGTH = 17;
export const DESCRIPTION_MAX_LENGTH = 2000;
export const EXTERNAL_REF_MAX_LENGTH = 64;

export const VEHICLE_YEAR_MIN = 1900;

/** Largest value of a PostgreSQL `integer` column (ids, branch ids). */
export const MAX_ROW_ID = 2_147_483_647;

export const DEFAULT_RESOLVE_MAX_ATTEMPTS = 3;
