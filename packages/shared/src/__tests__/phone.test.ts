import { EMPTY_PHONE, PHONE_CONVENTIONS } from '../utils/constants';
import { normalizePhone } from '../utils/phone';

describe('normalizePhone', () => {
  it('maps input without digits to the empty sentinel', () => {
    expect(normalizePhone('')).toBe(EMPTY_PHONE);
    expect(normalizePhone(null)).toBe(EMPTY_PHONE);
    expect(normalizePhone(undefined)).toBe(EMPTY_PHONE);
    expect(normalizePhone('n/a')).toBe(EMPTY_PHONE);
  });

  it('prefixes full national numbers with the country code', () => {
    expect(normalizePhone('(212) 555-0100')).toBe('+12125550100');
    expect(normalizePhone('1 212 555 0100')).toBe('+12125550100');
    expect(normalizePhone('  +1 (212) 555-0100 ')).toBe('+12125550100');
  });

  it('keeps explicit international numbers in their own country', () => {
    expect(normalizePhone('+44 20 7946 0000')).toBe('+442079460000');
    expect(normalizePhone('0044 20 7946 0000')).toBe('+442079460000');
  });

  it('keeps short local numbers as bare digits', () => {
    expect(normalizePhone('555-0100')).toBe('5550100');
    expect(normalizePhone('ext. 204')).toBe('204');
  });

  it('applies the trunk prefix of the configured convention', () => {
    const ua = PHONE_CONVENTIONS.UA;
    expect(normalizePhone('067 123 45 67', ua)).toBe('+380671234567');
    expect(normalizePhone('380671234567', ua)).toBe('+380671234567');
    expect(normalizePhone('67 123 45 67', ua)).toBe('+380671234567');
  });

  it('is stable under repeated normalization', () => {
    for (const raw of ['(212) 555-0100', '555-0100', '0044 20 7946 0000', '']) {
      const once = normalizePhone(raw);
      expect(normalizePhone(once)).toBe(once);
    }
  });
});
