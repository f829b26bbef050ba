import {
  isIdentifiable,
  normalizeIdentity,
  normalizePlate,
  normalizeTaxNumber,
  normalizeText,
  walkInIdentity,
} from '../utils/identity';
import { intakeRequestSchema } from '../utils/validation';

describe('identity normalization', () => {
  it('normalizes every part of the tuple', () => {
    expect(
      normalizeIdentity({
        branchId: 1,
        fullName: '  Jane   Doe ',
        phone: '(212) 555-0100',
        organizationName: null,
        taxNumber: ' 12-345.678/9 ',
      })
    ).toEqual({
      branchId: 1,
      fullName: 'Jane Doe',
      phone: '+12125550100',
      organizationName: '',
      taxNumber: '123456789',
    });
  });

  it('keeps the case of names and upper-cases tax numbers', () => {
    expect(normalizeText('McDonald  Motors')).toBe('McDonald Motors');
    expect(normalizeTaxNumber('de 123 456 789')).toBe('DE123456789');
  });

  it('strips separators from plates', () => {
    expect(normalizePlate(' ab-12 cd ')).toBe('AB12CD');
    expect(normalizePlate(' - ')).toBe('');
    expect(normalizePlate(undefined)).toBe('');
  });

  it('treats a tuple with no non-empty part as unidentifiable', () => {
    expect(isIdentifiable(normalizeIdentity({ branchId: 1, fullName: '   ', phone: 'none' }))).toBe(false);
    expect(isIdentifiable(normalizeIdentity({ branchId: 1, taxNumber: '42' }))).toBe(true);
  });
});

describe('walkInIdentity', () => {
  it('derives the name from the stable record id', () => {
    expect(walkInIdentity(3, { kind: 'job', id: 1042 })).toEqual({
      branchId: 3,
      fullName: 'Walk-in job #1042',
      phone: null,
      organizationName: null,
      taxNumber: null,
    });
  });

  it('gives the same identity for the same record', () => {
    const first = walkInIdentity(3, { kind: 'invoice', id: ' INV-7 ' });
    const second = walkInIdentity(3, { kind: 'invoice', id: 'INV-7' });
    expect(first).toEqual(second);
    expect(first.fullName).toBe('Walk-in invoice #INV-7');
  });

  it('rejects a blank reference id', () => {
    expect(() => walkInIdentity(3, { kind: 'document', id: '  ' })).toThrow(
      'Fallback identity requires a non-empty reference id'
    );
  });
});

describe('intakeRequestSchema', () => {
  it('coerces the branch id and accepts an omitted vehicle', () => {
    const parsed = intakeRequestSchema.parse({
      channel: 'quick_create',
      customer: { branchId: '2', fullName: 'Jane Doe' },
      order: { type: 'inquiry' },
    });
    expect(parsed.customer.branchId).toBe(2);
    expect(parsed.vehicle).toBeUndefined();
  });

  it('names the offending field', () => {
    const result = intakeRequestSchema.safeParse({
      channel: 'fax',
      customer: { branchId: 1, fullName: 'Jane Doe' },
      order: { type: 'service' },
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.flatten().fieldErrors.channel).toEqual(['Invalid intake channel']);
    }
  });
});
