import type { CandidateIdentity, FallbackReference, IdentityKey } from '../types/entities.js';
import { DEFAULT_PHONE_CONVENTION, EMPTY_PHONE, type PhoneConvention } from './constants.js';
import { normalizePhone } from './phone.js';

/** Trims and collapses inner whitespace. Case is kept as entered. */
export function normalizeText(value: string | null | undefined): string {
  return String(value ?? '').replace(/\s+/g, ' ').trim();
}

/** Tax numbers compare without separators and case. */
export function normalizeTaxNumber(value: string | null | undefined): string {
  return String(value ?? '').replace(/[\s.\-/]/g, '').toUpperCase();
}

export function normalizePlate(value: string | null | undefined): string {
  return String(value ?? '').replace(/[\s-]/g, '').toUpperCase();
}

export function normalizeIdentity(
  candidate: CandidateIdentity,
  convention: PhoneConvention = DEFAULT_PHONE_CONVENTION
): IdentityKey {
  return {
    branchId: candidate.branchId,
    fullName: normalizeText(candidate.fullName),
    phone: normalizePhone(candidate.phone, convention),
    organizationName: normalizeText(candidate.organizationName),
    taxNumber: normalizeTaxNumber(candidate.taxNumber)
  };
}

/** A key is identifiable when at least one of its attributes carries a value. */
export function isIdentifiable(key: IdentityKey): boolean {
  return (
    key.fullName !== '' ||
    key.phone !== EMPTY_PHONE ||
    key.organizationName !== '' ||
    key.taxNumber !== ''
  );
}

/**
 * Identity for a customer whose real identity is unknown at intake.
 * Derived from a stable record id so resubmitting the same job lands on the
 * same customer.
 */
export function walkInIdentity(branchId: number, reference: FallbackReference): CandidateIdentity {
  const id = normalizeText(String(reference.id));
  if (!id) {
    throw new Error('Fallback identity requires a non-empty reference id');
  }

  return {
    branchId,
    fullName: `Walk-in ${reference.kind} #${id}`,
    phone: null,
    organizationName: null,
    taxNumber: null
  };
}
