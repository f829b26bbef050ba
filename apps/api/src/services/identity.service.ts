// src/services/identity.service.ts
import { DEFAULT_PHONE_CONVENTION, normalizeIdentity } from '@intake-desk/shared';
import type { CandidateIdentity, ICustomer, IdentityKey, PhoneConvention } from '@intake-desk/shared';
import type { IntakeStore } from '../repositories/types.js';

/**
 * Exact-tuple lookup. The store's unique index guarantees at most one match,
 * so there is nothing to rank or disambiguate here.
 */
export class IdentityMatcher {
  constructor(private readonly convention: PhoneConvention = DEFAULT_PHONE_CONVENTION) {}

  keyOf(candidate: CandidateIdentity): IdentityKey {
    return normalizeIdentity(candidate, this.convention);
  }

  find(store: IntakeStore, candidate: CandidateIdentity): Promise<ICustomer | null> {
    return this.lookup(store, this.keyOf(candidate));
  }

  lookup(store: IntakeStore, key: IdentityKey): Promise<ICustomer | null> {
    return store.customers.findByIdentity(key);
  }
}
