// src/services/customer.service.ts
import {
  candidateIdentitySchema,
  CustomerStatus,
  DEFAULT_RESOLVE_MAX_ATTEMPTS,
  isIdentifiable,
} from '@intake-desk/shared';
import type { CandidateIdentity, IdentityKey, ResolvedCustomer } from '@intake-desk/shared';
import { logger as rootLogger } from '../libs/logger.js';
import type { AppLogger } from '../libs/logger.js';
import type { IntakeStore } from '../repositories/types.js';
import { ResolutionFailure, ValidationFailure } from '../utils/intakeErrors.js';
import { customerResolutions } from '../utils/metrics.js';
import { IdentityMatcher } from './identity.service.js';

export type ResolutionOutcome = 'created' | 'reused' | 'race_reused';

export interface CustomerResolution extends ResolvedCustomer {
  outcome: ResolutionOutcome;
}

export interface ResolverOptions {
  logger?: AppLogger;
  now?: () => Date;
  maxAttempts?: number;
}

export class CustomerResolver {
  private readonly log: AppLogger;
  private readonly now: () => Date;
  private readonly maxAttempts: number;

  constructor(private readonly matcher: IdentityMatcher = new IdentityMatcher(), options: ResolverOptions = {}) {
    this.log = options.logger ?? rootLogger.child({ component: 'customer-resolver' });
    this.now = options.now ?? (() => new Date());
    this.maxAttempts = options.maxAttempts ?? DEFAULT_RESOLVE_MAX_ATTEMPTS;
  }

  /**
   * Checks the candidate and returns its normalized key.
   * Throws ValidationFailure without touching any store.
   */
  identify(candidate: CandidateIdentity): IdentityKey {
    const parsed = candidateIdentitySchema.safeParse(candidate);
    if (!parsed.success) {
      throw new ValidationFailure('Invalid customer identity', parsed.error.flatten().fieldErrors);
    }

    const key = this.matcher.keyOf(parsed.data);
    if (!isIdentifiable(key)) {
      throw new ValidationFailure(
        'Customer identity needs at least one of fullName, phone, organizationName or taxNumber'
      );
    }
    return key;
  }

  /**
   * Standalone resolution against a store outside any transaction, where every
   * write is committed by the time this returns. Counts the outcome.
   */
  async resolve(store: IntakeStore, candidate: CandidateIdentity): Promise<ResolvedCustomer> {
    const { customer, created, outcome } = await this.resolveOrCreate(store, candidate);
    customerResolutions.inc({ outcome });
    return { customer, created };
  }

  /**
   * Returns the one customer for the candidate's identity tuple, creating it
   * when absent. A lost insert race resolves to the winner's record.
   * Inside a transaction the caller counts the outcome once it commits.
   */
  async resolveOrCreate(store: IntakeStore, candidate: CandidateIdentity): Promise<CustomerResolution> {
    const key = this.identify(candidate);

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const existing = await this.matcher.lookup(store, key);
      if (existing) {
        return this.settle({ customer: existing, created: false, outcome: attempt === 1 ? 'reused' : 'race_reused' }, attempt);
      }

      const at = this.now();
      const created = await store.customers.insertIfAbsent({
        ...key,
        arrivalTime: at,
        currentStatus: CustomerStatus.ARRIVED,
        lastVisit: at,
        totalVisits: 1,
      });
      if (created) {
        return this.settle({ customer: created, created: true, outcome: 'created' }, attempt);
      }

      // Conflict: a concurrent insert of the same tuple got there first
      const winner = await this.matcher.lookup(store, key);
      if (winner) {
        return this.settle({ customer: winner, created: false, outcome: 'race_reused' }, attempt);
      }

      this.log.warn('Identity conflict without a visible winner, retrying', {
        branchId: key.branchId,
        attempt,
      });
    }

    throw new ResolutionFailure(`Customer could not be resolved after ${this.maxAttempts} attempts`, {
      branchId: key.branchId,
      attempts: this.maxAttempts,
    });
  }

  private settle(resolution: CustomerResolution, attempt: number): CustomerResolution {
    this.log.info('Customer resolved', { outcome: resolution.outcome, customerId: resolution.customer.id, attempt });
    return resolution;
  }
}
