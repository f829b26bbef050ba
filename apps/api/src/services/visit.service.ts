// src/services/visit.service.ts
import type { ICustomer } from '@intake-desk/shared';
import { logger as rootLogger } from '../libs/logger.js';
import type { AppLogger } from '../libs/logger.js';
import type { IntakeStore } from '../repositories/types.js';
import { ResolutionFailure } from '../utils/intakeErrors.js';

export class VisitTracker {
  private readonly log: AppLogger;
  private readonly now: () => Date;

  constructor(options: { logger?: AppLogger; now?: () => Date } = {}) {
    this.log = options.logger ?? rootLogger.child({ component: 'visit-tracker' });
    this.now = options.now ?? (() => new Date());
  }

  // One store update; the counter is never read-modified-written here
  async recordVisit(store: IntakeStore, customer: Pick<ICustomer, 'id'>): Promise<ICustomer> {
    const updated = await store.customers.recordVisit(customer.id, this.now());
    if (!updated) {
      throw new ResolutionFailure(`Customer ${customer.id} no longer exists`, { customerId: customer.id });
    }

    this.log.debug('Visit recorded', { customerId: updated.id, totalVisits: updated.totalVisits });
    return updated;
  }
}
