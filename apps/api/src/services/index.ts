// src/services/index.ts
import type { PhoneConvention } from '@intake-desk/shared';
import type { AppLogger } from '../libs/logger.js';
import type { IntakeStore } from '../repositories/types.js';
import { CustomerResolver } from './customer.service.js';
import { IdentityMatcher } from './identity.service.js';
import { TransactionCoordinator } from './intake.service.js';
import { VehicleResolver } from './vehicle.service.js';
import { VisitTracker } from './visit.service.js';

export interface IntakeDeskOptions {
  store: IntakeStore;
  logger: AppLogger;
  phoneConvention?: PhoneConvention;
  maxAttempts?: number;
  now?: () => Date;
}

export interface IntakeDesk {
  store: IntakeStore;
  matcher: IdentityMatcher;
  customers: CustomerResolver;
  vehicles: VehicleResolver;
  visits: VisitTracker;
  intake: TransactionCoordinator;
}

export function createIntakeDesk(options: IntakeDeskOptions): IntakeDesk {
  const { store, logger, maxAttempts, now } = options;

  const matcher = new IdentityMatcher(options.phoneConvention);
  const customers = new CustomerResolver(matcher, {
    logger: logger.child({ component: 'customer-resolver' }),
    maxAttempts,
    now,
  });
  const vehicles = new VehicleResolver({ logger: logger.child({ component: 'vehicle-resolver' }), maxAttempts, now });
  const visits = new VisitTracker({ logger: logger.child({ component: 'visit-tracker' }), now });
  const intake = new TransactionCoordinator({
    store,
    customers,
    vehicles,
    visits,
    logger: logger.child({ component: 'intake' }),
  });

  return { store, matcher, customers, vehicles, visits, intake };
}

export { CustomerResolver, IdentityMatcher, TransactionCoordinator, VehicleResolver, VisitTracker };
