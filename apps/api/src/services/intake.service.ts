// src/services/intake.service.ts
import { intakeRequestSchema } from '@intake-desk/shared';
import type { CompleteFlowResult, IntakeRequest } from '@intake-desk/shared';
import { logger as rootLogger } from '../libs/logger.js';
import type { AppLogger } from '../libs/logger.js';
import type { IntakeStore } from '../repositories/types.js';
import { AtomicityViolation, ValidationFailure } from '../utils/intakeErrors.js';
import type { IntakeStep } from '../utils/intakeErrors.js';
import { customerResolutions, intakeFlows } from '../utils/metrics.js';
import type { CustomerResolver } from './customer.service.js';
import type { VehicleResolver } from './vehicle.service.js';
import type { VisitTracker } from './visit.service.js';

export interface FlowOptions {
  /** Checked before every step; an abort before commit rolls the flow back. */
  signal?: AbortSignal;
}

export interface CoordinatorDeps {
  store: IntakeStore;
  customers: CustomerResolver;
  vehicles: VehicleResolver;
  visits: VisitTracker;
  logger?: AppLogger;
}

const optionalText = (value: string | null | undefined) => value?.trim() || null;

/**
 * Customer, vehicle, order and visit as one all-or-nothing unit. Every entry
 * point (invoice capture, document ingestion, order intake, the registration
 * wizard, quick create) goes through here.
 */
export class TransactionCoordinator {
  private readonly log: AppLogger;

  constructor(private readonly deps: CoordinatorDeps) {
    this.log = deps.logger ?? rootLogger.child({ component: 'intake' });
  }

  async createCompleteFlow(request: IntakeRequest, options: FlowOptions = {}): Promise<CompleteFlowResult> {
    const parsed = intakeRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new ValidationFailure('Invalid intake request', parsed.error.flatten().fieldErrors);
    }
    const input = parsed.data;
    const { store, customers, vehicles, visits } = this.deps;
    const { signal } = options;

    // Rejects unidentifiable candidates before a transaction is opened
    customers.identify(input.customer);

    let step: IntakeStep = 'resolve_customer';
    const enter = (next: IntakeStep) => {
      step = next;
      signal?.throwIfAborted();
    };

    try {
      const { result, outcome } = await store.transaction(async (tx) => {
        enter('resolve_customer');
        const resolution = await customers.resolveOrCreate(tx, input.customer);
        const { customer, created } = resolution;

        enter('resolve_vehicle');
        const vehicle = await vehicles.resolveOrCreate(tx, customer, input.vehicle);

        enter('create_order');
        const order = await tx.orders.insert({
          customerId: customer.id,
          vehicleId: vehicle?.id ?? null,
          type: input.order.type,
          channel: input.channel,
          description: optionalText(input.order.description),
          externalRef: optionalText(input.order.externalRef),
        });

        // A customer created by this flow was inserted with its first visit
        enter('record_visit');
        const visited = created ? customer : await visits.recordVisit(tx, customer);

        enter('commit');
        const flow: CompleteFlowResult = { customer: visited, vehicle, order, createdCustomer: created };
        return { result: flow, outcome: resolution.outcome };
      });

      // Counted only once the flow has committed
      customerResolutions.inc({ outcome });
      intakeFlows.inc({ outcome: 'committed' });
      this.log.info('Intake flow committed', {
        channel: input.channel,
        customerId: result.customer.id,
        vehicleId: result.vehicle?.id ?? null,
        orderId: result.order.id,
        createdCustomer: result.createdCustomer,
      });
      return result;
    } catch (err) {
      const violation = new AtomicityViolation(step, err);
      intakeFlows.inc({ outcome: 'rolled_back' });
      this.log.warn('Intake flow rolled back', {
        channel: input.channel,
        step,
        retryable: violation.retryable,
        error: err instanceof Error ? err.message : String(err),
      });
      throw violation;
    }
  }
}
