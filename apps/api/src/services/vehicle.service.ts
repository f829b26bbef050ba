// src/services/vehicle.service.ts
import { DEFAULT_RESOLVE_MAX_ATTEMPTS, normalizePlate, normalizeText } from '@intake-desk/shared';
import type { ICustomer, IVehicle, VehicleAttributes, VehicleDetails } from '@intake-desk/shared';
import { logger as rootLogger } from '../libs/logger.js';
import type { AppLogger } from '../libs/logger.js';
import type { IntakeStore } from '../repositories/types.js';
import { ResolutionFailure } from '../utils/intakeErrors.js';

const normalizeVin = (value: string | null | undefined) => String(value ?? '').replace(/\s/g, '').toUpperCase();

/** Supplied descriptive fields, blanks dropped. */
function detailsOf(attrs: VehicleAttributes): Partial<VehicleDetails> {
  const details: Partial<VehicleDetails> = {};
  const make = normalizeText(attrs.make);
  const model = normalizeText(attrs.model);
  const vin = normalizeVin(attrs.vin);
  if (make) details.make = make;
  if (model) details.model = model;
  if (attrs.year != null) details.year = attrs.year;
  if (vin) details.vin = vin;
  return details;
}

/** Fields present in `details` but still empty on the record. */
function missingOn(vehicle: IVehicle, details: Partial<VehicleDetails>): Partial<VehicleDetails> {
  const missing: Partial<VehicleDetails> = {};
  if (details.make && !vehicle.make) missing.make = details.make;
  if (details.model && !vehicle.model) missing.model = details.model;
  if (details.year != null && vehicle.year == null) missing.year = details.year;
  if (details.vin && !vehicle.vin) missing.vin = details.vin;
  return missing;
}

export class VehicleResolver {
  private readonly log: AppLogger;
  private readonly now: () => Date;
  private readonly maxAttempts: number;

  constructor(options: { logger?: AppLogger; now?: () => Date; maxAttempts?: number } = {}) {
    this.log = options.logger ?? rootLogger.child({ component: 'vehicle-resolver' });
    this.now = options.now ?? (() => new Date());
    this.maxAttempts = options.maxAttempts ?? DEFAULT_RESOLVE_MAX_ATTEMPTS;
  }

  /**
   * Finds the customer's vehicle by plate or creates it. Populated fields are
   * never overwritten; empty ones take the supplied values, so the first
   * non-empty value written wins. Resolves to `null` when there is no plate.
   */
  async resolveOrCreate(
    store: IntakeStore,
    customer: Pick<ICustomer, 'id'>,
    attrs?: VehicleAttributes | null
  ): Promise<IVehicle | null> {
    const plate = normalizePlate(attrs?.plate);
    if (!attrs || !plate) return null;

    const details = detailsOf(attrs);

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const existing = await store.vehicles.findByPlate(customer.id, plate);
      if (existing) return this.fill(store, existing, details);

      const created = await store.vehicles.insertIfAbsent({
        customerId: customer.id,
        plate,
        make: details.make ?? null,
        model: details.model ?? null,
        year: details.year ?? null,
        vin: details.vin ?? null,
      });
      if (created) {
        this.log.info('Vehicle created', { vehicleId: created.id, customerId: customer.id });
        return created;
      }
      // conflict: the next pass reads the concurrent winner and fills it
    }

    throw new ResolutionFailure(`Vehicle could not be resolved after ${this.maxAttempts} attempts`, {
      customerId: customer.id,
      attempts: this.maxAttempts,
    });
  }

  private async fill(store: IntakeStore, vehicle: IVehicle, details: Partial<VehicleDetails>): Promise<IVehicle> {
    const missing = missingOn(vehicle, details);
    const fields = Object.keys(missing);
    if (fields.length === 0) return vehicle;

    this.log.info('Vehicle details filled', { vehicleId: vehicle.id, fields });
    return store.vehicles.fillMissing(vehicle.id, missing, this.now());
  }
}
