// PostgreSQL store: drizzle-orm queries over whichever driver the database was opened with
import { and, asc, eq, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type { ICustomer, IdentityKey, IOrder, IVehicle, VehicleDetails } from '@intake-desk/shared';
import { customers, orders, vehicles } from '../db/schema.js';
import type {
  CustomerRepository,
  IntakeStore,
  NewCustomer,
  NewOrder,
  NewVehicle,
  OrderRepository,
  VehicleRepository,
} from './types.js';

/** Any drizzle PostgreSQL database or an open transaction on one, whatever the driver. */
type Executor = PgDatabase<PgQueryResultHKT>;

class PgCustomerRepository implements CustomerRepository {
  constructor(private readonly db: Executor) {}

  async findByIdentity(key: IdentityKey): Promise<ICustomer | null> {
    const [row] = await this.db
      .select()
      .from(customers)
      .where(
        and(
          eq(customers.branchId, key.branchId),
          eq(customers.fullName, key.fullName),
          eq(customers.phone, key.phone),
          eq(customers.organizationName, key.organizationName),
          eq(customers.taxNumber, key.taxNumber)
        )
      )
      .limit(1);
    return row ?? null;
  }

  async findById(id: number): Promise<ICustomer | null> {
    const [row] = await this.db.select().from(customers).where(eq(customers.id, id)).limit(1);
    return row ?? null;
  }

  // Under read committed a concurrent uncommitted insert of the same tuple makes
  // this wait; once it commits the row counts as a conflict and nothing is returned.
  async insertIfAbsent(input: NewCustomer): Promise<ICustomer | null> {
    const [row] = await this.db.insert(customers).values(input).onConflictDoNothing().returning();
    return row ?? null;
  }

  async recordVisit(id: number, at: Date): Promise<ICustomer | null> {
    const [row] = await this.db
      .update(customers)
      .set({
        totalVisits: sql`${customers.totalVisits} + 1`,
        lastVisit: sql`greatest(${customers.lastVisit}, ${at})`,
        updatedAt: at,
      })
      .where(eq(customers.id, id))
      .returning();
    return row ?? null;
  }
}

class PgVehicleRepository implements VehicleRepository {
  constructor(private readonly db: Executor) {}

  async findByPlate(customerId: number, plate: string): Promise<IVehicle | null> {
    const [row] = await this.db
      .select()
      .from(vehicles)
      .where(and(eq(vehicles.customerId, customerId), eq(vehicles.plate, plate)))
      .limit(1);
    return row ?? null;
  }

  async insertIfAbsent(input: NewVehicle): Promise<IVehicle | null> {
    const [row] = await this.db.insert(vehicles).values(input).onConflictDoNothing().returning();
    return row ?? null;
  }

  async fillMissing(id: number, details: Partial<VehicleDetails>, at: Date): Promise<IVehicle> {
    const patch: { make?: SQL; model?: SQL; year?: SQL; vin?: SQL } = {};
    if (details.make) patch.make = sql`coalesce(nullif(${vehicles.make}, ''), ${details.make})`;
    if (details.model) patch.model = sql`coalesce(nullif(${vehicles.model}, ''), ${details.model})`;
    if (details.year != null) patch.year = sql`coalesce(${vehicles.year}, ${details.year})`;
    if (details.vin) patch.vin = sql`coalesce(nullif(${vehicles.vin}, ''), ${details.vin})`;

    const [row] = await this.db
      .update(vehicles)
      .set({ ...patch, updatedAt: at })
      .where(eq(vehicles.id, id))
      .returning();
    if (!row) throw new Error(`Vehicle not found: ${id}`);
    return row;
  }
}

class PgOrderRepository implements OrderRepository {
  constructor(private readonly db: Executor) {}

  async insert(input: NewOrder): Promise<IOrder> {
    const [row] = await this.db.insert(orders).values(input).returning();
    if (!row) throw new Error('Order insert returned no row');
    return row;
  }

  async listByCustomer(customerId: number): Promise<IOrder[]> {
    return this.db.select().from(orders).where(eq(orders.customerId, customerId)).orderBy(asc(orders.id));
  }
}

export class PostgresIntakeStore implements IntakeStore {
  readonly customers: CustomerRepository;
  readonly vehicles: VehicleRepository;
  readonly orders: OrderRepository;

  constructor(private readonly db: Executor) {
    this.customers = new PgCustomerRepository(db);
    this.vehicles = new PgVehicleRepository(db);
    this.orders = new PgOrderRepository(db);
  }

  // Called on a transaction-bound store this opens a savepoint
  transaction<T>(work: (tx: IntakeStore) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => work(new PostgresIntakeStore(tx)));
  }
}
