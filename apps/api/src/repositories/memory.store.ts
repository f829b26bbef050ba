// In-process store: same contract as the PostgreSQL one, nothing survives a restart.
//
// Writes and transactions are serialized through one lock (single writer). A
// transaction works on a draft copy of the tables and swaps it in on success, so
// callers outside it only ever read committed rows. Every operation yields to
// the event loop first, letting concurrent callers interleave the way separate
// requests do against a database.
import type { ICustomer, IdentityKey, IOrder, IVehicle, VehicleDetails } from '@intake-desk/shared';
import type {
  CustomerRepository,
  IntakeStore,
  NewCustomer,
  NewOrder,
  NewVehicle,
  OrderRepository,
  VehicleRepository,
} from './types.js';

const identityKeyOf = (k: IdentityKey) =>
  JSON.stringify([k.branchId, k.fullName, k.phone, k.organizationName, k.taxNumber]);
const plateKeyOf = (customerId: number, plate: string) => `${customerId}:${plate}`;

const yieldTick = () => new Promise<void>((resolve) => setImmediate(resolve));

// Rows cross the store boundary as copies, in both directions
const copyCustomer = (c: ICustomer): ICustomer => ({
  ...c,
  arrivalTime: new Date(c.arrivalTime),
  lastVisit: new Date(c.lastVisit),
  createdAt: new Date(c.createdAt),
  updatedAt: new Date(c.updatedAt),
});
const copyVehicle = (v: IVehicle): IVehicle => ({ ...v, createdAt: new Date(v.createdAt), updatedAt: new Date(v.updatedAt) });
const copyOrder = (o: IOrder): IOrder => ({ ...o, createdAt: new Date(o.createdAt) });

class Tables {
  customers = new Map<number, ICustomer>();
  vehicles = new Map<number, IVehicle>();
  orders = new Map<number, IOrder>();
  customerIdByIdentity = new Map<string, number>();
  vehicleIdByPlate = new Map<string, number>();

  // Rows are replaced, never mutated, so copying the maps is enough
  clone(): Tables {
    const copy = new Tables();
    copy.assign(this);
    return copy;
  }

  assign(from: Tables): void {
    this.customers = new Map(from.customers);
    this.vehicles = new Map(from.vehicles);
    this.orders = new Map(from.orders);
    this.customerIdByIdentity = new Map(from.customerIdByIdentity);
    this.vehicleIdByPlate = new Map(from.vehicleIdByPlate);
  }
}

// Like database sequences, ids handed out inside a rolled back transaction are not reused
class Sequences {
  private customer = 0;
  private vehicle = 0;
  private order = 0;

  next(kind: 'customer' | 'vehicle' | 'order'): number {
    this[kind] += 1;
    return this[kind];
  }
}

class Lock {
  private tail: Promise<void> = Promise.resolve();

  async exclusive<T>(op: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;
    try {
      return await op();
    } finally {
      release();
    }
  }
}

interface Session {
  tables: Tables;
  seq: Sequences;
  read<T>(op: (tables: Tables) => T): Promise<T>;
  write<T>(op: (tables: Tables) => T): Promise<T>;
}

function rootSession(tables: Tables, seq: Sequences, lock: Lock): Session {
  return {
    tables,
    seq,
    read: async (op) => {
      await yieldTick();
      return op(tables);
    },
    write: (op) =>
      lock.exclusive(async () => {
        await yieldTick();
        return op(tables);
      }),
  };
}

// The transaction already holds the lock
function transactionSession(tables: Tables, seq: Sequences): Session {
  const run = async <T>(op: (t: Tables) => T): Promise<T> => {
    await yieldTick();
    return op(tables);
  };
  return { tables, seq, read: run, write: run };
}

class MemoryCustomerRepository implements CustomerRepository {
  constructor(private readonly session: Session) {}

  findByIdentity(key: IdentityKey): Promise<ICustomer | null> {
    return this.session.read((t) => {
      const id = t.customerIdByIdentity.get(identityKeyOf(key));
      const row = id === undefined ? undefined : t.customers.get(id);
      return row ? copyCustomer(row) : null;
    });
  }

  findById(id: number): Promise<ICustomer | null> {
    return this.session.read((t) => {
      const row = t.customers.get(id);
      return row ? copyCustomer(row) : null;
    });
  }

  insertIfAbsent(input: NewCustomer): Promise<ICustomer | null> {
    return this.session.write((t) => {
      const key = identityKeyOf(input);
      if (t.customerIdByIdentity.has(key)) return null;

      const now = new Date();
      const customer = copyCustomer({ ...input, id: this.session.seq.next('customer'), createdAt: now, updatedAt: now });
      t.customers.set(customer.id, customer);
      t.customerIdByIdentity.set(key, customer.id);
      return copyCustomer(customer);
    });
  }

  recordVisit(id: number, at: Date): Promise<ICustomer | null> {
    return this.session.write((t) => {
      const current = t.customers.get(id);
      if (!current) return null;

      const updated = copyCustomer({
        ...current,
        totalVisits: current.totalVisits + 1,
        lastVisit: at.getTime() > current.lastVisit.getTime() ? at : current.lastVisit,
        updatedAt: at,
      });
      t.customers.set(id, updated);
      return copyCustomer(updated);
    });
  }
}

class MemoryVehicleRepository implements VehicleRepository {
  constructor(private readonly session: Session) {}

  findByPlate(customerId: number, plate: string): Promise<IVehicle | null> {
    return this.session.read((t) => {
      const id = t.vehicleIdByPlate.get(plateKeyOf(customerId, plate));
      const row = id === undefined ? undefined : t.vehicles.get(id);
      return row ? copyVehicle(row) : null;
    });
  }

  insertIfAbsent(input: NewVehicle): Promise<IVehicle | null> {
    return this.session.write((t) => {
      if (!t.customers.has(input.customerId)) {
        throw new Error(`Foreign key violation: customer ${input.customerId} does not exist`);
      }
      const key = plateKeyOf(input.customerId, input.plate);
      if (t.vehicleIdByPlate.has(key)) return null;

      const now = new Date();
      const vehicle: IVehicle = { ...input, id: this.session.seq.next('vehicle'), createdAt: now, updatedAt: now };
      t.vehicles.set(vehicle.id, vehicle);
      t.vehicleIdByPlate.set(key, vehicle.id);
      return copyVehicle(vehicle);
    });
  }

  fillMissing(id: number, details: Partial<VehicleDetails>, at: Date): Promise<IVehicle> {
    return this.session.write((t) => {
      const current = t.vehicles.get(id);
      if (!current) throw new Error(`Vehicle not found: ${id}`);

      const updated: IVehicle = {
        ...current,
        make: current.make || details.make || null,
        model: current.model || details.model || null,
        year: current.year ?? details.year ?? null,
        vin: current.vin || details.vin || null,
        updatedAt: new Date(at),
      };
      t.vehicles.set(id, updated);
      return copyVehicle(updated);
    });
  }
}

class MemoryOrderRepository implements OrderRepository {
  constructor(private readonly session: Session) {}

  insert(input: NewOrder): Promise<IOrder> {
    return this.session.write((t) => {
      if (!t.customers.has(input.customerId)) {
        throw new Error(`Foreign key violation: customer ${input.customerId} does not exist`);
      }
      if (input.vehicleId !== null && t.vehicles.get(input.vehicleId)?.customerId !== input.customerId) {
        throw new Error(`Foreign key violation: vehicle ${input.vehicleId} does not belong to customer ${input.customerId}`);
      }

      const order: IOrder = { ...input, id: this.session.seq.next('order'), createdAt: new Date() };
      t.orders.set(order.id, order);
      return copyOrder(order);
    });
  }

  listByCustomer(customerId: number): Promise<IOrder[]> {
    return this.session.read((t) =>
      Array.from(t.orders.values())
        .filter((o) => o.customerId === customerId)
        .sort((a, b) => a.id - b.id)
        .map(copyOrder)
    );
  }
}

export class MemoryIntakeStore implements IntakeStore {
  readonly customers: CustomerRepository;
  readonly vehicles: VehicleRepository;
  readonly orders: OrderRepository;

  private readonly session: Session;
  private readonly lock: Lock | null;

  constructor(scope?: { tables: Tables; seq: Sequences }) {
    if (scope) {
      this.session = transactionSession(scope.tables, scope.seq);
      this.lock = null;
    } else {
      this.lock = new Lock();
      this.session = rootSession(new Tables(), new Sequences(), this.lock);
    }
    this.customers = new MemoryCustomerRepository(this.session);
    this.vehicles = new MemoryVehicleRepository(this.session);
    this.orders = new MemoryOrderRepository(this.session);
  }

  async transaction<T>(work: (tx: IntakeStore) => Promise<T>): Promise<T> {
    const run = async () => {
      const draft = this.session.tables.clone();
      const result = await work(new MemoryIntakeStore({ tables: draft, seq: this.session.seq }));
      this.session.tables.assign(draft);
      return result;
    };
    // Nested transactions behave like savepoints inside the outer one
    return this.lock ? this.lock.exclusive(run) : run();
  }

  /** Committed row counts. */
  stats(): { customers: number; vehicles: number; orders: number } {
    const { tables } = this.session;
    return { customers: tables.customers.size, vehicles: tables.vehicles.size, orders: tables.orders.size };
  }
}
