import type {
  CustomerStatus,
  ICustomer,
  IdentityKey,
  IntakeChannel,
  IOrder,
  IVehicle,
  OrderType,
  VehicleDetails,
} from '@intake-desk/shared';

export interface NewCustomer extends IdentityKey {
  arrivalTime: Date;
  currentStatus: CustomerStatus;
  lastVisit: Date;
  totalVisits: number;
}

export interface NewVehicle extends VehicleDetails {
  customerId: number;
  plate: string;
}

export interface NewOrder {
  customerId: number;
  vehicleId: number | null;
  type: OrderType;
  channel: IntakeChannel;
  description: string | null;
  externalRef: string | null;
}

export interface CustomerRepository {
  findByIdentity(key: IdentityKey): Promise<ICustomer | null>;
  findById(id: number): Promise<ICustomer | null>;
  /**
   * Inserts unless a customer with the same identity tuple already exists.
   * Resolves to `null` on that conflict instead of failing.
   */
  insertIfAbsent(input: NewCustomer): Promise<ICustomer | null>;
  /** Atomic `totalVisits + 1`, `lastVisit = greatest(lastVisit, at)`. `null` when the id is unknown. */
  recordVisit(id: number, at: Date): Promise<ICustomer | null>;
}

export interface VehicleRepository {
  findByPlate(customerId: number, plate: string): Promise<IVehicle | null>;
  /** Resolves to `null` when (customerId, plate) is already taken. */
  insertIfAbsent(input: NewVehicle): Promise<IVehicle | null>;
  /** Sets each given field only where the stored value is still empty. */
  fillMissing(id: number, details: Partial<VehicleDetails>, at: Date): Promise<IVehicle>;
}

export interface OrderRepository {
  insert(input: NewOrder): Promise<IOrder>;
  listByCustomer(customerId: number): Promise<IOrder[]>;
}

export interface IntakeStore {
  readonly customers: CustomerRepository;
  readonly vehicles: VehicleRepository;
  readonly orders: OrderRepository;
  /**
   * Runs `work` as one all-or-nothing unit. The store handed to `work` is
   * bound to the transaction; a rejection rolls every write back.
   */
  transaction<T>(work: (tx: IntakeStore) => Promise<T>): Promise<T>;
}
