import {
  foreignKey,
  index,
  integer,
  pgEnum,
  pgTable,
  serial,
  text,
  timestamp,
  unique,
  uniqueIndex,
  varchar,
} from 'drizzle-orm/pg-core';
import { CustomerStatus, IntakeChannel, OrderType } from '@intake-desk/shared';

export const customerStatus = pgEnum('customer_status', [
  CustomerStatus.ARRIVED,
  CustomerStatus.IN_SERVICE,
  CustomerStatus.DEPARTED,
]);
export const orderType = pgEnum('order_type', [OrderType.SERVICE, OrderType.SALES, OrderType.INQUIRY]);
export const intakeChannel = pgEnum('intake_channel', [
  IntakeChannel.INVOICE_CAPTURE,
  IntakeChannel.DOCUMENT_INGESTION,
  IntakeChannel.ORDER_INTAKE,
  IntakeChannel.REGISTRATION_WIZARD,
  IntakeChannel.QUICK_CREATE,
]);

// Identity parts are NOT NULL with '' for "absent" so the unique index covers them
export const customers = pgTable(
  'customers',
  {
    id: serial('id').primaryKey(),
    branchId: integer('branch_id').notNull(),
    fullName: varchar('full_name', { length: 200 }).notNull().default(''),
    phone: varchar('phone', { length: 32 }).notNull().default(''),
    organizationName: varchar('organization_name', { length: 200 }).notNull().default(''),
    taxNumber: varchar('tax_number', { length: 32 }).notNull().default(''),
    arrivalTime: timestamp('arrival_time', { withTimezone: true }).notNull(),
    currentStatus: customerStatus('current_status').notNull().default(CustomerStatus.ARRIVED),
    lastVisit: timestamp('last_visit', { withTimezone: true }).notNull(),
    totalVisits: integer('total_visits').notNull().default(1),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('customers_identity_uq').on(
      table.branchId,
      table.fullName,
      table.phone,
      table.organizationName,
      table.taxNumber
    ),
    index('customers_branch_phone_idx').on(table.branchId, table.phone),
  ]
);

export const vehicles = pgTable(
  'vehicles',
  {
    id: serial('id').primaryKey(),
    customerId: integer('customer_id')
      .notNull()
      .references(() => customers.id),
    plate: varchar('plate', { length: 16 }).notNull(),
    make: varchar('make', { length: 50 }),
    model: varchar('model', { length: 50 }),
    year: integer('year'),
    vin: varchar('vin', { length: 17 }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('vehicles_customer_plate_uq').on(table.customerId, table.plate),
    // target of the orders (vehicle_id, customer_id) foreign key
    unique('vehicles_id_customer_uq').on(table.id, table.customerId),
  ]
);

export const orders = pgTable(
  'orders',
  {
    id: serial('id').primaryKey(),
    customerId: integer('customer_id')
      .notNull()
      .references(() => customers.id),
    vehicleId: integer('vehicle_id'),
    type: orderType('type').notNull(),
    channel: intakeChannel('channel').notNull(),
    description: text('description'),
    externalRef: varchar('external_ref', { length: 64 }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    foreignKey({
      name: 'orders_vehicle_owner_fk',
      columns: [table.vehicleId, table.customerId],
      foreignColumns: [vehicles.id, vehicles.customerId],
    }),
    index('orders_customer_idx').on(table.customerId),
  ]
);
