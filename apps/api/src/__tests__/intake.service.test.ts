import { IntakeChannel, OrderType, walkInIdentity } from '@intake-desk/shared';
import type { IntakeRequest } from '@intake-desk/shared';
import { silentLogger } from '../libs/logger';
import { MemoryIntakeStore } from '../repositories/memory.store';
import type { IntakeStore } from '../repositories/types';
import { createIntakeDesk } from '../services';
import type { IntakeDesk } from '../services';
import { AtomicityViolation, ResolutionFailure, ValidationFailure } from '../utils/intakeErrors';
import { customerResolutions } from '../utils/metrics';

const jane = { branchId: 1, fullName: 'Jane Doe', phone: '555-0100', organizationName: '', taxNumber: '' };

const request = (channel: IntakeChannel, extra: Partial<IntakeRequest> = {}): IntakeRequest => ({
  channel,
  customer: jane,
  order: { type: OrderType.SERVICE },
  ...extra,
});

/** Same store, but every order insert fails. */
function withFailingOrders(store: IntakeStore): IntakeStore {
  return {
    customers: store.customers,
    vehicles: store.vehicles,
    orders: {
      insert: () => Promise.reject(new Error('orders table unavailable')),
      listByCustomer: (customerId) => store.orders.listByCustomer(customerId),
    },
    transaction: <T>(work: (tx: IntakeStore) => Promise<T>) =>
      store.transaction((tx) => work(withFailingOrders(tx))),
  };
}

async function resolutionsCounted(outcome: string): Promise<number> {
  const { values } = await customerResolutions.get();
  return values.find((v) => v.labels.outcome === outcome)?.value ?? 0;
}

describe('TransactionCoordinator', () => {
  let store: MemoryIntakeStore;
  let desk: IntakeDesk;

  beforeEach(() => {
    store = new MemoryIntakeStore();
    desk = createIntakeDesk({ store, logger: silentLogger });
  });

  it('lands two entry points on one customer with two visits and two orders', async () => {
    const invoice = await desk.intake.createCompleteFlow(
      request(IntakeChannel.INVOICE_CAPTURE, { order: { type: OrderType.SALES, externalRef: 'INV-1' } })
    );
    const order = await desk.intake.createCompleteFlow(
      request(IntakeChannel.ORDER_INTAKE, { vehicle: { plate: 'AB123CD', make: 'Toyota' } })
    );

    expect(invoice.createdCustomer).toBe(true);
    expect(invoice.customer.totalVisits).toBe(1);
    expect(invoice.vehicle).toBeNull();
    expect(order.createdCustomer).toBe(false);
    expect(order.customer.id).toBe(invoice.customer.id);
    expect(order.customer.totalVisits).toBe(2);

    const orders = await store.orders.listByCustomer(invoice.customer.id);
    expect(orders.map((o) => [o.channel, o.type, o.externalRef, o.vehicleId])).toEqual([
      [IntakeChannel.INVOICE_CAPTURE, OrderType.SALES, 'INV-1', null],
      [IntakeChannel.ORDER_INTAKE, OrderType.SERVICE, null, order.vehicle?.id],
    ]);
    expect(store.stats()).toEqual({ customers: 1, vehicles: 1, orders: 2 });
  });

  it('returns the customer as it stands after the visit', async () => {
    const clocked = createIntakeDesk({
      store,
      logger: silentLogger,
      now: () => new Date('2026-03-05T10:30:00Z'),
    });
    await clocked.intake.createCompleteFlow(request(IntakeChannel.QUICK_CREATE));
    const result = await clocked.intake.createCompleteFlow(request(IntakeChannel.DOCUMENT_INGESTION));

    expect(result.customer.totalVisits).toBe(2);
    expect(result.customer.lastVisit).toEqual(new Date('2026-03-05T10:30:00Z'));
  });

  it('rolls customer and vehicle back when the order cannot be created', async () => {
    const broken = createIntakeDesk({ store: withFailingOrders(store), logger: silentLogger });

    const error = await broken.intake
      .createCompleteFlow(request(IntakeChannel.REGISTRATION_WIZARD, { vehicle: { plate: 'AB123CD' } }))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AtomicityViolation);
    expect(error).toMatchObject({
      step: 'create_order',
      status: 500,
      code: 'INTAKE_ROLLED_BACK',
      retryable: false,
      message: 'Intake rolled back at create_order: orders table unavailable',
    });
    expect(store.stats()).toEqual({ customers: 0, vehicles: 0, orders: 0 });

    const retry = await desk.intake.createCompleteFlow(request(IntakeChannel.REGISTRATION_WIZARD));
    expect(retry.createdCustomer).toBe(true);
  });

  it('counts a customer resolution only when its flow commits', async () => {
    const broken = createIntakeDesk({ store: withFailingOrders(store), logger: silentLogger });
    const created = await resolutionsCounted('created');
    const reused = await resolutionsCounted('reused');

    await expect(broken.intake.createCompleteFlow(request(IntakeChannel.ORDER_INTAKE))).rejects.toBeInstanceOf(
      AtomicityViolation
    );
    expect(await resolutionsCounted('created')).toBe(created);

    await desk.intake.createCompleteFlow(request(IntakeChannel.ORDER_INTAKE));
    await desk.intake.createCompleteFlow(request(IntakeChannel.QUICK_CREATE));
    expect(await resolutionsCounted('created')).toBe(created + 1);
    expect(await resolutionsCounted('reused')).toBe(reused + 1);
  });

  it('marks a rollback caused by a resolution failure as retryable', async () => {
    jest.spyOn(desk.customers, 'resolveOrCreate').mockRejectedValue(new ResolutionFailure('no winner'));

    await expect(desk.intake.createCompleteFlow(request(IntakeChannel.ORDER_INTAKE))).rejects.toMatchObject({
      step: 'resolve_customer',
      status: 409,
      retryable: true,
    });
  });

  it('validates the request before opening a transaction', async () => {
    const transaction = jest.spyOn(store, 'transaction');

    await expect(
      desk.intake.createCompleteFlow({
        channel: IntakeChannel.QUICK_CREATE,
        customer: { branchId: 1, fullName: ' ', phone: '---' },
        order: { type: OrderType.INQUIRY },
      })
    ).rejects.toBeInstanceOf(ValidationFailure);
    expect(transaction).not.toHaveBeenCalled();
  });

  it('leaves nothing behind when aborted before it starts', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      desk.intake.createCompleteFlow(request(IntakeChannel.ORDER_INTAKE), { signal: controller.signal })
    ).rejects.toMatchObject({ step: 'resolve_customer' });
    expect(store.stats()).toEqual({ customers: 0, vehicles: 0, orders: 0 });
  });

  it('rolls back a flow aborted part way through', async () => {
    const controller = new AbortController();
    jest.spyOn(desk.vehicles, 'resolveOrCreate').mockImplementation(async () => {
      controller.abort();
      return null;
    });

    await expect(
      desk.intake.createCompleteFlow(request(IntakeChannel.ORDER_INTAKE), { signal: controller.signal })
    ).rejects.toMatchObject({ step: 'create_order' });
    expect(store.stats()).toEqual({ customers: 0, vehicles: 0, orders: 0 });
  });

  it('serializes concurrent flows for one identity onto one customer', async () => {
    const results = await Promise.all(
      Array.from({ length: 5 }, () => desk.intake.createCompleteFlow(request(IntakeChannel.ORDER_INTAKE)))
    );

    expect(new Set(results.map((r) => r.customer.id)).size).toBe(1);
    expect(results.filter((r) => r.createdCustomer)).toHaveLength(1);
    expect((await store.customers.findById(results[0].customer.id))?.totalVisits).toBe(5);
    expect(store.stats()).toEqual({ customers: 1, vehicles: 0, orders: 5 });
  });

  it('converges resubmissions of one walk-in job', async () => {
    const walkIn = walkInIdentity(1, { kind: 'job', id: 1042 });
    const first = await desk.intake.createCompleteFlow({ ...request(IntakeChannel.QUICK_CREATE), customer: walkIn });
    const second = await desk.intake.createCompleteFlow({ ...request(IntakeChannel.QUICK_CREATE), customer: walkIn });

    expect(second.customer.id).toBe(first.customer.id);
    expect(second.customer.fullName).toBe('Walk-in job #1042');
  });
});
