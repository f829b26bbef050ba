import { PHONE_CONVENTIONS } from '@intake-desk/shared';
import { silentLogger } from '../libs/logger';
import { MemoryIntakeStore } from '../repositories/memory.store';
import { CustomerResolver } from '../services/customer.service';
import { IdentityMatcher } from '../services/identity.service';

describe('IdentityMatcher', () => {
  let store: MemoryIntakeStore;
  const matcher = new IdentityMatcher();

  beforeEach(() => {
    store = new MemoryIntakeStore();
  });

  it('finds the stored customer from a differently formatted candidate', async () => {
    const { customer } = await new CustomerResolver(matcher, { logger: silentLogger }).resolveOrCreate(store, {
      branchId: 1,
      fullName: 'Jane Doe',
      phone: '(555) 010-0',
    });

    const found = await matcher.find(store, { branchId: 1, fullName: ' Jane   Doe ', phone: '555.0100' });

    expect(found).toEqual(customer);
    expect(found?.phone).toBe('5550100');
  });

  it('misses when any part of the tuple differs', async () => {
    await new CustomerResolver(matcher, { logger: silentLogger }).resolveOrCreate(store, {
      branchId: 1,
      fullName: 'Jane Doe',
      phone: '555-0100',
    });

    expect(await matcher.find(store, { branchId: 1, fullName: 'Jane Doe' })).toBeNull();
    expect(await matcher.find(store, { branchId: 2, fullName: 'Jane Doe', phone: '555-0100' })).toBeNull();
    expect(await matcher.find(store, { branchId: 1, fullName: 'jane doe', phone: '555-0100' })).toBeNull();
  });

  it('applies its phone convention to the candidate', async () => {
    const uk = new IdentityMatcher(PHONE_CONVENTIONS.UK);
    await new CustomerResolver(uk, { logger: silentLogger }).resolveOrCreate(store, {
      branchId: 1,
      phone: '+44 20 7946 0000',
    });

    expect(await uk.find(store, { branchId: 1, phone: '020 7946 0000' })).toMatchObject({ phone: '+442079460000' });
  });
});
