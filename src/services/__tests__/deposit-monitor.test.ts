import { describe, it, expect } from 'vitest';
import { ChainUnavailableError, DepositNotFoundError, InvalidTransitionError } from '../errors.js';
import { MemoryStore } from '../memory-store.js';
import type { AddressCondition, AddressPatch } from '../store.js';
import type { AddressRecord } from '../types.js';
import { createHarness, MINUTE, observation, T0, testAddress, type HarnessOptions } from './helpers.js';

/** Fails the first cooldown transition, as a dropped connection would. */
class FlakyCooldownStore extends MemoryStore {
  cooldownFailures = 1;

  override async transitionAddress(
    address: string,
    expected: AddressCondition,
    patch: AddressPatch,
  ): Promise<AddressRecord | null> {
    if (patch.status === 'cooldown' && this.cooldownFailures > 0) {
      this.cooldownFailures--;
      throw new Error('connection reset');
    }
    return super.transitionAddress(address, expected, patch);
  }
}

async function setup(options: HarnessOptions = {}) {
  const h = createHarness(options);
  await h.seed();
  const request = (amount = '100') => h.deposits.requestDeposit({ ownerId: 'user-1', amount, currency: 'USDT' });
  return { ...h, request };
}

describe('DepositMonitor confirmation flow', () => {
  it('confirms at the threshold with exactly one confirmed event', async () => {
    const h = await setup();
    const { requestId, address } = await h.request();

    h.chain.set(address, [observation(address, { confirmations: 1 })]);
    const first = await h.monitor.runCycle();

    expect(first).toEqual({
      checked: 1,
      skipped: 0,
      unavailable: 0,
      errors: 0,
      confirmed: 0,
      expired: 0,
      reconciled: 0,
      released: 0,
      redelivered: 0,
    });
    expect(await h.deposits.getDepositStatus(requestId)).toMatchObject({
      state: 'partially_confirmed',
      confirmationsObserved: 1,
      threshold: 3,
      receivedAmount: '100',
    });
    expect((await h.store.findAddress(address))?.status).toBe('monitoring');

    h.chain.set(address, [observation(address, { confirmations: 3 })]);
    const second = await h.monitor.runCycle();

    expect(second.confirmed).toBe(1);
    expect(await h.deposits.getDepositStatus(requestId)).toMatchObject({ state: 'confirmed', confirmationsObserved: 3 });
    expect(await h.store.findAddress(address)).toMatchObject({ status: 'cooldown', assignedTo: requestId });

    await h.monitor.runCycle();
    await h.monitor.applyObservation(requestId, observation(address, { confirmations: 5 }));

    expect(h.sink.types()).toEqual(['AddressAssigned', 'DepositPartiallyConfirmed', 'DepositConfirmed']);
    expect(h.sink.delivered[2]?.data).toEqual({ txHash: 'tx-1', confirmations: 3, receivedAmount: '100', amount: '100' });
    expect(h.chain.callsFor(address)).toHaveLength(2);
  });

  it('keeps polling from the lowest transfer still short of the threshold', async () => {
    const h = await setup();
    const { address } = await h.request();
    h.chain.set(address, [observation(address, { confirmations: 1, blockHeight: 100 })]);

    await h.monitor.runCycle();
    await h.monitor.runCycle();

    expect(h.chain.callsFor(address).map((c) => c.since)).toEqual([0, 100]);
  });

  it('credits a transfer once however often it is seen', async () => {
    const h = await setup();
    const { requestId, address } = await h.request();
    h.chain.set(address, [observation(address, { txHash: 'tx-a', amount: '40' })]);

    await h.monitor.runCycle();
    await h.monitor.runCycle();

    expect(await h.deposits.getDepositStatus(requestId)).toMatchObject({ state: 'partially_confirmed', receivedAmount: '40' });

    h.chain.set(address, [
      observation(address, { txHash: 'tx-a', amount: '40', confirmations: 3, blockHeight: 100 }),
      observation(address, { txHash: 'tx-b', amount: '60', confirmations: 3, blockHeight: 101 }),
    ]);
    await h.monitor.runCycle();

    expect(await h.deposits.getDepositStatus(requestId)).toMatchObject({ state: 'confirmed', receivedAmount: '100' });
    expect(h.sink.types()).toEqual(['AddressAssigned', 'DepositPartiallyConfirmed', 'DepositConfirmed']);
  });

  it('never lowers the observed confirmation count', async () => {
    const h = await setup();
    const { requestId, address } = await h.request();

    await h.monitor.applyObservation(requestId, observation(address, { amount: '40', confirmations: 2 }));
    const after = await h.monitor.applyObservation(requestId, observation(address, { amount: '40', confirmations: 1 }));

    expect(after?.confirmationsObserved).toBe(2);
    expect((await h.deposits.getDepositStatus(requestId)).confirmationsObserved).toBe(2);
  });

  it('does not confirm an underpayment however deep it is', async () => {
    const h = await setup();
    const { requestId, address } = await h.request();
    h.chain.set(address, [observation(address, { amount: '90', confirmations: 10, blockHeight: 100 })]);

    await h.monitor.runCycle();
    await h.monitor.runCycle();

    expect(await h.deposits.getDepositStatus(requestId)).toMatchObject({
      state: 'partially_confirmed',
      confirmationsObserved: 10,
      receivedAmount: '90',
    });
    expect((await h.store.findAddress(address))?.status).toBe('monitoring');
    expect(h.chain.callsFor(address).map((c) => c.since)).toEqual([0, 101]);
  });

  it('accepts a shortfall within the configured tolerance', async () => {
    const h = await setup({ monitor: { amountTolerance: '10' } });
    const { requestId, address } = await h.request();
    h.chain.set(address, [observation(address, { amount: '90', confirmations: 3 })]);

    await h.monitor.runCycle();

    expect((await h.deposits.getDepositStatus(requestId)).state).toBe('confirmed');
  });

  it('ignores a transfer already credited to another deposit', async () => {
    const h = await setup();
    const first = await h.request();
    const second = await h.request();

    await h.monitor.applyObservation(first.requestId, observation(first.address, { txHash: 'tx-x' }));
    const result = await h.monitor.applyObservation(second.requestId, observation(second.address, { txHash: 'tx-x' }));

    expect(result).toBeNull();
    expect(await h.deposits.getDepositStatus(second.requestId)).toMatchObject({ state: 'pending', receivedAmount: '0' });
  });

  it('ignores transfers older than the request or to another address', async () => {
    const h = await setup();
    const { requestId, address } = await h.request();
    h.chain.set(address, [
      observation(address, { txHash: 'old', blockTimestamp: new Date(T0.getTime() - MINUTE) }),
      observation(address, { txHash: 'elsewhere', toAddress: 'TSomewhereElse' }),
    ]);

    await h.monitor.runCycle();

    expect((await h.deposits.getDepositStatus(requestId)).state).toBe('pending');
    expect(h.chain.callsFor(address)[0]?.notBefore).toEqual(T0);
  });
});

describe('DepositMonitor expiry', () => {
  it('expires an unpaid request and eventually releases its address', async () => {
    const h = await setup();
    const { requestId, address } = await h.request();

    h.clock.advance(60 * MINUTE);
    expect((await h.deposits.getDepositStatus(requestId)).state).toBe('pending');

    h.clock.advance(1);
    expect((await h.deposits.getDepositStatus(requestId)).state).toBe('expired');
    expect((await h.store.findDeposit(requestId))?.state).toBe('pending');

    const cycle = await h.monitor.runCycle();
    expect(cycle.expired).toBe(1);
    expect(await h.store.findDeposit(requestId)).toMatchObject({ state: 'expired', closedAt: h.clock.now() });
    expect((await h.store.findAddress(address))?.status).toBe('cooldown');

    h.clock.advance(10 * MINUTE);
    const later = await h.monitor.runCycle();

    expect(later.released).toBe(1);
    expect(await h.store.findAddress(address)).toMatchObject({ status: 'available', assignedTo: null });
    expect(h.sink.types()).toEqual(['AddressAssigned', 'DepositExpired', 'AddressReleased']);
  });
});

describe('DepositMonitor reconcile', () => {
  it('starts the cooldown a confirmed deposit missed', async () => {
    const h = await setup({ store: new FlakyCooldownStore() });
    const { requestId, address } = await h.request();
    h.chain.set(address, [observation(address, { confirmations: 3 })]);

    const cycle = await h.monitor.runCycle();

    expect(cycle).toMatchObject({ errors: 1, confirmed: 0, reconciled: 1 });
    expect((await h.store.findDeposit(requestId))?.state).toBe('confirmed');
    expect(await h.store.findAddress(address)).toMatchObject({ status: 'cooldown', assignedTo: requestId });

    h.clock.advance(10 * MINUTE);
    expect((await h.monitor.runCycle()).released).toBe(1);
    expect(await h.store.findAddress(address)).toMatchObject({ status: 'available', assignedTo: null });
  });

  it('takes back a claimed address whose deposit was never written', async () => {
    const h = await setup();
    const orphan = await h.pool.allocate('00000000-0000-4000-8000-0000000000aa');

    expect((await h.monitor.runCycle()).reconciled).toBe(0);
    expect((await h.store.findAddress(orphan.address))?.status).toBe('assigned');

    h.clock.advance(5 * MINUTE);
    expect((await h.monitor.runCycle()).reconciled).toBe(1);
    expect(await h.store.findAddress(orphan.address)).toMatchObject({ status: 'available', assignedTo: null });
  });

  it('forgets deposits another writer closed', async () => {
    const h = await setup();
    const { requestId, address } = await h.request();
    await h.monitor.runCycle();
    expect(h.monitor.trackedCount).toBe(1);

    const row = await h.store.findDeposit(requestId);
    if (!row) throw new Error('deposit missing');
    await h.store.updateDeposit(row.id, row.version, { state: 'failed', closedAt: h.clock.now() });

    const cycle = await h.monitor.runCycle();

    expect(h.monitor.trackedCount).toBe(0);
    expect(cycle.reconciled).toBe(1);
    expect((await h.store.findAddress(address))?.status).toBe('cooldown');
  });
});

describe('DepositMonitor event delivery', () => {
  it('keeps polling while the event sink stalls and redelivers once it answers', async () => {
    const h = await setup({ deliveryTimeoutMs: 20 });
    h.sink.hanging = true;
    const { requestId, address } = await h.request();
    h.chain.set(address, [observation(address)]);

    const cycle = await h.monitor.runCycle();

    expect(cycle).toMatchObject({ checked: 1, redelivered: 0 });
    expect((await h.deposits.getDepositStatus(requestId)).state).toBe('partially_confirmed');

    h.sink.hanging = false;
    expect((await h.monitor.runCycle()).redelivered).toBe(2);
    expect(h.sink.types()).toEqual(['AddressAssigned', 'DepositPartiallyConfirmed']);
  });
});

describe('DepositMonitor chain notifications', () => {
  it('applies a pushed transfer to the deposit bound to its address', async () => {
    const h = await setup();
    const { requestId, address } = await h.request();

    const outcome = await h.monitor.acceptNotification(observation(address, { confirmations: 3 }));

    expect(outcome).toMatchObject({ status: 'applied', deposit: { id: requestId, state: 'confirmed' } });
    expect((await h.store.findAddress(address))?.status).toBe('cooldown');
  });

  it('reports a transfer to an address with no open deposit', async () => {
    const h = await setup();
    await h.request();

    expect(await h.monitor.acceptNotification(observation(testAddress(4242)))).toEqual({ status: 'no_match' });
  });

  it('ignores a transfer older than the request', async () => {
    const h = await setup();
    const { requestId, address } = await h.request();

    const outcome = await h.monitor.acceptNotification(
      observation(address, { blockTimestamp: new Date(T0.getTime() - MINUTE) }),
    );

    expect(outcome).toEqual({ status: 'ignored', reason: 'Transfer predates the deposit request' });
    expect((await h.deposits.getDepositStatus(requestId)).state).toBe('pending');
  });
});

describe('DepositMonitor chain faults', () => {
  it('backs off an address for the provider-suggested delay without touching the deposit', async () => {
    const h = await setup();
    const { requestId, address } = await h.request();
    h.chain.set(address, new ChainUnavailableError('rate limited', 30_000));

    expect((await h.monitor.runCycle()).unavailable).toBe(1);
    expect((await h.monitor.runCycle()).skipped).toBe(1);
    h.clock.advance(29_999);
    expect((await h.monitor.runCycle()).skipped).toBe(1);
    expect(h.chain.callsFor(address)).toHaveLength(1);

    h.chain.set(address, []);
    h.clock.advance(1);
    expect((await h.monitor.runCycle()).checked).toBe(1);
    expect(h.chain.callsFor(address)).toHaveLength(2);
    expect((await h.deposits.getDepositStatus(requestId)).state).toBe('pending');
  });

  it('abandons a query that outlives the timeout', async () => {
    const h = await setup({ monitor: { queryTimeoutMs: 20 } });
    const { address } = await h.request();
    h.chain.set(address, 'hang');

    expect((await h.monitor.runCycle()).unavailable).toBe(1);
    expect((await h.monitor.runCycle()).skipped).toBe(1);
  });

  it('keeps checking other deposits when one fails unexpectedly', async () => {
    const h = await setup();
    const broken = await h.request();
    await h.request();
    h.chain.set(broken.address, new Error('unexpected payload'));

    const cycle = await h.monitor.runCycle();

    expect(cycle).toMatchObject({ errors: 1, checked: 1 });
  });
});

describe('DepositMonitor operator and scheduling', () => {
  it('fails an open deposit on request and refuses to fail it twice', async () => {
    const h = await setup();
    const { requestId, address } = await h.request();

    const failed = await h.monitor.failDeposit(requestId, 'manual review');

    expect(failed).toMatchObject({ state: 'failed', failureReason: 'manual review' });
    expect((await h.store.findAddress(address))?.status).toBe('cooldown');
    expect(h.sink.delivered.at(-1)).toMatchObject({ type: 'DepositFailed', data: { reason: 'manual review' } });
    await expect(h.monitor.failDeposit(requestId, 'again')).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(h.monitor.failDeposit('00000000-0000-4000-8000-000000000000', 'x')).rejects.toBeInstanceOf(
      DepositNotFoundError,
    );
  });

  it('confirms an underpaid deposit on request', async () => {
    const h = await setup();
    const { requestId, address } = await h.request();
    await h.monitor.applyObservation(requestId, observation(address, { amount: '90', confirmations: 10 }));

    const confirmed = await h.monitor.confirmDeposit(requestId, 'shortfall waived');

    expect(confirmed).toMatchObject({ state: 'confirmed', confirmedAt: T0, receivedAmount: '90', failureReason: null });
    expect((await h.store.findAddress(address))?.status).toBe('cooldown');
    expect(h.sink.delivered.at(-1)).toMatchObject({
      type: 'DepositConfirmed',
      data: { confirmations: 10, receivedAmount: '90', amount: '100', reason: 'shortfall waived' },
    });
    await expect(h.monitor.confirmDeposit(requestId, 'again')).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it('joins a cycle already in flight', async () => {
    const h = await setup();
    await h.request();

    const first = h.monitor.runCycle();
    const second = h.monitor.runCycle();

    expect(second).toBe(first);
    await first;
  });

  it('redelivers events a sink rejected', async () => {
    const h = await setup();
    const { address } = await h.request();
    h.chain.set(address, [observation(address)]);
    h.sink.failing = true;

    expect((await h.monitor.runCycle()).redelivered).toBe(0);

    h.sink.failing = false;
    expect((await h.monitor.runCycle()).redelivered).toBe(1);
    expect(h.sink.types()).toEqual(['AddressAssigned', 'DepositPartiallyConfirmed']);
  });

  it('runs a cycle on start and waits for it on stop', async () => {
    const h = await setup();
    const { address } = await h.request();

    h.monitor.start();
    await h.monitor.stop();

    expect(h.chain.callsFor(address)).toHaveLength(1);
  });
});
