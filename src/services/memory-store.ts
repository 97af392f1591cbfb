import { randomUUID } from 'node:crypto';
import Decimal from 'decimal.js';
import type { AddressCondition, AddressPatch, ListDepositsQuery, PendingEvent, Store, StrandedAddress } from './store.js';
import {
  isTerminal,
  OPEN_DEPOSIT_STATES,
  type AddressRecord,
  type AppliedObservation,
  type DepositPatch,
  type DepositRecord,
  type NewAddress,
  type NewDeposit,
  type PoolCounts,
  type StoredEvent,
} from './types.js';

/**
 * In-process store. Every check-and-set below runs without an `await` between
 * the read and the write, so concurrent async callers see exactly one winner.
 * Each public method yields once before touching state to interleave callers
 * the way a real database round-trip would.
 */
export class MemoryStore implements Store {
  private readonly addresses = new Map<string, AddressRecord>();
  private readonly deposits = new Map<string, DepositRecord>();
  private readonly observations = new Map<string, AppliedObservation>();
  private readonly events = new Map<string, StoredEvent>();
  private readonly eventKeys = new Set<string>();
  private nextPosition = 1;
  private nextDerivationIndex = 0;

  constructor(private readonly createdAt: () => Date = () => new Date()) {}

  // ─── Addresses ────────────────────────────────────────────────────────────

  async insertAddresses(rows: NewAddress[]): Promise<{ added: string[]; skipped: string[] }> {
    await tick();
    const added: string[] = [];
    const skipped: string[] = [];
    for (const row of rows) {
      if (this.addresses.has(row.address)) {
        skipped.push(row.address);
        continue;
      }
      this.addresses.set(row.address, {
        address: row.address,
        status: 'available',
        assignedTo: null,
        assignedAt: null,
        lastReleasedAt: null,
        cooldownUntil: null,
        usageCount: 0,
        isActive: true,
        position: this.nextPosition++,
        derivationIndex: row.derivationIndex ?? null,
        createdAt: this.createdAt(),
      });
      added.push(row.address);
    }
    return { added, skipped };
  }

  async claimNextAvailable(depositId: string, now: Date): Promise<AddressRecord | null> {
    await tick();
    let candidate: AddressRecord | null = null;
    for (const row of this.addresses.values()) {
      if (row.status !== 'available' || !row.isActive) continue;
      if (candidate === null || compareFifo(row, candidate) < 0) candidate = row;
    }
    if (!candidate) return null;

    const claimed: AddressRecord = {
      ...candidate,
      status: 'assigned',
      assignedTo: depositId,
      assignedAt: now,
      cooldownUntil: null,
      usageCount: candidate.usageCount + 1,
    };
    this.addresses.set(claimed.address, claimed);
    return { ...claimed };
  }

  async transitionAddress(
    address: string,
    expected: AddressCondition,
    patch: AddressPatch,
  ): Promise<AddressRecord | null> {
    await tick();
    const row = this.addresses.get(address);
    if (!row || !expected.status.includes(row.status)) return null;
    if (expected.assignedTo !== undefined && row.assignedTo !== expected.assignedTo) return null;

    const next = applyAddressPatch(row, patch);
    this.addresses.set(address, next);
    return { ...next };
  }

  async findAddress(address: string): Promise<AddressRecord | null> {
    await tick();
    const row = this.addresses.get(address);
    return row ? { ...row } : null;
  }

  async listDueCooldowns(now: Date, limit: number): Promise<AddressRecord[]> {
    await tick();
    return [...this.addresses.values()]
      .filter((r) => r.status === 'cooldown' && r.cooldownUntil !== null && r.cooldownUntil <= now)
      .sort((a, b) => (a.cooldownUntil?.getTime() ?? 0) - (b.cooldownUntil?.getTime() ?? 0))
      .slice(0, limit)
      .map((r) => ({ ...r }));
  }

  async countAddresses(): Promise<PoolCounts> {
    await tick();
    const counts: PoolCounts = { available: 0, assigned: 0, monitoring: 0, cooldown: 0, inactive: 0, total: 0 };
    for (const row of this.addresses.values()) {
      counts.total++;
      if (!row.isActive) {
        counts.inactive++;
        continue;
      }
      counts[row.status]++;
    }
    return counts;
  }

  async setAddressActive(address: string, active: boolean): Promise<AddressRecord | null> {
    await tick();
    const row = this.addresses.get(address);
    if (!row) return null;
    const next = { ...row, isActive: active };
    this.addresses.set(address, next);
    return { ...next };
  }

  async reserveDerivationIndexes(count: number): Promise<number> {
    await tick();
    const first = this.nextDerivationIndex;
    this.nextDerivationIndex += count;
    return first;
  }

  async listStrandedAddresses(claimedBefore: Date, limit: number): Promise<StrandedAddress[]> {
    await tick();
    const stranded: StrandedAddress[] = [];
    for (const row of this.addresses.values()) {
      if (stranded.length >= limit) break;
      if ((row.status !== 'assigned' && row.status !== 'monitoring') || row.assignedTo === null) continue;
      const deposit = this.deposits.get(row.assignedTo);
      if (deposit && isTerminal(deposit.state)) {
        stranded.push({ address: { ...row }, depositState: deposit.state });
      } else if (!deposit && row.assignedAt !== null && row.assignedAt <= claimedBefore) {
        stranded.push({ address: { ...row }, depositState: null });
      }
    }
    return stranded;
  }

  // ─── Deposits ─────────────────────────────────────────────────────────────

  async createDeposit(deposit: NewDeposit): Promise<DepositRecord> {
    await tick();
    if (this.deposits.has(deposit.id)) {
      throw new Error(`Deposit ${deposit.id} already exists`);
    }
    const row: DepositRecord = {
      ...deposit,
      state: 'pending',
      confirmationsObserved: 0,
      receivedAmount: '0',
      lastCheckedBlock: 0,
      version: 0,
      confirmedAt: null,
      closedAt: null,
      failureReason: null,
    };
    this.deposits.set(row.id, row);
    return { ...row };
  }

  async findDeposit(id: string): Promise<DepositRecord | null> {
    await tick();
    const row = this.deposits.get(id);
    return row ? { ...row } : null;
  }

  async listOpenDeposits(limit: number): Promise<DepositRecord[]> {
    await tick();
    return [...this.deposits.values()]
      .filter((d) => OPEN_DEPOSIT_STATES.includes(d.state))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .slice(0, limit)
      .map((d) => ({ ...d }));
  }

  async findOpenDepositByAddress(address: string): Promise<DepositRecord | null> {
    await tick();
    for (const row of this.deposits.values()) {
      if (row.address === address && OPEN_DEPOSIT_STATES.includes(row.state)) return { ...row };
    }
    return null;
  }

  async listDeposits(query: ListDepositsQuery): Promise<DepositRecord[]> {
    await tick();
    return [...this.deposits.values()]
      .filter((d) => query.ownerId === undefined || d.ownerId === query.ownerId)
      .filter((d) => query.state === undefined || d.state === query.state)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(query.offset, query.offset + query.limit)
      .map((d) => ({ ...d }));
  }

  async updateDeposit(
    id: string,
    expectedVersion: number,
    patch: DepositPatch,
    events: PendingEvent[] = [],
  ): Promise<{ deposit: DepositRecord; events: StoredEvent[] } | null> {
    await tick();
    const row = this.deposits.get(id);
    if (!row || row.version !== expectedVersion) return null;

    const next = { ...applyDepositPatch(row, patch), version: row.version + 1 };
    this.deposits.set(id, next);

    const stored: StoredEvent[] = [];
    for (const pending of events) {
      const event = this.insertEvent(pending);
      if (event) stored.push(event);
    }
    return { deposit: { ...next }, events: stored };
  }

  async recordObservation(observation: AppliedObservation): Promise<{ depositId: string; isNew: boolean }> {
    await tick();
    const existing = this.observations.get(observation.txHash);
    if (existing) {
      if (existing.depositId === observation.depositId && observation.confirmations > existing.confirmations) {
        this.observations.set(observation.txHash, {
          ...existing,
          confirmations: observation.confirmations,
          blockHeight: observation.blockHeight ?? existing.blockHeight,
        });
      }
      return { depositId: existing.depositId, isNew: false };
    }
    this.observations.set(observation.txHash, { ...observation });
    return { depositId: observation.depositId, isNew: true };
  }

  async receivedTotal(depositId: string, minConfirmations = 0): Promise<string> {
    await tick();
    let total = new Decimal(0);
    for (const obs of this.observations.values()) {
      if (obs.depositId === depositId && obs.confirmations >= minConfirmations) total = total.plus(obs.amount);
    }
    return total.toFixed();
  }

  // ─── Events ───────────────────────────────────────────────────────────────

  async recordEvent(pending: PendingEvent): Promise<StoredEvent | null> {
    await tick();
    return this.insertEvent(pending);
  }

  async markDelivered(id: string, at: Date): Promise<void> {
    await tick();
    const row = this.events.get(id);
    if (row) this.events.set(id, { ...row, deliveredAt: at });
  }

  async listUndelivered(limit: number): Promise<StoredEvent[]> {
    await tick();
    return [...this.events.values()]
      .filter((e) => e.deliveredAt === null)
      .sort((a, b) => a.occurredAt.getTime() - b.occurredAt.getTime())
      .slice(0, limit)
      .map((e) => ({ ...e }));
  }

  private insertEvent(pending: PendingEvent): StoredEvent | null {
    if (this.eventKeys.has(pending.dedupeKey)) return null;
    this.eventKeys.add(pending.dedupeKey);
    const stored: StoredEvent = {
      ...pending.event,
      id: randomUUID(),
      dedupeKey: pending.dedupeKey,
      deliveredAt: null,
    };
    this.events.set(stored.id, stored);
    return { ...stored };
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/** FIFO order: never-released first, then oldest release, then insertion order. */
export function compareFifo(a: AddressRecord, b: AddressRecord): number {
  const ta = a.lastReleasedAt?.getTime() ?? Number.NEGATIVE_INFINITY;
  const tb = b.lastReleasedAt?.getTime() ?? Number.NEGATIVE_INFINITY;
  if (ta !== tb) return ta < tb ? -1 : 1;
  return a.position - b.position;
}

function applyAddressPatch(row: AddressRecord, patch: AddressPatch): AddressRecord {
  return {
    ...row,
    status: patch.status,
    assignedTo: patch.assignedTo === undefined ? row.assignedTo : patch.assignedTo,
    assignedAt: patch.assignedAt === undefined ? row.assignedAt : patch.assignedAt,
    lastReleasedAt: patch.lastReleasedAt === undefined ? row.lastReleasedAt : patch.lastReleasedAt,
    cooldownUntil: patch.cooldownUntil === undefined ? row.cooldownUntil : patch.cooldownUntil,
  };
}

function applyDepositPatch(row: DepositRecord, patch: DepositPatch): DepositRecord {
  return {
    ...row,
    state: patch.state ?? row.state,
    confirmationsObserved: patch.confirmationsObserved ?? row.confirmationsObserved,
    receivedAmount: patch.receivedAmount ?? row.receivedAmount,
    lastCheckedBlock: patch.lastCheckedBlock ?? row.lastCheckedBlock,
    confirmedAt: patch.confirmedAt ?? row.confirmedAt,
    closedAt: patch.closedAt ?? row.closedAt,
    failureReason: patch.failureReason ?? row.failureReason,
  };
}

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
