import { and, asc, count, desc, eq, gte, inArray, isNull, lte, or, sql, type SQL } from 'drizzle-orm';
import Decimal from 'decimal.js';
import type { PgUpdateSetSource } from 'drizzle-orm/pg-core';
import type { DB } from '../db/index.js';
import {
  addressCounters,
  addresses,
  appliedObservations,
  depositEvents,
  depositRequests,
} from '../db/schema.js';
import type { AddressCondition, AddressPatch, ListDepositsQuery, PendingEvent, Store, StrandedAddress } from './store.js';
import {
  OPEN_DEPOSIT_STATES,
  TERMINAL_DEPOSIT_STATES,
  parseAddressStatus,
  parseDepositState,
  parseEventType,
  type AddressRecord,
  type AppliedObservation,
  type DepositPatch,
  type DepositRecord,
  type NewAddress,
  type NewDeposit,
  type PoolCounts,
  type StoredEvent,
} from './types.js';

type AddressRow = typeof addresses.$inferSelect;
type DepositRow = typeof depositRequests.$inferSelect;
type EventRow = typeof depositEvents.$inferSelect;

const DERIVATION_COUNTER = 'xpub';
// A lost race on a row re-selects; SKIP LOCKED makes more than one retry rare.
const CLAIM_ATTEMPTS = 5;

export class PgStore implements Store {
  constructor(private readonly db: DB) {}

  // ─── Addresses ────────────────────────────────────────────────────────────

  async insertAddresses(rows: NewAddress[]): Promise<{ added: string[]; skipped: string[] }> {
    if (rows.length === 0) return { added: [], skipped: [] };

    const inserted = await this.db
      .insert(addresses)
      .values(rows.map((r) => ({ address: r.address, derivationIndex: r.derivationIndex ?? null })))
      .onConflictDoNothing({ target: addresses.address })
      .returning({ address: addresses.address });

    const addedSet = new Set(inserted.map((r) => r.address));
    return {
      added: rows.filter((r) => addedSet.has(r.address)).map((r) => r.address),
      skipped: rows.filter((r) => !addedSet.has(r.address)).map((r) => r.address),
    };
  }

  // ─── Atomic claim ─────────────────────────────────────────────────────────
  // SELECT ... FOR UPDATE SKIP LOCKED hands concurrent claimers different rows;
  // the conditional UPDATE guards against a row that changed under us.

  async claimNextAvailable(depositId: string, now: Date): Promise<AddressRecord | null> {
    for (let attempt = 0; attempt < CLAIM_ATTEMPTS; attempt++) {
      const outcome = await this.db.transaction<AddressRow | 'empty' | 'lost'>(async (tx) => {
        const [candidate] = await tx
          .select({ address: addresses.address })
          .from(addresses)
          .where(and(eq(addresses.status, 'available'), eq(addresses.isActive, true)))
          .orderBy(sql`${addresses.lastReleasedAt} ASC NULLS FIRST`, asc(addresses.position))
          .limit(1)
          .for('update', { skipLocked: true });

        if (!candidate) return 'empty' as const;

        const [row] = await tx
          .update(addresses)
          .set({
            status: 'assigned',
            assignedTo: depositId,
            assignedAt: now,
            cooldownUntil: null,
            usageCount: sql`${addresses.usageCount} + 1`,
          })
          .where(and(eq(addresses.address, candidate.address), eq(addresses.status, 'available')))
          .returning();

        return row ?? ('lost' as const);
      });

      if (outcome === 'empty') return null;
      if (outcome !== 'lost') return toAddress(outcome);
    }
    return null;
  }

  async transitionAddress(
    address: string,
    expected: AddressCondition,
    patch: AddressPatch,
  ): Promise<AddressRecord | null> {
    const conditions: SQL[] = [
      eq(addresses.address, address),
      inArray(addresses.status, [...expected.status]),
    ];
    if (expected.assignedTo !== undefined) conditions.push(eq(addresses.assignedTo, expected.assignedTo));

    const set: PgUpdateSetSource<typeof addresses> = { status: patch.status };
    if (patch.assignedTo !== undefined) set.assignedTo = patch.assignedTo;
    if (patch.assignedAt !== undefined) set.assignedAt = patch.assignedAt;
    if (patch.lastReleasedAt !== undefined) set.lastReleasedAt = patch.lastReleasedAt;
    if (patch.cooldownUntil !== undefined) set.cooldownUntil = patch.cooldownUntil;

    const [row] = await this.db
      .update(addresses)
      .set(set)
      .where(and(...conditions))
      .returning();
    return row ? toAddress(row) : null;
  }

  async findAddress(address: string): Promise<AddressRecord | null> {
    const [row] = await this.db.select().from(addresses).where(eq(addresses.address, address));
    return row ? toAddress(row) : null;
  }

  async listDueCooldowns(now: Date, limit: number): Promise<AddressRecord[]> {
    const rows = await this.db
      .select()
      .from(addresses)
      .where(and(eq(addresses.status, 'cooldown'), lte(addresses.cooldownUntil, now)))
      .orderBy(asc(addresses.cooldownUntil))
      .limit(limit);
    return rows.map(toAddress);
  }

  async countAddresses(): Promise<PoolCounts> {
    const rows = await this.db
      .select({ status: addresses.status, isActive: addresses.isActive, n: count() })
      .from(addresses)
      .groupBy(addresses.status, addresses.isActive);

    const counts: PoolCounts = { available: 0, assigned: 0, monitoring: 0, cooldown: 0, inactive: 0, total: 0 };
    for (const r of rows) {
      counts.total += r.n;
      if (!r.isActive) counts.inactive += r.n;
      else counts[parseAddressStatus(r.status)] += r.n;
    }
    return counts;
  }

  async setAddressActive(address: string, active: boolean): Promise<AddressRecord | null> {
    const [row] = await this.db
      .update(addresses)
      .set({ isActive: active })
      .where(eq(addresses.address, address))
      .returning();
    return row ? toAddress(row) : null;
  }

  async reserveDerivationIndexes(n: number): Promise<number> {
    const [row] = await this.db
      .insert(addressCounters)
      .values({ name: DERIVATION_COUNTER, nextIndex: n })
      .onConflictDoUpdate({
        target: addressCounters.name,
        set: { nextIndex: sql`${addressCounters.nextIndex} + ${n}` },
      })
      .returning({ nextIndex: addressCounters.nextIndex });
    if (!row) throw new Error('Failed to reserve derivation indexes');
    return row.nextIndex - n;
  }

  async listStrandedAddresses(claimedBefore: Date, limit: number): Promise<StrandedAddress[]> {
    const rows = await this.db
      .select({ address: addresses, depositState: depositRequests.state })
      .from(addresses)
      .leftJoin(depositRequests, eq(depositRequests.id, addresses.assignedTo))
      .where(and(
        inArray(addresses.status, ['assigned', 'monitoring']),
        or(
          inArray(depositRequests.state, [...TERMINAL_DEPOSIT_STATES]),
          and(isNull(depositRequests.id), lte(addresses.assignedAt, claimedBefore)),
        ),
      ))
      .orderBy(asc(addresses.assignedAt))
      .limit(limit);
    return rows.map((r) => ({
      address: toAddress(r.address),
      depositState: r.depositState === null ? null : parseDepositState(r.depositState),
    }));
  }

  // ─── Deposits ─────────────────────────────────────────────────────────────

  async createDeposit(deposit: NewDeposit): Promise<DepositRecord> {
    const [row] = await this.db.insert(depositRequests).values(deposit).returning();
    if (!row) throw new Error(`Failed to create deposit ${deposit.id}`);
    return toDeposit(row);
  }

  async findDeposit(id: string): Promise<DepositRecord | null> {
    const [row] = await this.db.select().from(depositRequests).where(eq(depositRequests.id, id));
    return row ? toDeposit(row) : null;
  }

  async listOpenDeposits(limit: number): Promise<DepositRecord[]> {
    const rows = await this.db
      .select()
      .from(depositRequests)
      .where(inArray(depositRequests.state, [...OPEN_DEPOSIT_STATES]))
      .orderBy(asc(depositRequests.createdAt))
      .limit(limit);
    return rows.map(toDeposit);
  }

  async findOpenDepositByAddress(address: string): Promise<DepositRecord | null> {
    const [row] = await this.db
      .select()
      .from(depositRequests)
      .where(and(eq(depositRequests.address, address), inArray(depositRequests.state, [...OPEN_DEPOSIT_STATES])))
      .orderBy(desc(depositRequests.createdAt))
      .limit(1);
    return row ? toDeposit(row) : null;
  }

  async listDeposits(query: ListDepositsQuery): Promise<DepositRecord[]> {
    const conditions: SQL[] = [];
    if (query.ownerId !== undefined) conditions.push(eq(depositRequests.ownerId, query.ownerId));
    if (query.state) conditions.push(eq(depositRequests.state, query.state));

    const rows = await this.db
      .select()
      .from(depositRequests)
      .where(and(...conditions))
      .orderBy(desc(depositRequests.createdAt))
      .limit(query.limit)
      .offset(query.offset);
    return rows.map(toDeposit);
  }

  async updateDeposit(
    id: string,
    expectedVersion: number,
    patch: DepositPatch,
    events: PendingEvent[] = [],
  ): Promise<{ deposit: DepositRecord; events: StoredEvent[] } | null> {
    const set: PgUpdateSetSource<typeof depositRequests> = {};
    if (patch.state !== undefined) set.state = patch.state;
    if (patch.confirmationsObserved !== undefined) set.confirmationsObserved = patch.confirmationsObserved;
    if (patch.receivedAmount !== undefined) set.receivedAmount = patch.receivedAmount;
    if (patch.lastCheckedBlock !== undefined) set.lastCheckedBlock = patch.lastCheckedBlock;
    if (patch.confirmedAt !== undefined) set.confirmedAt = patch.confirmedAt;
    if (patch.closedAt !== undefined) set.closedAt = patch.closedAt;
    if (patch.failureReason !== undefined) set.failureReason = patch.failureReason;

    return this.db.transaction(async (tx) => {
      const [row] = await tx
        .update(depositRequests)
        .set({ ...set, version: sql`${depositRequests.version} + 1` })
        .where(and(eq(depositRequests.id, id), eq(depositRequests.version, expectedVersion)))
        .returning();
      if (!row) return null;

      const stored: StoredEvent[] = [];
      for (const pending of events) {
        const [event] = await tx
          .insert(depositEvents)
          .values(eventValues(pending))
          .onConflictDoNothing({ target: depositEvents.dedupeKey })
          .returning();
        if (event) stored.push(toEvent(event));
      }
      return { deposit: toDeposit(row), events: stored };
    });
  }

  async recordObservation(observation: AppliedObservation): Promise<{ depositId: string; isNew: boolean }> {
    const [inserted] = await this.db
      .insert(appliedObservations)
      .values({
        txHash: observation.txHash,
        depositId: observation.depositId,
        amount: observation.amount,
        blockHeight: observation.blockHeight,
        confirmations: observation.confirmations,
      })
      .onConflictDoNothing({ target: appliedObservations.txHash })
      .returning({ depositId: appliedObservations.depositId });
    if (inserted) return { depositId: inserted.depositId, isNew: true };

    const set: PgUpdateSetSource<typeof appliedObservations> = {
      confirmations: sql`GREATEST(${appliedObservations.confirmations}, ${observation.confirmations})`,
    };
    if (observation.blockHeight !== null) set.blockHeight = observation.blockHeight;

    const [updated] = await this.db
      .update(appliedObservations)
      .set(set)
      .where(and(
        eq(appliedObservations.txHash, observation.txHash),
        eq(appliedObservations.depositId, observation.depositId),
      ))
      .returning({ depositId: appliedObservations.depositId });
    if (updated) return { depositId: updated.depositId, isNew: false };

    const [owner] = await this.db
      .select({ depositId: appliedObservations.depositId })
      .from(appliedObservations)
      .where(eq(appliedObservations.txHash, observation.txHash));
    if (!owner) throw new Error(`Observation ${observation.txHash} vanished while recording`);
    return { depositId: owner.depositId, isNew: false };
  }

  async receivedTotal(depositId: string, minConfirmations = 0): Promise<string> {
    const [row] = await this.db
      .select({ total: sql<string>`COALESCE(SUM(${appliedObservations.amount}), 0)` })
      .from(appliedObservations)
      .where(and(
        eq(appliedObservations.depositId, depositId),
        gte(appliedObservations.confirmations, minConfirmations),
      ));
    return new Decimal(row?.total ?? '0').toFixed();
  }

  // ─── Events ───────────────────────────────────────────────────────────────

  async recordEvent(pending: PendingEvent): Promise<StoredEvent | null> {
    const [row] = await this.db
      .insert(depositEvents)
      .values(eventValues(pending))
      .onConflictDoNothing({ target: depositEvents.dedupeKey })
      .returning();
    return row ? toEvent(row) : null;
  }

  async markDelivered(id: string, at: Date): Promise<void> {
    await this.db.update(depositEvents).set({ deliveredAt: at }).where(eq(depositEvents.id, id));
  }

  async listUndelivered(limit: number): Promise<StoredEvent[]> {
    const rows = await this.db
      .select()
      .from(depositEvents)
      .where(isNull(depositEvents.deliveredAt))
      .orderBy(asc(depositEvents.occurredAt))
      .limit(limit);
    return rows.map(toEvent);
  }
}

// ─── Row mapping ────────────────────────────────────────────────────────────

function toAddress(row: AddressRow): AddressRecord {
  return {
    address: row.address,
    status: parseAddressStatus(row.status),
    assignedTo: row.assignedTo,
    assignedAt: row.assignedAt,
    lastReleasedAt: row.lastReleasedAt,
    cooldownUntil: row.cooldownUntil,
    usageCount: row.usageCount,
    isActive: row.isActive,
    position: row.position,
    derivationIndex: row.derivationIndex,
    createdAt: row.createdAt,
  };
}

function toDeposit(row: DepositRow): DepositRecord {
  return {
    id: row.id,
    ownerId: row.ownerId,
    amount: new Decimal(row.amount).toFixed(),
    currency: row.currency,
    address: row.address,
    state: parseDepositState(row.state),
    confirmationsObserved: row.confirmationsObserved,
    receivedAmount: new Decimal(row.receivedAmount).toFixed(),
    lastCheckedBlock: row.lastCheckedBlock,
    version: row.version,
    createdAt: row.createdAt,
    expiresAt: row.expiresAt,
    confirmedAt: row.confirmedAt,
    closedAt: row.closedAt,
    failureReason: row.failureReason,
  };
}

function toEvent(row: EventRow): StoredEvent {
  return {
    id: row.id,
    dedupeKey: row.dedupeKey,
    type: parseEventType(row.type),
    depositId: row.depositId,
    address: row.address,
    data: row.data,
    occurredAt: row.occurredAt,
    deliveredAt: row.deliveredAt,
  };
}

function eventValues(pending: PendingEvent): typeof depositEvents.$inferInsert {
  return {
    dedupeKey: pending.dedupeKey,
    type: pending.event.type,
    depositId: pending.event.depositId,
    address: pending.event.address,
    data: pending.event.data,
    occurredAt: pending.event.occurredAt,
  };
}
