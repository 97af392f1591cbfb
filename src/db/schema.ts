import {
  pgTable,
  uuid,
  varchar,
  text,
  decimal,
  integer,
  bigint,
  boolean,
  serial,
  timestamp,
  jsonb,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';

// ─── Addresses (Deposit address pool) ───────────────────────────────────────
// One row per pooled address. assigned_to holds the deposit request currently
// bound to the address; it stays set through cooldown and is cleared on release.
export const addresses = pgTable('addresses', {
  address: varchar('address', { length: 64 }).primaryKey(),
  position: serial('position').notNull(),
  // Insertion order, FIFO tie-breaker.

  status: varchar('status', { length: 16 }).default('available').notNull(),
  // 'available' | 'assigned' | 'monitoring' | 'cooldown'

  assignedTo: uuid('assigned_to'),
  assignedAt: timestamp('assigned_at', { withTimezone: true }),
  lastReleasedAt: timestamp('last_released_at', { withTimezone: true }),
  cooldownUntil: timestamp('cooldown_until', { withTimezone: true }),

  usageCount: integer('usage_count').default(0).notNull(),
  isActive: boolean('is_active').default(true).notNull(),

  derivationIndex: integer('derivation_index'),
  // Set for addresses derived from ADDRESS_XPUB. NULL for imported ones.

  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index('addresses_status_idx').on(table.status, table.isActive),
  index('addresses_fifo_idx').on(table.lastReleasedAt, table.position),
  uniqueIndex('addresses_assigned_to_idx').on(table.assignedTo),
  uniqueIndex('addresses_derivation_index_idx').on(table.derivationIndex),
]);

// ─── Address Counters (Atomic index allocation for xpub derivation) ─────────
export const addressCounters = pgTable('address_counters', {
  name: varchar('name', { length: 32 }).primaryKey(),
  nextIndex: integer('next_index').default(0).notNull(),
});

// ─── Deposit Requests ───────────────────────────────────────────────────────
export const depositRequests = pgTable('deposit_requests', {
  id: uuid('id').primaryKey(),
  ownerId: varchar('owner_id', { length: 64 }).notNull(),

  amount: decimal('amount', { precision: 28, scale: 18 }).notNull(),
  currency: varchar('currency', { length: 10 }).notNull(),
  address: varchar('address', { length: 64 }).references(() => addresses.address).notNull(),

  state: varchar('state', { length: 24 }).default('pending').notNull(),
  // 'pending' | 'partially_confirmed' | 'confirmed' | 'expired' | 'failed'

  confirmationsObserved: integer('confirmations_observed').default(0).notNull(),
  receivedAmount: decimal('received_amount', { precision: 28, scale: 18 }).default('0').notNull(),
  lastCheckedBlock: bigint('last_checked_block', { mode: 'number' }).default(0).notNull(),

  version: integer('version').default(0).notNull(),
  // Bumped on every monitor write; updates are conditional on it.

  failureReason: text('failure_reason'),

  createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
  expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
  confirmedAt: timestamp('confirmed_at', { withTimezone: true }),
  closedAt: timestamp('closed_at', { withTimezone: true }),
}, (table) => [
  index('deposit_requests_state_idx').on(table.state),
  index('deposit_requests_owner_idx').on(table.ownerId, table.createdAt),
  index('deposit_requests_address_idx').on(table.address),
]);

// ─── Applied Observations (Idempotency ledger keyed by tx hash) ─────────────
export const appliedObservations = pgTable('applied_observations', {
  txHash: varchar('tx_hash', { length: 128 }).primaryKey(),
  depositId: uuid('deposit_id').references(() => depositRequests.id).notNull(),
  amount: decimal('amount', { precision: 28, scale: 18 }).notNull(),
  blockHeight: bigint('block_height', { mode: 'number' }),
  confirmations: integer('confirmations').default(0).notNull(),
  firstSeenAt: timestamp('first_seen_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index('applied_observations_deposit_idx').on(table.depositId),
]);

// ─── Deposit Events (Outbox) ────────────────────────────────────────────────
export const depositEvents = pgTable('deposit_events', {
  id: uuid('id').primaryKey().defaultRandom(),
  dedupeKey: varchar('dedupe_key', { length: 255 }).notNull(),
  type: varchar('type', { length: 40 }).notNull(),
  depositId: uuid('deposit_id').notNull(),
  address: varchar('address', { length: 64 }).notNull(),
  data: jsonb('data').$type<Record<string, string | number | null>>().notNull(),
  occurredAt: timestamp('occurred_at', { withTimezone: true }).notNull(),
  deliveredAt: timestamp('delivered_at', { withTimezone: true }),
}, (table) => [
  uniqueIndex('deposit_events_dedupe_idx').on(table.dedupeKey),
  index('deposit_events_undelivered_idx').on(table.deliveredAt, table.occurredAt),
]);

// ─── Relations ──────────────────────────────────────────────────────────────

export const addressesRelations = relations(addresses, ({ many }) => ({
  deposits: many(depositRequests),
}));

export const depositRequestsRelations = relations(depositRequests, ({ one, many }) => ({
  pooledAddress: one(addresses, { fields: [depositRequests.address], references: [addresses.address] }),
  observations: many(appliedObservations),
}));

export const appliedObservationsRelations = relations(appliedObservations, ({ one }) => ({
  deposit: one(depositRequests, { fields: [appliedObservations.depositId], references: [depositRequests.id] }),
}));
