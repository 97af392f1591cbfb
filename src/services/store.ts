import type {
  AddressRecord,
  AddressStatus,
  AppliedObservation,
  DepositEvent,
  DepositPatch,
  DepositRecord,
  DepositState,
  NewAddress,
  NewDeposit,
  PoolCounts,
  StoredEvent,
} from './types.js';

// ─── Address Pool Store ─────────────────────────────────────────────────────

export interface AddressCondition {
  status: readonly AddressStatus[];
  /** When given, the row must currently be bound to this deposit. */
  assignedTo?: string;
}

export interface AddressPatch {
  status: AddressStatus;
  assignedTo?: string | null;
  assignedAt?: Date | null;
  lastReleasedAt?: Date | null;
  cooldownUntil?: Date | null;
}

export interface AddressStore {
  /** Insert new available addresses; existing ones are reported as skipped. */
  insertAddresses(rows: NewAddress[]): Promise<{ added: string[]; skipped: string[] }>;

  /**
   * Atomically claim the longest-idle active available address for a deposit.
   * Returns null only when no candidate is left; losing a race on one
   * candidate moves on to the next.
   */
  claimNextAvailable(depositId: string, now: Date): Promise<AddressRecord | null>;

  /** Compare-and-set on status (and optionally binding). Null when the condition failed. */
  transitionAddress(address: string, expected: AddressCondition, patch: AddressPatch): Promise<AddressRecord | null>;

  findAddress(address: string): Promise<AddressRecord | null>;
  listDueCooldowns(now: Date, limit: number): Promise<AddressRecord[]>;
  countAddresses(): Promise<PoolCounts>;
  setAddressActive(address: string, active: boolean): Promise<AddressRecord | null>;

  /** Reserve `count` consecutive derivation indexes; returns the first. */
  reserveDerivationIndexes(count: number): Promise<number>;

  /**
   * Assigned or monitoring addresses whose deposit is already closed, or whose
   * deposit row never appeared although the address was claimed at or before
   * `claimedBefore`.
   */
  listStrandedAddresses(claimedBefore: Date, limit: number): Promise<StrandedAddress[]>;
}

export interface StrandedAddress {
  address: AddressRecord;
  /** Null when no deposit row exists for the binding. */
  depositState: DepositState | null;
}

// ─── Deposit Request Store ──────────────────────────────────────────────────

export interface ListDepositsQuery {
  limit: number;
  offset: number;
  state?: DepositState;
  ownerId?: string;
}

export interface DepositStore {
  createDeposit(deposit: NewDeposit): Promise<DepositRecord>;
  findDeposit(id: string): Promise<DepositRecord | null>;
  listOpenDeposits(limit: number): Promise<DepositRecord[]>;
  /** The open deposit currently bound to `address`, if any. */
  findOpenDepositByAddress(address: string): Promise<DepositRecord | null>;
  /** Newest first. */
  listDeposits(query: ListDepositsQuery): Promise<DepositRecord[]>;

  /**
   * Versioned update. Applies `patch` only if the row is still at
   * `expectedVersion`, bumps the version and records `events` in the same
   * unit of work. Null on a version conflict.
   */
  updateDeposit(
    id: string,
    expectedVersion: number,
    patch: DepositPatch,
    events?: PendingEvent[],
  ): Promise<{ deposit: DepositRecord; events: StoredEvent[] } | null>;

  /**
   * Record a transfer against a deposit keyed by tx hash. Re-recording keeps
   * the original owner and raises the stored confirmation count monotonically.
   * Returns the deposit the hash belongs to.
   */
  recordObservation(observation: AppliedObservation): Promise<{ depositId: string; isNew: boolean }>;

  /**
   * Sum of amounts of the observations bound to the deposit that have at
   * least `minConfirmations` (default 0), as a decimal string.
   */
  receivedTotal(depositId: string, minConfirmations?: number): Promise<string>;
}

// ─── Event Outbox ───────────────────────────────────────────────────────────

export interface PendingEvent {
  dedupeKey: string;
  event: DepositEvent;
}

export interface EventStore {
  /** Null when an event with the same dedupe key was already recorded. */
  recordEvent(pending: PendingEvent): Promise<StoredEvent | null>;
  markDelivered(id: string, at: Date): Promise<void>;
  listUndelivered(limit: number): Promise<StoredEvent[]>;
}

export type Store = AddressStore & DepositStore & EventStore;
