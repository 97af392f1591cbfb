// ─── Address Pool ───────────────────────────────────────────────────────────

export const ADDRESS_STATUSES = ['available', 'assigned', 'monitoring', 'cooldown'] as const;
export type AddressStatus = (typeof ADDRESS_STATUSES)[number];

export interface AddressRecord {
  address: string;
  status: AddressStatus;
  assignedTo: string | null;
  assignedAt: Date | null;
  lastReleasedAt: Date | null;
  cooldownUntil: Date | null;
  usageCount: number;
  isActive: boolean;
  /** Insertion order; breaks FIFO ties between equal lastReleasedAt. */
  position: number;
  derivationIndex: number | null;
  createdAt: Date;
}

export interface NewAddress {
  address: string;
  derivationIndex?: number | null;
}

export interface PoolCounts {
  available: number;
  assigned: number;
  monitoring: number;
  cooldown: number;
  inactive: number;
  total: number;
}

// ─── Deposit Requests ───────────────────────────────────────────────────────

export const DEPOSIT_STATES = ['pending', 'partially_confirmed', 'confirmed', 'expired', 'failed'] as const;
export type DepositState = (typeof DEPOSIT_STATES)[number];

export const OPEN_DEPOSIT_STATES: readonly DepositState[] = ['pending', 'partially_confirmed'];
export const TERMINAL_DEPOSIT_STATES: readonly DepositState[] = ['confirmed', 'expired', 'failed'];

// pending → partially_confirmed → confirmed; any open state → expired | failed
const STATE_RANK: Record<DepositState, number> = {
  pending: 0,
  partially_confirmed: 1,
  confirmed: 2,
  expired: 2,
  failed: 2,
};

export function isTerminal(state: DepositState): boolean {
  return TERMINAL_DEPOSIT_STATES.includes(state);
}

export function canTransition(from: DepositState, to: DepositState): boolean {
  if (isTerminal(from)) return false;
  return STATE_RANK[to] > STATE_RANK[from];
}

export interface DepositRecord {
  id: string;
  ownerId: string;
  amount: string;
  currency: string;
  address: string;
  state: DepositState;
  confirmationsObserved: number;
  receivedAmount: string;
  lastCheckedBlock: number;
  version: number;
  createdAt: Date;
  expiresAt: Date;
  confirmedAt: Date | null;
  closedAt: Date | null;
  failureReason: string | null;
}

export interface NewDeposit {
  id: string;
  ownerId: string;
  amount: string;
  currency: string;
  address: string;
  createdAt: Date;
  expiresAt: Date;
}

/** Fields the monitor may change in one versioned update. */
export interface DepositPatch {
  state?: DepositState;
  confirmationsObserved?: number;
  receivedAmount?: string;
  lastCheckedBlock?: number;
  confirmedAt?: Date;
  closedAt?: Date;
  failureReason?: string;
}

// ─── Chain Observations ─────────────────────────────────────────────────────

export interface ChainTransactionObservation {
  txHash: string;
  toAddress: string;
  fromAddress: string | null;
  /** Token units as a decimal string (already scaled by token decimals). */
  amount: string;
  /** null while the transfer is not yet in a block. */
  blockHeight: number | null;
  blockTimestamp: Date;
  confirmations: number;
}

export interface AppliedObservation {
  txHash: string;
  depositId: string;
  amount: string;
  blockHeight: number | null;
  confirmations: number;
}

// ─── Events ─────────────────────────────────────────────────────────────────

export const EVENT_TYPES = [
  'AddressAssigned',
  'DepositPartiallyConfirmed',
  'DepositConfirmed',
  'DepositExpired',
  'DepositFailed',
  'AddressReleased',
] as const;
export type DepositEventType = (typeof EVENT_TYPES)[number];

export interface DepositEvent {
  type: DepositEventType;
  depositId: string;
  address: string;
  occurredAt: Date;
  data: Record<string, string | number | null>;
}

export interface StoredEvent extends DepositEvent {
  id: string;
  dedupeKey: string;
  deliveredAt: Date | null;
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = { now: () => new Date() };

// ─── Row narrowing ──────────────────────────────────────────────────────────

function oneOf<T extends string>(values: readonly T[], kind: string) {
  return (value: string): T => {
    const match = values.find((v) => v === value);
    if (match === undefined) throw new Error(`Unknown ${kind}: ${value}`);
    return match;
  };
}

export const parseAddressStatus = oneOf(ADDRESS_STATUSES, 'address status');
export const parseDepositState = oneOf(DEPOSIT_STATES, 'deposit state');
export const parseEventType = oneOf(EVENT_TYPES, 'event type');
