import { logger } from '../../config/logger.js';
import type { AddressGenerator } from '../address-generator.js';
import { PoolManager, type PoolConfig } from '../address-pool.js';
import type { ChainClient, FetchTransactionsOptions } from '../chain-client.js';
import { DepositMonitor, type MonitorConfig } from '../deposit-monitor.js';
import { DepositService, type DepositServiceConfig } from '../deposits.js';
import { DepositEventEmitter, type EventSink } from '../events.js';
import { MemoryStore } from '../memory-store.js';
import { tronAddressFromHex } from '../tron.js';
import type { ChainTransactionObservation, Clock, NewAddress, StoredEvent } from '../types.js';

export const T0 = new Date('2026-03-01T12:00:00.000Z');
export const MINUTE = 60_000;

export class FakeClock implements Clock {
  private current: number;

  constructor(start: Date = T0) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

/** Deterministic, checksum-valid TRON address for a small integer. */
export function testAddress(n: number): string {
  return tronAddressFromHex(`41${n.toString(16).padStart(40, '0')}`);
}

export class RecordingSink implements EventSink {
  readonly name = 'recording';
  readonly delivered: StoredEvent[] = [];
  failing = false;
  /** Never answer, like a publisher stuck on a dead connection. */
  hanging = false;

  async deliver(event: StoredEvent): Promise<void> {
    if (this.hanging) return new Promise<void>(() => {});
    if (this.failing) throw new Error('sink down');
    this.delivered.push(event);
  }

  types(): string[] {
    return this.delivered.map((e) => e.type);
  }
}

export class SequenceGenerator implements AddressGenerator {
  calls = 0;

  constructor(private next = 10_000) {}

  async generate(count: number): Promise<NewAddress[]> {
    this.calls++;
    return Array.from({ length: count }, () => ({ address: testAddress(this.next++) }));
  }
}

interface ChainCall {
  address: string;
  since: number;
  notBefore: Date | undefined;
}

type Script = ChainTransactionObservation[] | Error | 'hang';

export class ScriptedChain implements ChainClient {
  readonly calls: ChainCall[] = [];
  private readonly scripts = new Map<string, Script>();

  set(address: string, script: Script): void {
    this.scripts.set(address, script);
  }

  async fetchTransactions(
    address: string,
    sinceBlockHeight: number,
    options: FetchTransactionsOptions = {},
  ): Promise<ChainTransactionObservation[]> {
    this.calls.push({ address, since: sinceBlockHeight, notBefore: options.notBefore });
    const script = this.scripts.get(address) ?? [];
    if (script === 'hang') return new Promise<ChainTransactionObservation[]>(() => {});
    if (script instanceof Error) throw script;
    return script.map((o) => ({ ...o }));
  }

  callsFor(address: string): ChainCall[] {
    return this.calls.filter((c) => c.address === address);
  }
}

export function observation(
  address: string,
  overrides: Partial<ChainTransactionObservation> = {},
): ChainTransactionObservation {
  return {
    txHash: 'tx-1',
    toAddress: address,
    fromAddress: testAddress(999_999),
    amount: '100',
    blockHeight: 100,
    blockTimestamp: new Date(T0.getTime() + MINUTE),
    confirmations: 1,
    ...overrides,
  };
}

export interface HarnessOptions {
  addresses?: number;
  pool?: Partial<PoolConfig>;
  monitor?: Partial<MonitorConfig>;
  deposits?: Partial<DepositServiceConfig>;
  generator?: AddressGenerator | null;
  store?: MemoryStore;
  deliveryTimeoutMs?: number;
}

export function createHarness(options: HarnessOptions = {}) {
  const clock = new FakeClock();
  const store = options.store ?? new MemoryStore(() => clock.now());
  const sink = new RecordingSink();
  const events = new DepositEventEmitter(store, [sink], clock, logger, options.deliveryTimeoutMs ?? 1_000);
  const pool = new PoolManager(
    store,
    events,
    { minSize: 0, lowThreshold: 0, cooldownMs: 10 * MINUTE, strandedGraceMs: 5 * MINUTE, ...options.pool },
    options.generator ?? null,
    clock,
  );
  const chain = new ScriptedChain();
  const monitor = new DepositMonitor(
    { store, pool, chain, events, clock },
    {
      confirmationThreshold: 3,
      pollIntervalMs: 1_000,
      queryTimeoutMs: 1_000,
      concurrency: 2,
      amountTolerance: '0',
      backoff: { baseDelayMs: 1_000, maxDelayMs: 60_000 },
      ...options.monitor,
    },
  );
  const deposits = new DepositService(
    store,
    pool,
    {
      currency: 'USDT',
      decimals: 6,
      minAmount: '1',
      maxAmount: '10000',
      expiryMs: 60 * MINUTE,
      confirmationThreshold: options.monitor?.confirmationThreshold ?? 3,
      ...options.deposits,
    },
    clock,
  );

  const seed = async (count = options.addresses ?? 5) => {
    await store.insertAddresses(Array.from({ length: count }, (_, i) => ({ address: testAddress(i + 1) })));
  };

  return { clock, store, sink, events, pool, chain, monitor, deposits, seed };
}
