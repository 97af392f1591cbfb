import Decimal from 'decimal.js';
import { logger as rootLogger, type Logger } from '../config/logger.js';
import type { PoolManager } from './address-pool.js';
import { BackoffTracker, type BackoffPolicy } from './backoff.js';
import type { ChainClient } from './chain-client.js';
import { ChainUnavailableError, DepositNotFoundError, InvalidTransitionError } from './errors.js';
import { depositEventKey, type DepositEventEmitter } from './events.js';
import { runWithConcurrency, TaskTimeoutError, withTimeout } from './scheduling.js';
import type { DepositStore, PendingEvent } from './store.js';
import {
  canTransition,
  isTerminal,
  systemClock,
  type ChainTransactionObservation,
  type Clock,
  type DepositEventType,
  type DepositPatch,
  type DepositRecord,
  type DepositState,
} from './types.js';

export interface MonitorConfig {
  confirmationThreshold: number;
  pollIntervalMs: number;
  /** Upper bound for one address's chain query. */
  queryTimeoutMs: number;
  /** Addresses queried in parallel per cycle. */
  concurrency: number;
  /** Shortfall still accepted as full payment, decimal string. */
  amountTolerance: string;
  backoff: BackoffPolicy;
}

export interface MonitorDeps {
  store: DepositStore;
  pool: PoolManager;
  chain: ChainClient;
  events: DepositEventEmitter;
  clock?: Clock;
  logger?: Logger;
}

export interface CycleSummary {
  /** Polled and still open afterwards. */
  checked: number;
  skipped: number;
  unavailable: number;
  errors: number;
  confirmed: number;
  expired: number;
  /** Stranded addresses put back by the reconcile pass. */
  reconciled: number;
  released: number;
  redelivered: number;
}

type CheckOutcome = 'checked' | 'confirmed' | 'skipped' | 'unavailable';

export type NotificationOutcome =
  | { status: 'applied'; deposit: DepositRecord }
  | { status: 'no_match' }
  | { status: 'ignored'; reason: string };

const EVENT_FOR_STATE: Partial<Record<DepositState, DepositEventType>> = {
  partially_confirmed: 'DepositPartiallyConfirmed',
  confirmed: 'DepositConfirmed',
  expired: 'DepositExpired',
  failed: 'DepositFailed',
};

const VERSION_ATTEMPTS = 5;
const OPEN_BATCH = 500;

// ─── Deposit Monitor ────────────────────────────────────────────────────────
// Sole writer of deposit state. Credits come from the applied-observation
// ledger, so re-polling the same transfer never changes the received amount.

export class DepositMonitor {
  private readonly store: DepositStore;
  private readonly pool: PoolManager;
  private readonly chain: ChainClient;
  private readonly events: DepositEventEmitter;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly backoff: BackoffTracker;
  private readonly tolerance: Decimal;
  private readonly monitored = new Set<string>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<CycleSummary> | null = null;

  constructor(deps: MonitorDeps, private readonly config: MonitorConfig) {
    this.store = deps.store;
    this.pool = deps.pool;
    this.chain = deps.chain;
    this.events = deps.events;
    this.clock = deps.clock ?? systemClock;
    this.log = (deps.logger ?? rootLogger).child({ component: 'deposit-monitor' });
    this.backoff = new BackoffTracker(config.backoff);
    this.tolerance = new Decimal(config.amountTolerance);
  }

  // ─── Start / Stop ─────────────────────────────────────────────────────────

  start(): void {
    if (this.timer) return;
    this.log.info({ pollIntervalMs: this.config.pollIntervalMs }, 'Deposit monitor started');

    const tick = () => {
      this.runCycle().catch((err) => {
        this.log.error({ err }, 'Deposit monitor cycle failed');
      });
    };
    tick();
    this.timer = setInterval(tick, this.config.pollIntervalMs);
  }

  /** Stop scheduling and wait for an in-flight cycle to finish. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running.catch(() => undefined);
    }
  }

  /** Open deposits whose address this instance has already moved to monitoring. */
  get trackedCount(): number {
    return this.monitored.size;
  }

  /** One poll cycle. A call while a cycle is in flight joins that cycle. */
  runCycle(): Promise<CycleSummary> {
    if (!this.running) {
      this.running = this.cycle().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  // ─── Main Cycle ───────────────────────────────────────────────────────────

  private async cycle(): Promise<CycleSummary> {
    const summary: CycleSummary = {
      checked: 0,
      skipped: 0,
      unavailable: 0,
      errors: 0,
      confirmed: 0,
      expired: 0,
      reconciled: 0,
      released: 0,
      redelivered: 0,
    };

    // 1. Poll every open deposit's address
    const open = await this.store.listOpenDeposits(OPEN_BATCH);
    const openIds = new Set(open.map((d) => d.id));
    for (const id of this.monitored) {
      if (!openIds.has(id)) this.monitored.delete(id);
    }
    await runWithConcurrency(open, this.config.concurrency, async (deposit) => {
      try {
        const outcome = await this.checkDeposit(deposit);
        summary[outcome]++;
      } catch (err) {
        summary.errors++;
        this.log.error({ err, depositId: deposit.id, address: deposit.address }, 'Deposit check failed');
      }
    });

    // 2. Expire what did not confirm in time
    const now = this.clock.now();
    for (const deposit of open) {
      if (now.getTime() <= deposit.expiresAt.getTime()) continue;
      try {
        const result = await this.expire(deposit.id);
        if (result?.state === 'expired') summary.expired++;
      } catch (err) {
        summary.errors++;
        this.log.error({ err, depositId: deposit.id }, 'Deposit expiry failed');
      }
    }

    // 3. Take back addresses whose deposit closed without starting a cooldown
    summary.reconciled = await this.pool.reconcile(now);

    // 4. Recycle cooled-down addresses, 5. retry undelivered events
    summary.released = await this.pool.releaseDue(now);
    summary.redelivered = await this.events.redeliverPending();

    if (open.length > 0 || summary.released > 0 || summary.reconciled > 0) {
      this.log.info({ open: open.length, tracked: this.trackedCount, ...summary }, 'Deposit monitor cycle complete');
    }
    return summary;
  }

  private async checkDeposit(deposit: DepositRecord): Promise<CheckOutcome> {
    const now = this.clock.now();
    if (this.backoff.isBlocked(deposit.address, now)) return 'skipped';

    if (!this.monitored.has(deposit.id)) {
      await this.pool.markMonitoring(deposit.address, deposit.id);
      this.monitored.add(deposit.id);
    }

    let observations: ChainTransactionObservation[];
    try {
      observations = await withTimeout(this.config.queryTimeoutMs, (signal) =>
        this.chain.fetchTransactions(deposit.address, deposit.lastCheckedBlock, {
          notBefore: deposit.createdAt,
          signal,
        }),
      );
    } catch (err) {
      if (!(err instanceof ChainUnavailableError) && !(err instanceof TaskTimeoutError)) throw err;
      const hint = err instanceof ChainUnavailableError ? err.retryAfterMs : null;
      const delayMs = this.backoff.recordFailure(deposit.address, now, hint);
      this.log.warn(
        { address: deposit.address, depositId: deposit.id, delayMs, failures: this.backoff.failures(deposit.address), reason: err.message },
        'Chain query failed, backing off',
      );
      return 'unavailable';
    }
    this.backoff.recordSuccess(deposit.address);

    const relevant = observations
      .filter((o) => o.toAddress === deposit.address && o.blockTimestamp.getTime() >= deposit.createdAt.getTime())
      .sort((a, b) => (a.blockHeight ?? Number.MAX_SAFE_INTEGER) - (b.blockHeight ?? Number.MAX_SAFE_INTEGER));

    let current = deposit;
    for (const observation of relevant) {
      const next = await this.applyObservation(deposit.id, observation);
      if (next) current = next;
      if (isTerminal(current.state)) break;
    }

    if (isTerminal(current.state)) {
      this.monitored.delete(deposit.id);
      return current.state === 'confirmed' ? 'confirmed' : 'checked';
    }
    await this.advanceCheckpoint(current, relevant);
    return 'checked';
  }

  // ─── Applying Observations ────────────────────────────────────────────────

  /**
   * Credit one transfer to a deposit. Safe to call any number of times with
   * the same transfer: the amount is counted once and confirmations only rise.
   * Returns the deposit after the update, or null when the transfer belongs
   * to another deposit.
   */
  async applyObservation(depositId: string, observation: ChainTransactionObservation): Promise<DepositRecord | null> {
    const binding = await this.store.recordObservation({
      txHash: observation.txHash,
      depositId,
      amount: observation.amount,
      blockHeight: observation.blockHeight,
      confirmations: observation.confirmations,
    });
    if (binding.depositId !== depositId) {
      this.log.warn(
        { txHash: observation.txHash, depositId, creditedTo: binding.depositId },
        'Transfer already credited to another deposit, ignoring',
      );
      return null;
    }

    const threshold = this.config.confirmationThreshold;
    for (let attempt = 0; attempt < VERSION_ATTEMPTS; attempt++) {
      const deposit = await this.store.findDeposit(depositId);
      if (!deposit) throw new DepositNotFoundError(depositId);
      if (isTerminal(deposit.state)) return deposit;

      const received = await this.store.receivedTotal(depositId);
      const settled = await this.store.receivedTotal(depositId, threshold);
      const confirmations = Math.max(deposit.confirmationsObserved, observation.confirmations);
      const funded = new Decimal(settled).plus(this.tolerance).gte(deposit.amount);
      const state: DepositState = funded ? 'confirmed' : 'partially_confirmed';

      const unchanged =
        state === deposit.state &&
        confirmations === deposit.confirmationsObserved &&
        new Decimal(received).eq(deposit.receivedAmount);
      if (unchanged) return deposit;

      const now = this.clock.now();
      const patch: DepositPatch = { confirmationsObserved: confirmations, receivedAmount: received };
      const events: PendingEvent[] = [];
      if (state !== deposit.state && canTransition(deposit.state, state)) {
        patch.state = state;
        if (state === 'confirmed') {
          patch.confirmedAt = now;
          patch.closedAt = now;
        }
        events.push(this.stateEvent(deposit, state, now, {
          txHash: observation.txHash,
          confirmations,
          receivedAmount: received,
          amount: deposit.amount,
        }));
      }

      const result = await this.store.updateDeposit(deposit.id, deposit.version, patch, events);
      if (!result) continue;

      this.events.publish(result.events);
      const updated = result.deposit;
      if (updated.state === 'confirmed') {
        this.log.info({ depositId, address: updated.address, receivedAmount: received, confirmations }, 'Deposit confirmed');
        await this.pool.beginCooldown(updated.address, depositId);
      } else if (confirmations >= threshold && new Decimal(received).plus(this.tolerance).lt(updated.amount)) {
        this.log.warn({ depositId, amount: updated.amount, receivedAmount: received }, 'Deposit underpaid');
      }
      return updated;
    }

    this.log.warn({ depositId, txHash: observation.txHash }, 'Deposit kept changing, observation left for next cycle');
    return null;
  }

  // ─── Terminal Transitions ─────────────────────────────────────────────────

  /** Expire an open deposit past its deadline. Returns the row as it stands afterwards. */
  async expire(depositId: string): Promise<DepositRecord | null> {
    return this.close(depositId, 'expired', (deposit, now) => {
      if (isTerminal(deposit.state)) return false;
      return now.getTime() > deposit.expiresAt.getTime();
    });
  }

  /** Operator action: give up on an open deposit. */
  async failDeposit(depositId: string, reason: string): Promise<DepositRecord> {
    return this.operatorClose(depositId, 'failed', reason);
  }

  /**
   * Operator action: accept an open deposit as paid whatever the chain shows,
   * typically after reviewing an underpayment.
   */
  async confirmDeposit(depositId: string, reason: string): Promise<DepositRecord> {
    return this.operatorClose(depositId, 'confirmed', reason);
  }

  /**
   * Apply a transfer pushed by a chain notification instead of found by
   * polling. The transfer goes to the open deposit bound to its address.
   */
  async acceptNotification(observation: ChainTransactionObservation): Promise<NotificationOutcome> {
    const deposit = await this.store.findOpenDepositByAddress(observation.toAddress);
    if (!deposit) {
      this.log.info({ address: observation.toAddress, txHash: observation.txHash }, 'Notification matches no open deposit');
      return { status: 'no_match' };
    }
    if (observation.blockTimestamp.getTime() < deposit.createdAt.getTime()) {
      return { status: 'ignored', reason: 'Transfer predates the deposit request' };
    }

    const updated = await this.applyObservation(deposit.id, observation);
    if (!updated) return { status: 'ignored', reason: 'Transfer already credited to another deposit' };
    return { status: 'applied', deposit: updated };
  }

  private async operatorClose(depositId: string, state: 'failed' | 'confirmed', reason: string): Promise<DepositRecord> {
    const result = await this.close(depositId, state, (deposit) => {
      if (isTerminal(deposit.state)) throw new InvalidTransitionError(depositId, deposit.state, state);
      return true;
    }, reason);
    if (!result) throw new DepositNotFoundError(depositId);
    return result;
  }

  private async close(
    depositId: string,
    state: 'expired' | 'failed' | 'confirmed',
    shouldClose: (deposit: DepositRecord, now: Date) => boolean,
    reason?: string,
  ): Promise<DepositRecord | null> {
    for (let attempt = 0; attempt < VERSION_ATTEMPTS; attempt++) {
      const deposit = await this.store.findDeposit(depositId);
      if (!deposit) throw new DepositNotFoundError(depositId);

      const now = this.clock.now();
      if (!shouldClose(deposit, now)) return deposit;

      const patch: DepositPatch = { state, closedAt: now };
      if (state === 'confirmed') patch.confirmedAt = now;
      if (state === 'failed' && reason !== undefined) patch.failureReason = reason;
      const event = this.stateEvent(deposit, state, now, {
        confirmations: deposit.confirmationsObserved,
        receivedAmount: deposit.receivedAmount,
        amount: deposit.amount,
        reason: reason ?? null,
      });

      const result = await this.store.updateDeposit(deposit.id, deposit.version, patch, [event]);
      if (!result) continue;

      this.events.publish(result.events);
      this.monitored.delete(depositId);
      this.log.info({ depositId, address: deposit.address, state, reason }, `Deposit ${state}`);
      await this.pool.beginCooldown(deposit.address, depositId);
      return result.deposit;
    }

    this.log.warn({ depositId, state }, 'Deposit kept changing, transition left for next cycle');
    return null;
  }

  // ─── Helpers ──────────────────────────────────────────────────────────────

  private stateEvent(
    deposit: DepositRecord,
    state: DepositState,
    occurredAt: Date,
    data: Record<string, string | number | null>,
  ): PendingEvent {
    const type = EVENT_FOR_STATE[state];
    if (!type) throw new Error(`No event for deposit state ${state}`);
    return {
      dedupeKey: depositEventKey(deposit.id, state),
      event: { type, depositId: deposit.id, address: deposit.address, occurredAt, data },
    };
  }

  /**
   * Move the polling floor past transfers that can no longer change. The
   * floor stays at the lowest transfer still short of the threshold so its
   * confirmations keep being refreshed.
   */
  private async advanceCheckpoint(deposit: DepositRecord, observations: readonly ChainTransactionObservation[]): Promise<void> {
    if (observations.length === 0) return;
    if (observations.some((o) => o.blockHeight === null)) return;

    const threshold = this.config.confirmationThreshold;
    const heights = observations.map((o) => o.blockHeight ?? 0);
    const pending = observations.filter((o) => o.confirmations < threshold).map((o) => o.blockHeight ?? 0);
    const floor = pending.length > 0 ? Math.min(...pending) : Math.max(...heights) + 1;
    if (floor <= deposit.lastCheckedBlock) return;

    const fresh = await this.store.findDeposit(deposit.id);
    if (!fresh || isTerminal(fresh.state) || floor <= fresh.lastCheckedBlock) return;
    // A conflict here just means the floor moves on the next cycle
    await this.store.updateDeposit(fresh.id, fresh.version, { lastCheckedBlock: floor });
  }
}
