import { logger as rootLogger, type Logger } from '../config/logger.js';
import type { AddressGenerator } from './address-generator.js';
import { AddressNotFoundError, NotAssignedError, PoolExhaustedError } from './errors.js';
import { addressEventKey, type DepositEventEmitter } from './events.js';
import type { AddressStore } from './store.js';
import { isTronAddress } from './tron.js';
import { systemClock, type AddressRecord, type Clock, type PoolCounts } from './types.js';

export interface PoolConfig {
  /** Replenish tops the active available count back up to this. */
  minSize: number;
  /** At or below this many available addresses the pool reports `warning`. */
  lowThreshold: number;
  cooldownMs: number;
  /** How long a claimed address may wait for its deposit row before it is taken back. */
  strandedGraceMs: number;
}

export type PoolHealth = 'critical' | 'warning' | 'high_utilization' | 'healthy';

export interface PoolStatus extends PoolCounts {
  utilizationPercent: number;
  health: PoolHealth;
  minSize: number;
  lowThreshold: number;
}

export interface ReplenishResult {
  added: number;
  /** Active available count after the run; null when the run failed. */
  available: number | null;
  error?: string;
}

export interface ImportResult {
  added: string[];
  skipped: string[];
  invalid: string[];
}

const HIGH_UTILIZATION_PERCENT = 90;
const RELEASE_BATCH = 100;
const RECONCILE_BATCH = 100;

// ─── Pool Manager ───────────────────────────────────────────────────────────
// Sole writer of address status. Every transition is a compare-and-set in the
// store so two callers can never move the same address at once.

export class PoolManager {
  private readonly log: Logger;
  private replenishing: Promise<ReplenishResult> | null = null;

  constructor(
    private readonly store: AddressStore,
    private readonly events: DepositEventEmitter,
    private readonly config: PoolConfig,
    private readonly generator: AddressGenerator | null = null,
    private readonly clock: Clock = systemClock,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'address-pool' });
  }

  /**
   * Bind the longest-idle available address to a deposit. Throws
   * PoolExhaustedError without retrying and starts a replenish run.
   */
  async allocate(depositId: string): Promise<AddressRecord> {
    const now = this.clock.now();
    const claimed = await this.store.claimNextAvailable(depositId, now);
    if (!claimed) {
      this.log.warn({ depositId }, 'Address pool exhausted');
      void this.replenish();
      throw new PoolExhaustedError();
    }

    this.log.info({ address: claimed.address, depositId, usageCount: claimed.usageCount }, 'Address assigned');
    await this.events.emit(addressEventKey(claimed.address, depositId, 'assigned'), {
      type: 'AddressAssigned',
      depositId,
      address: claimed.address,
      occurredAt: now,
      data: { usageCount: claimed.usageCount },
    });
    return claimed;
  }

  /** Undo an allocation whose deposit was never written. False when the address had moved on. */
  async abandon(address: string, depositId: string): Promise<boolean> {
    const row = await this.store.transitionAddress(
      address,
      { status: ['assigned'], assignedTo: depositId },
      { status: 'available', assignedTo: null, assignedAt: null },
    );
    if (!row) {
      this.log.error({ address, depositId }, 'Could not return abandoned address to the pool');
      return false;
    }
    this.log.warn({ address, depositId }, 'Allocation abandoned');
    return true;
  }

  /** assigned → monitoring. False when the address was not assigned to this deposit. */
  async markMonitoring(address: string, depositId: string): Promise<boolean> {
    const row = await this.store.transitionAddress(
      address,
      { status: ['assigned'], assignedTo: depositId },
      { status: 'monitoring' },
    );
    if (row) this.log.debug({ address, depositId }, 'Address monitoring');
    return row !== null;
  }

  /** assigned | monitoring → cooldown. Idempotent for an address already cooling for this deposit. */
  async beginCooldown(address: string, depositId: string): Promise<AddressRecord | null> {
    const until = new Date(this.clock.now().getTime() + this.config.cooldownMs);
    const row = await this.store.transitionAddress(
      address,
      { status: ['assigned', 'monitoring'], assignedTo: depositId },
      { status: 'cooldown', cooldownUntil: until },
    );
    if (row) {
      this.log.info({ address, depositId, cooldownUntil: until }, 'Address cooling down');
      return row;
    }

    const current = await this.store.findAddress(address);
    if (current?.status === 'cooldown' && current.assignedTo === depositId) return current;
    this.log.error(
      { address, depositId, status: current?.status ?? null, assignedTo: current?.assignedTo ?? null },
      'Cooldown requested for an address not bound to the deposit',
    );
    return null;
  }

  /** cooldown → available. Anything else is a consistency error. */
  async release(address: string): Promise<AddressRecord> {
    const current = await this.store.findAddress(address);
    if (!current || current.status !== 'cooldown') {
      this.log.error({ address, status: current?.status ?? null }, 'Release of an address that is not cooling down');
      throw new NotAssignedError(address, current?.status ?? null);
    }

    const now = this.clock.now();
    const released = await this.store.transitionAddress(
      address,
      current.assignedTo === null ? { status: ['cooldown'] } : { status: ['cooldown'], assignedTo: current.assignedTo },
      { status: 'available', assignedTo: null, assignedAt: null, cooldownUntil: null, lastReleasedAt: now },
    );
    if (!released) {
      const raced = await this.store.findAddress(address);
      this.log.error({ address, status: raced?.status ?? null }, 'Address changed while releasing');
      throw new NotAssignedError(address, raced?.status ?? null);
    }

    const depositId = current.assignedTo ?? '';
    this.log.info({ address, depositId }, 'Address released');
    await this.events.emit(addressEventKey(address, depositId, 'released'), {
      type: 'AddressReleased',
      depositId,
      address,
      occurredAt: now,
      data: { usageCount: released.usageCount },
    });
    return released;
  }

  /** Release every address whose cooldown has elapsed. Returns how many were released. */
  async releaseDue(now: Date = this.clock.now()): Promise<number> {
    const due = await this.store.listDueCooldowns(now, RELEASE_BATCH);
    let released = 0;
    for (const row of due) {
      try {
        await this.release(row.address);
        released++;
      } catch (err) {
        if (!(err instanceof NotAssignedError)) throw err;
      }
    }
    return released;
  }

  /**
   * Put back addresses left bound to a deposit that no longer needs them: the
   * deposit closed but its cooldown never started, or the deposit row was
   * never written after the claim. Returns how many were recovered.
   */
  async reconcile(now: Date = this.clock.now()): Promise<number> {
    const claimedBefore = new Date(now.getTime() - this.config.strandedGraceMs);
    const stranded = await this.store.listStrandedAddresses(claimedBefore, RECONCILE_BATCH);
    let recovered = 0;
    for (const { address, depositState } of stranded) {
      const depositId = address.assignedTo;
      if (depositId === null) continue;
      this.log.warn({ address: address.address, depositId, status: address.status, depositState }, 'Stranded address found');

      if (depositState === null && address.status === 'assigned') {
        if (await this.abandon(address.address, depositId)) recovered++;
      } else if (await this.beginCooldown(address.address, depositId)) {
        recovered++;
      }
    }
    return recovered;
  }

  /**
   * Top the active available count up to `minSize`. Overlapping calls share
   * one run; failures are logged and reported, never thrown.
   */
  replenish(): Promise<ReplenishResult> {
    if (!this.replenishing) {
      this.replenishing = this.runReplenish().finally(() => {
        this.replenishing = null;
      });
    }
    return this.replenishing;
  }

  private async runReplenish(): Promise<ReplenishResult> {
    try {
      const counts = await this.store.countAddresses();
      const deficit = this.config.minSize - counts.available;
      if (deficit <= 0) return { added: 0, available: counts.available };

      if (!this.generator) {
        this.log.warn(
          { available: counts.available, minSize: this.config.minSize },
          'Pool below minimum and no address generator configured; import addresses',
        );
        return { added: 0, available: counts.available };
      }

      const fresh = await this.generator.generate(deficit);
      const { added, skipped } = await this.store.insertAddresses(fresh);
      if (skipped.length > 0) {
        this.log.warn({ skipped }, 'Generated addresses already in the pool');
      }
      this.log.info({ added: added.length, available: counts.available + added.length }, 'Pool replenished');
      return { added: added.length, available: counts.available + added.length };
    } catch (err) {
      this.log.error({ err }, 'Pool replenishment failed, will retry next tick');
      return { added: 0, available: null, error: err instanceof Error ? err.message : String(err) };
    }
  }

  async importAddresses(list: readonly string[]): Promise<ImportResult> {
    const unique = [...new Set(list.map((a) => a.trim()).filter(Boolean))];
    const invalid = unique.filter((a) => !isTronAddress(a));
    const valid = unique.filter((a) => isTronAddress(a));

    const { added, skipped } = await this.store.insertAddresses(valid.map((address) => ({ address })));
    this.log.info({ added: added.length, skipped: skipped.length, invalid: invalid.length }, 'Addresses imported');
    return { added, skipped, invalid };
  }

  async setActive(address: string, active: boolean): Promise<AddressRecord> {
    const row = await this.store.setAddressActive(address, active);
    if (!row) throw new AddressNotFoundError(address);
    this.log.info({ address, active }, active ? 'Address reactivated' : 'Address deactivated');
    return row;
  }

  async getStatus(): Promise<PoolStatus> {
    const counts = await this.store.countAddresses();
    const active = counts.total - counts.inactive;
    const inUse = counts.assigned + counts.monitoring + counts.cooldown;
    const utilizationPercent = active === 0 ? 0 : Math.round((inUse / active) * 1000) / 10;

    let health: PoolHealth = 'healthy';
    if (counts.available === 0) health = 'critical';
    else if (counts.available <= this.config.lowThreshold) health = 'warning';
    else if (utilizationPercent > HIGH_UTILIZATION_PERCENT) health = 'high_utilization';

    return {
      ...counts,
      utilizationPercent,
      health,
      minSize: this.config.minSize,
      lowThreshold: this.config.lowThreshold,
    };
  }
}
