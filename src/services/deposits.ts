import { randomUUID } from 'node:crypto';
import Decimal from 'decimal.js';
import { logger as rootLogger, type Logger } from '../config/logger.js';
import type { PoolManager } from './address-pool.js';
import { DepositNotFoundError, InvalidDepositRequestError } from './errors.js';
import type { DepositStore, ListDepositsQuery } from './store.js';
import { isTerminal, systemClock, type Clock, type DepositRecord, type DepositState } from './types.js';

export interface DepositServiceConfig {
  currency: string;
  /** Token decimals; amounts with more fractional digits are rejected. */
  decimals: number;
  minAmount: string;
  maxAmount: string;
  expiryMs: number;
  confirmationThreshold: number;
}

export interface DepositRequestInput {
  ownerId: string;
  amount: string;
  currency: string;
}

export interface DepositReceipt {
  requestId: string;
  address: string;
  amount: string;
  currency: string;
  expiresAt: Date;
}

export interface DepositStatusView {
  requestId: string;
  state: DepositState;
  confirmationsObserved: number;
  threshold: number;
  address: string;
  amount: string;
  currency: string;
  receivedAmount: string;
  createdAt: Date;
  expiresAt: Date;
  confirmedAt: Date | null;
  failureReason: string | null;
}

// ─── Deposit Requests ───────────────────────────────────────────────────────
// Creates requests and reads them back. State changes belong to the monitor.

export class DepositService {
  private readonly log: Logger;

  constructor(
    private readonly store: DepositStore,
    private readonly pool: PoolManager,
    private readonly config: DepositServiceConfig,
    private readonly clock: Clock = systemClock,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'deposits' });
  }

  async requestDeposit(input: DepositRequestInput): Promise<DepositReceipt> {
    const amount = this.validateAmount(input.amount);
    const currency = input.currency.toUpperCase();
    if (currency !== this.config.currency.toUpperCase()) {
      throw new InvalidDepositRequestError(`Unsupported currency ${input.currency}; only ${this.config.currency} is accepted`);
    }

    const id = randomUUID();
    const address = await this.pool.allocate(id);
    const now = this.clock.now();
    const expiresAt = new Date(now.getTime() + this.config.expiryMs);

    try {
      await this.store.createDeposit({
        id,
        ownerId: input.ownerId,
        amount,
        currency: this.config.currency,
        address: address.address,
        createdAt: now,
        expiresAt,
      });
    } catch (err) {
      await this.pool.abandon(address.address, id);
      throw err;
    }

    this.log.info({ depositId: id, ownerId: input.ownerId, address: address.address, amount }, 'Deposit requested');
    return { requestId: id, address: address.address, amount, currency: this.config.currency, expiresAt };
  }

  /** Pass `ownerId` to hide other users' deposits behind a not-found. */
  async getDepositStatus(requestId: string, ownerId?: string): Promise<DepositStatusView> {
    const deposit = await this.store.findDeposit(requestId);
    if (!deposit || (ownerId !== undefined && deposit.ownerId !== ownerId)) {
      throw new DepositNotFoundError(requestId);
    }
    return this.view(deposit);
  }

  async listDeposits(ownerId: string, query: Omit<ListDepositsQuery, 'ownerId'>): Promise<DepositStatusView[]> {
    const rows = await this.store.listDeposits({ ...query, ownerId });
    return rows.map((d) => this.view(d));
  }

  /** Every owner's deposits, for operators. `ownerId` narrows to one user. */
  async listAllDeposits(query: ListDepositsQuery): Promise<Array<DepositStatusView & { ownerId: string }>> {
    const rows = await this.store.listDeposits(query);
    return rows.map((d) => ({ ...this.view(d), ownerId: d.ownerId }));
  }

  private view(deposit: DepositRecord): DepositStatusView {
    // The monitor records expiry on its next cycle; readers see it at once
    const lapsed = !isTerminal(deposit.state) && this.clock.now().getTime() > deposit.expiresAt.getTime();
    return {
      requestId: deposit.id,
      state: lapsed ? 'expired' : deposit.state,
      confirmationsObserved: deposit.confirmationsObserved,
      threshold: this.config.confirmationThreshold,
      address: deposit.address,
      amount: deposit.amount,
      currency: deposit.currency,
      receivedAmount: deposit.receivedAmount,
      createdAt: deposit.createdAt,
      expiresAt: deposit.expiresAt,
      confirmedAt: deposit.confirmedAt,
      failureReason: deposit.failureReason,
    };
  }

  private validateAmount(raw: string): string {
    let amount: Decimal;
    try {
      amount = new Decimal(raw);
    } catch {
      throw new InvalidDepositRequestError(`Invalid amount: ${raw}`);
    }
    if (!amount.isFinite() || amount.lte(0)) {
      throw new InvalidDepositRequestError('Amount must be a positive number');
    }
    if (amount.decimalPlaces() > this.config.decimals) {
      throw new InvalidDepositRequestError(`Amount has more than ${this.config.decimals} decimal places`);
    }
    if (amount.lt(this.config.minAmount)) {
      throw new InvalidDepositRequestError(`Minimum deposit is ${this.config.minAmount} ${this.config.currency}`);
    }
    if (amount.gt(this.config.maxAmount)) {
      throw new InvalidDepositRequestError(`Maximum deposit is ${this.config.maxAmount} ${this.config.currency}`);
    }
    return amount.toFixed();
  }
}
