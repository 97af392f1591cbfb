import axios, { type AxiosInstance } from 'axios';
import Decimal from 'decimal.js';
import { z } from 'zod';
import { ChainUnavailableError } from './errors.js';
import type { ChainTransactionObservation } from './types.js';

export interface FetchTransactionsOptions {
  /** Ignore transfers with a block timestamp before this instant. */
  notBefore?: Date;
  signal?: AbortSignal;
}

/**
 * Read-only view of incoming token transfers. Implementations never retry;
 * every transient fault is reported as ChainUnavailableError.
 */
export interface ChainClient {
  fetchTransactions(
    address: string,
    sinceBlockHeight: number,
    options?: FetchTransactionsOptions,
  ): Promise<ChainTransactionObservation[]>;
}

export interface TronGridOptions {
  baseUrl: string;
  apiKey?: string;
  tokenContract: string;
  tokenDecimals: number;
  timeoutMs: number;
  pageSize?: number;
  maxPages?: number;
  /** Pre-configured axios instance; built from `baseUrl` when omitted. */
  http?: AxiosInstance;
}

// ─── TronGrid payloads ──────────────────────────────────────────────────────

const trc20Page = z.object({
  success: z.boolean().optional(),
  data: z.array(
    z.object({
      transaction_id: z.string().min(1),
      from: z.string().nullable().optional(),
      to: z.string(),
      value: z.string().regex(/^\d+$/),
      type: z.string().optional(),
      block_timestamp: z.number(),
      token_info: z.object({ address: z.string() }),
    }),
  ),
  meta: z.object({ fingerprint: z.string().optional() }).optional(),
});

const transactionInfo = z.object({
  blockNumber: z.number().int().nonnegative().optional(),
});

const nowBlock = z.object({
  block_header: z.object({
    raw_data: z.object({ number: z.number().int().nonnegative() }),
  }),
});

type Trc20Transfer = z.infer<typeof trc20Page>['data'][number];

const HEIGHT_CACHE_LIMIT = 10_000;

// ═══════════════════════════════════════════════════════════════════════════════
//  TRON: TronGrid REST API (TRC-20 transfers + full-node wallet endpoints)
// ═══════════════════════════════════════════════════════════════════════════════

export class TronGridClient implements ChainClient {
  private readonly http: AxiosInstance;
  private readonly pageSize: number;
  private readonly maxPages: number;
  private readonly unit: Decimal;
  // Mined transactions never change height, so a hit is final.
  private readonly heights = new Map<string, number>();

  constructor(private readonly options: TronGridOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        headers: options.apiKey ? { 'TRON-PRO-API-KEY': options.apiKey } : {},
      });
    this.pageSize = options.pageSize ?? 50;
    this.maxPages = options.maxPages ?? 5;
    this.unit = new Decimal(10).pow(options.tokenDecimals);
  }

  async fetchTransactions(
    address: string,
    sinceBlockHeight: number,
    options: FetchTransactionsOptions = {},
  ): Promise<ChainTransactionObservation[]> {
    const transfers = await this.listIncomingTransfers(address, options);
    if (transfers.length === 0) return [];

    const tip = await this.currentBlock(options.signal);
    const observations: ChainTransactionObservation[] = [];

    for (const transfer of transfers) {
      const blockHeight = await this.blockHeightOf(transfer.transaction_id, options.signal);
      if (blockHeight !== null && blockHeight < sinceBlockHeight) continue;

      observations.push({
        txHash: transfer.transaction_id,
        toAddress: transfer.to,
        fromAddress: transfer.from ?? null,
        amount: new Decimal(transfer.value).div(this.unit).toFixed(),
        blockHeight,
        blockTimestamp: new Date(transfer.block_timestamp),
        confirmations: blockHeight === null ? 0 : Math.max(0, tip - blockHeight + 1),
      });
    }
    return observations;
  }

  private async listIncomingTransfers(address: string, options: FetchTransactionsOptions): Promise<Trc20Transfer[]> {
    const transfers: Trc20Transfer[] = [];
    const seen = new Set<string>();
    let fingerprint: string | undefined;

    for (let page = 0; page < this.maxPages; page++) {
      const body = await this.request(
        'trc20 transfers',
        () =>
          this.http.get(`/v1/accounts/${address}/transactions/trc20`, {
            params: {
              only_to: true,
              only_confirmed: false,
              contract_address: this.options.tokenContract,
              limit: this.pageSize,
              min_timestamp: options.notBefore?.getTime(),
              fingerprint,
            },
            signal: options.signal,
          }),
        trc20Page,
      );

      for (const transfer of body.data) {
        if (transfer.to !== address) continue;
        if (transfer.token_info.address !== this.options.tokenContract) continue;
        if (transfer.type !== undefined && transfer.type !== 'Transfer') continue;
        if (options.notBefore && transfer.block_timestamp < options.notBefore.getTime()) continue;
        if (seen.has(transfer.transaction_id)) continue;
        seen.add(transfer.transaction_id);
        transfers.push(transfer);
      }

      fingerprint = body.meta?.fingerprint;
      if (!fingerprint || body.data.length < this.pageSize) break;
    }
    return transfers;
  }

  private async currentBlock(signal?: AbortSignal): Promise<number> {
    const block = await this.request('current block', () => this.http.post('/wallet/getnowblock', {}, { signal }), nowBlock);
    return block.block_header.raw_data.number;
  }

  private async blockHeightOf(txHash: string, signal?: AbortSignal): Promise<number | null> {
    const cached = this.heights.get(txHash);
    if (cached !== undefined) return cached;

    const info = await this.request(
      'transaction info',
      () => this.http.post('/wallet/gettransactioninfobyid', { value: txHash }, { signal }),
      transactionInfo,
    );
    // An empty object means the transaction is not in a block yet
    if (info.blockNumber === undefined) return null;

    if (this.heights.size >= HEIGHT_CACHE_LIMIT) {
      const oldest = this.heights.keys().next();
      if (!oldest.done) this.heights.delete(oldest.value);
    }
    this.heights.set(txHash, info.blockNumber);
    return info.blockNumber;
  }

  private async request<T>(
    what: string,
    send: () => Promise<{ data: unknown }>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    let data: unknown;
    try {
      ({ data } = await send());
    } catch (err) {
      throw toChainUnavailable(what, err);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new ChainUnavailableError(`TronGrid returned a malformed ${what} payload`, null, { cause: parsed.error });
    }
    return parsed.data;
  }
}

// ─── Error mapping ──────────────────────────────────────────────────────────

function toChainUnavailable(what: string, err: unknown): ChainUnavailableError {
  if (axios.isCancel(err)) {
    return new ChainUnavailableError(`TronGrid ${what} request aborted`, null, { cause: err });
  }
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    if (status === 429) {
      return new ChainUnavailableError(
        `TronGrid rate limited the ${what} request`,
        parseRetryAfter(err.response?.headers['retry-after']),
        { cause: err },
      );
    }
    const reason = status === undefined ? (err.code ?? err.message) : `HTTP ${status}`;
    return new ChainUnavailableError(`TronGrid ${what} request failed: ${reason}`, null, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ChainUnavailableError(`TronGrid ${what} request failed: ${message}`, null, { cause: err });
}

/** Retry-After is either delta-seconds or an HTTP date. */
export function parseRetryAfter(value: unknown, now: Date = new Date()): number | null {
  if (typeof value === 'number') return value >= 0 ? value * 1000 : null;
  if (typeof value !== 'string' || value.trim() === '') return null;

  const seconds = Number(value);
  if (Number.isFinite(seconds)) return seconds >= 0 ? seconds * 1000 : null;

  const at = Date.parse(value);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - now.getTime());
}
