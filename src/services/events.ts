import { logger as rootLogger, type Logger } from '../config/logger.js';
import { KEYS } from './redis.js';
import { withTimeout } from './scheduling.js';
import type { EventStore } from './store.js';
import { systemClock, type Clock, type DepositEvent, type DepositState, type StoredEvent } from './types.js';

// ─── Dedupe keys ────────────────────────────────────────────────────────────

/** One event per deposit per state it enters. */
export function depositEventKey(depositId: string, state: DepositState): string {
  return `deposit:${depositId}:${state}`;
}

/** One event per address binding and lifecycle step. */
export function addressEventKey(address: string, depositId: string, kind: 'assigned' | 'released'): string {
  return `address:${address}:${depositId}:${kind}`;
}

// ─── Sinks ──────────────────────────────────────────────────────────────────

export interface EventSink {
  readonly name: string;
  /** Reject to leave the event undelivered for the next sweep. */
  deliver(event: StoredEvent): Promise<void>;
}

export function serializeEvent(event: StoredEvent): string {
  return JSON.stringify({
    id: event.id,
    type: event.type,
    depositId: event.depositId,
    address: event.address,
    occurredAt: event.occurredAt.toISOString(),
    data: event.data,
  });
}

export class LogEventSink implements EventSink {
  readonly name = 'log';

  constructor(private readonly log: Logger = rootLogger.child({ component: 'events' })) {}

  async deliver(event: StoredEvent): Promise<void> {
    this.log.info(
      { eventId: event.id, type: event.type, depositId: event.depositId, address: event.address, data: event.data },
      `event ${event.type}`,
    );
  }
}

/** The slice of an ioredis client the sink needs. */
export interface Publisher {
  publish(channel: string, message: string): Promise<number>;
}

export class RedisEventSink implements EventSink {
  readonly name = 'redis';

  constructor(
    private readonly redis: Publisher,
    private readonly channel: string = KEYS.depositEventsChannel,
  ) {}

  async deliver(event: StoredEvent): Promise<void> {
    await this.redis.publish(this.channel, serializeEvent(event));
  }
}

// ─── Emitter ────────────────────────────────────────────────────────────────

const DEFAULT_DELIVERY_TIMEOUT_MS = 5_000;

/**
 * Durable, at-least-once event fan-out. Every event is written to the outbox
 * under its dedupe key first. Delivery to the sinks then runs in the
 * background, each sink bounded by `deliveryTimeoutMs`, so callers never wait
 * on a sink. An event stays undelivered until every sink has accepted it and
 * `redeliverPending` picks it up again.
 */
export class DepositEventEmitter {
  private readonly log: Logger;
  private readonly inFlight = new Map<string, Promise<boolean>>();

  constructor(
    private readonly store: EventStore,
    private readonly sinks: readonly EventSink[],
    private readonly clock: Clock = systemClock,
    log: Logger = rootLogger,
    private readonly deliveryTimeoutMs: number = DEFAULT_DELIVERY_TIMEOUT_MS,
  ) {
    this.log = log.child({ component: 'events' });
  }

  /** Record the event and start delivering it. Null when the dedupe key was already used. */
  async emit(dedupeKey: string, event: DepositEvent): Promise<StoredEvent | null> {
    const stored = await this.store.recordEvent({ dedupeKey, event });
    if (!stored) {
      this.log.debug({ dedupeKey }, 'Duplicate event dropped');
      return null;
    }
    this.dispatch(stored);
    return stored;
  }

  /** Start delivering events that were recorded together with a state change. */
  publish(events: readonly StoredEvent[]): void {
    for (const event of events) this.dispatch(event);
  }

  /**
   * Retry up to `limit` undelivered events, oldest first, joining deliveries
   * already in flight. Returns how many went out.
   */
  async redeliverPending(limit = 100): Promise<number> {
    const pending = await this.store.listUndelivered(limit);
    const outcomes = await Promise.all(pending.map((event) => this.dispatch(event)));
    const delivered = outcomes.filter(Boolean).length;
    if (pending.length > 0) {
      this.log.info({ pending: pending.length, delivered }, 'Redelivered pending events');
    }
    return delivered;
  }

  /** Wait for every delivery currently in flight. */
  async settle(): Promise<void> {
    await Promise.all([...this.inFlight.values()]);
  }

  private dispatch(event: StoredEvent): Promise<boolean> {
    const running = this.inFlight.get(event.id);
    if (running) return running;

    const delivery = this.deliver(event)
      .catch((err: unknown) => {
        this.log.error({ err, eventId: event.id, type: event.type }, 'Event delivery bookkeeping failed');
        return false;
      })
      .finally(() => {
        this.inFlight.delete(event.id);
      });
    this.inFlight.set(event.id, delivery);
    return delivery;
  }

  private async deliver(event: StoredEvent): Promise<boolean> {
    let ok = true;
    for (const sink of this.sinks) {
      try {
        await withTimeout(this.deliveryTimeoutMs, () => sink.deliver(event));
      } catch (err) {
        ok = false;
        this.log.warn({ err, sink: sink.name, eventId: event.id, type: event.type }, 'Event delivery failed, will retry');
      }
    }
    if (ok) await this.store.markDelivered(event.id, this.clock.now());
    return ok;
  }
}
