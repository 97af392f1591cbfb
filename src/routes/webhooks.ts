import type { FastifyInstance } from 'fastify';
import Decimal from 'decimal.js';
import { z } from 'zod';
import { createWebhookGuard } from '../middleware/auth.js';
import type { DepositMonitor } from '../services/deposit-monitor.js';

const positiveDecimal = z
  .union([z.string().trim().min(1).max(64), z.number()])
  .transform(String)
  .refine((v) => {
    try {
      return new Decimal(v).gt(0);
    } catch {
      return false;
    }
  }, 'must be a positive decimal');

const notificationSchema = z.object({
  event_type: z.string().min(1).max(64),
  txid: z.string().min(1).max(128),
  address: z.string().min(1).max(64),
  amount: positiveDecimal,
  confirmations: z.coerce.number().int().min(0).default(0),
  block_height: z.coerce.number().int().positive().nullable().optional(),
  timestamp: z.coerce.date().optional(),
  from: z.string().max(64).optional(),
  token: z.string().max(64).optional(),
});

export interface WebhookRouteOptions {
  monitor: Pick<DepositMonitor, 'acceptNotification'>;
  secret: string;
  /** Notifications naming another token contract are ignored. */
  tokenContract: string;
}

export async function webhookRoutes(app: FastifyInstance, { monitor, secret, tokenContract }: WebhookRouteOptions) {
  const verifySecret = createWebhookGuard(secret);

  // ─── Chain Transfer Notification ────────────────────────────────────
  app.post('/api/webhooks/chain', { preHandler: [verifySecret] }, async (request) => {
    const body = notificationSchema.parse(request.body);

    if (body.event_type !== 'transaction_confirmed') {
      request.log.info({ eventType: body.event_type }, 'Ignoring chain notification');
      return { status: 'ignored', reason: `Unsupported event type: ${body.event_type}` };
    }
    if (body.token !== undefined && body.token !== tokenContract) {
      return { status: 'ignored', reason: `Unsupported token: ${body.token}` };
    }

    const outcome = await monitor.acceptNotification({
      txHash: body.txid,
      toAddress: body.address,
      fromAddress: body.from ?? null,
      amount: new Decimal(body.amount).toFixed(),
      blockHeight: body.block_height ?? null,
      blockTimestamp: body.timestamp ?? new Date(),
      confirmations: body.confirmations,
    });

    switch (outcome.status) {
      case 'applied':
        return {
          status: 'applied',
          requestId: outcome.deposit.id,
          state: outcome.deposit.state,
          confirmationsObserved: outcome.deposit.confirmationsObserved,
          receivedAmount: outcome.deposit.receivedAmount,
        };
      case 'no_match':
        return { status: 'no_match', address: body.address };
      case 'ignored':
        return { status: 'ignored', reason: outcome.reason };
    }
  });
}
