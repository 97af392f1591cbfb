import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { authGuard } from '../middleware/auth.js';
import type { DepositService } from '../services/deposits.js';
import { DEPOSIT_STATES } from '../services/types.js';

const createDepositSchema = z.object({
  amount: z.union([z.string().trim().min(1).max(64), z.number().positive()]).transform(String),
  currency: z.string().trim().min(1).max(16),
});

const listQuerySchema = z.object({
  state: z.enum(DEPOSIT_STATES).optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const uuidParamSchema = z.object({ id: z.string().uuid() });

export interface DepositRouteOptions {
  deposits: DepositService;
}

export async function depositRoutes(app: FastifyInstance, { deposits }: DepositRouteOptions) {
  // ─── Request Deposit Address ────────────────────────────────────────
  app.post('/api/deposits', { preHandler: [authGuard] }, async (request, reply) => {
    const body = createDepositSchema.parse(request.body);
    const receipt = await deposits.requestDeposit({
      ownerId: request.userId,
      amount: body.amount,
      currency: body.currency,
    });
    return reply.status(201).send(receipt);
  });

  // ─── List Deposits ──────────────────────────────────────────────────
  app.get('/api/deposits', { preHandler: [authGuard] }, async (request) => {
    const query = listQuerySchema.parse(request.query);
    const rows = await deposits.listDeposits(request.userId, query);
    return { deposits: rows };
  });

  // ─── Get Single Deposit ─────────────────────────────────────────────
  app.get('/api/deposits/:id', { preHandler: [authGuard] }, async (request) => {
    const { id } = uuidParamSchema.parse(request.params);
    return deposits.getDepositStatus(id, request.userId);
  });
}
