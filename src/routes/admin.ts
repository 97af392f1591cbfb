import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { createAdminGuard } from '../middleware/auth.js';
import type { PoolManager } from '../services/address-pool.js';
import type { DepositMonitor } from '../services/deposit-monitor.js';
import type { DepositService } from '../services/deposits.js';
import { DEPOSIT_STATES } from '../services/types.js';

const importSchema = z.object({
  addresses: z.array(z.string().max(64)).min(1).max(10_000),
});

const setActiveSchema = z.object({ isActive: z.boolean() });
const addressParamSchema = z.object({ address: z.string().min(1).max(64) });
const uuidParamSchema = z.object({ id: z.string().uuid() });
const failSchema = z.object({ reason: z.string().trim().min(1).max(2000) });
const confirmSchema = z.object({ reason: z.string().trim().min(1).max(2000).optional() });

const listQuerySchema = z.object({
  state: z.enum(DEPOSIT_STATES).optional(),
  ownerId: z.string().min(1).max(64).optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export interface AdminRouteOptions {
  pool: PoolManager;
  deposits: DepositService;
  monitor: Pick<DepositMonitor, 'failDeposit' | 'confirmDeposit'>;
  adminIds: readonly string[];
}

export async function adminRoutes(app: FastifyInstance, { pool, deposits, monitor, adminIds }: AdminRouteOptions) {
  const adminGuard = createAdminGuard(adminIds);

  // ─── Pool Status ────────────────────────────────────────────────────
  app.get('/api/admin/pool', { preHandler: [adminGuard] }, async () => {
    return pool.getStatus();
  });

  // ─── Import Addresses ───────────────────────────────────────────────
  app.post('/api/admin/pool/addresses', { preHandler: [adminGuard] }, async (request) => {
    const { addresses } = importSchema.parse(request.body);
    const result = await pool.importAddresses(addresses);
    request.log.info(
      { adminId: request.userId, added: result.added.length, invalid: result.invalid.length },
      'Admin imported addresses',
    );
    return result;
  });

  // ─── Trigger Replenish ──────────────────────────────────────────────
  app.post('/api/admin/pool/replenish', { preHandler: [adminGuard] }, async () => {
    return pool.replenish();
  });

  // ─── Activate / Deactivate Address ──────────────────────────────────
  app.patch('/api/admin/pool/addresses/:address', { preHandler: [adminGuard] }, async (request) => {
    const { address } = addressParamSchema.parse(request.params);
    const { isActive } = setActiveSchema.parse(request.body);
    const row = await pool.setActive(address, isActive);
    return { address: row.address, status: row.status, isActive: row.isActive };
  });

  // ─── List Deposits (all owners) ─────────────────────────────────────
  app.get('/api/admin/deposits', { preHandler: [adminGuard] }, async (request) => {
    const query = listQuerySchema.parse(request.query);
    const rows = await deposits.listAllDeposits(query);
    return { deposits: rows, count: rows.length, limit: query.limit, offset: query.offset };
  });

  // ─── Approve Deposit ────────────────────────────────────────────────
  app.post('/api/admin/deposits/:id/confirm', { preHandler: [adminGuard] }, async (request) => {
    const { id } = uuidParamSchema.parse(request.params);
    const { reason } = confirmSchema.parse(request.body ?? {});
    const deposit = await monitor.confirmDeposit(id, reason ?? `Approved by admin ${request.userId}`);
    request.log.warn({ adminId: request.userId, depositId: id, receivedAmount: deposit.receivedAmount }, 'Admin confirmed deposit');
    return { requestId: deposit.id, state: deposit.state, amount: deposit.amount, receivedAmount: deposit.receivedAmount };
  });

  // ─── Fail Deposit ───────────────────────────────────────────────────
  app.post('/api/admin/deposits/:id/fail', { preHandler: [adminGuard] }, async (request) => {
    const { id } = uuidParamSchema.parse(request.params);
    const { reason } = failSchema.parse(request.body);
    const deposit = await monitor.failDeposit(id, reason);
    request.log.warn({ adminId: request.userId, depositId: id, reason }, 'Admin failed deposit');
    return { requestId: deposit.id, state: deposit.state, failureReason: deposit.failureReason };
  });
}
