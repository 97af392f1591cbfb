import crypto from 'node:crypto';
import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';

// Extend FastifyRequest with the authenticated subject
declare module 'fastify' {
  interface FastifyRequest {
    userId: string;
  }
}

/**
 * Auth middleware using @fastify/jwt.
 * Extracts and verifies the JWT from the Authorization header.
 */
export async function authGuard(request: FastifyRequest, reply: FastifyReply) {
  try {
    const decoded = await request.jwtVerify<{ sub: string }>();
    if (!decoded.sub) {
      return reply.status(401).send({ error: 'Unauthorized', message: 'Token has no subject' });
    }
    request.userId = decoded.sub;
  } catch {
    return reply.status(401).send({ error: 'Unauthorized', message: 'Invalid or expired token' });
  }
}

/**
 * Admin guard: verifies the JWT and checks the subject against the
 * configured admin ids.
 */
export function createAdminGuard(adminIds: readonly string[]): preHandlerAsyncHookHandler {
  return async function adminGuard(request, reply) {
    await authGuard(request, reply);
    if (reply.sent) return;

    if (!adminIds.includes(request.userId)) {
      return reply.status(403).send({ error: 'Forbidden', message: 'Admin access required' });
    }
  };
}

export const WEBHOOK_SECRET_HEADER = 'x-webhook-secret';

/**
 * Shared-secret guard for machine callers. Compares the header in constant time.
 */
export function createWebhookGuard(secret: string): preHandlerAsyncHookHandler {
  return async function webhookGuard(request, reply) {
    const provided = request.headers[WEBHOOK_SECRET_HEADER];
    const matches = typeof provided === 'string'
      && provided.length === secret.length
      && crypto.timingSafeEqual(Buffer.from(provided), Buffer.from(secret));
    if (!matches) {
      return reply.status(401).send({ error: 'Unauthorized', message: 'Invalid webhook secret' });
    }
  };
}
