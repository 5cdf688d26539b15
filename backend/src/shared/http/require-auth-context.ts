/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require auth" logic.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB or services.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';

export type RequiredAuthContext = Readonly<{
  sessionId: string;
  userId: number;
}>;

/** Controller guard: no valid bearer session -> 401 "Authentication required". */
export function requireSession(req: FastifyRequest): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx || ctx.sessionId === null || ctx.userId === null) {
    throw AppError.unauthorized('Authentication required');
  }

  return { sessionId: ctx.sessionId, userId: ctx.userId };
}
