/**
 * backend/src/shared/session/bearer-auth.middleware.ts
 *
 * WHY:
 * - Reads `Authorization: Bearer <token>` on every request.
 * - If a live session exists, populates req.authContext (userId, sessionId).
 * - Does NOT throw. Endpoints decide if auth is required (requireSession).
 *
 * RULES:
 * - Runs AFTER the authContext hook (needs it to exist).
 * - Scheme match is case-insensitive ("bearer" works too).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { SessionStore } from './session.store';

export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;

  const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
  return match?.[1] ?? null;
}

export function registerBearerAuth(app: FastifyInstance, sessionStore: SessionStore): void {
  app.addHook('onRequest', async (req: FastifyRequest) => {
    const accessToken = extractBearerToken(req.headers.authorization);
    if (!accessToken) return;

    const session = await sessionStore.get(accessToken);
    if (!session) return;

    req.authContext = {
      userId: session.userId,
      sessionId: accessToken,
    };
  });
}
