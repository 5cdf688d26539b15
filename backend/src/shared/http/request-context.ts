/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs, debugging and tracing.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 *
 * RULES:
 * - host can be null (missing/blank Host header).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
  host: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

export function parseHost(rawHost: unknown): string | null {
  if (typeof rawHost !== 'string') return null;

  const trimmed = rawHost.trim();
  if (!trimmed) return null;

  // strip port if present (e.g., "localhost:8000")
  return trimmed.split(':')[0]?.toLowerCase() ?? null;
}

export function registerRequestContext(app: FastifyInstance) {
  // Real value is assigned per request in the onRequest hook below.
  app.decorateRequest('requestContext', null as unknown as RequestContext);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.requestContext = {
      requestId: randomUUID(),
      host: parseHost(req.headers.host),
    };

    done();
  });
}
