/**
 * backend/src/shared/http/form-body.ts
 *
 * WHY:
 * - The token endpoint takes an OAuth2-style form body (username/password).
 * - Fastify only parses JSON out of the box.
 *
 * RULES:
 * - Repeated keys keep the last value (same as URLSearchParams.get on the last write).
 */

import type { FastifyInstance } from 'fastify';

export function parseFormBody(raw: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of new URLSearchParams(raw)) {
    out[key] = value;
  }
  return out;
}

export function registerFormBodyParser(app: FastifyInstance): void {
  app.addContentTypeParser(
    'application/x-www-form-urlencoded',
    { parseAs: 'string' },
    (_req, body, done) => {
      done(null, parseFormBody(typeof body === 'string' ? body : body.toString('utf8')));
    },
  );
}
