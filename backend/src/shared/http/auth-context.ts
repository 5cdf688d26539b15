/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication state lives on the request, separate from route logic.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an anonymous context on every request.
 * 2. Bearer middleware overwrites it when a valid access token is presented.
 * 3. Controllers read it through requireSession().
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

export type AuthContext = {
  userId: number | null;
  sessionId: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null as unknown as AuthContext);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = {
      userId: null,
      sessionId: null,
    };

    done();
  });
}
