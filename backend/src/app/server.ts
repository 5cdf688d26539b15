/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest):
 * 1. request context (requestId, host)
 * 2. anonymous auth context
 * 3. bearer auth (fills auth context from a live session)
 * 4. request log line (now includes userId)
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerFormBodyParser } from '../shared/http/form-body';
import { registerBearerAuth } from '../shared/session/bearer-auth.middleware';
import { withRequestContext } from '../shared/logger/with-context';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  registerRequestContext(app);
  registerAuthContext(app);
  registerBearerAuth(app, opts.deps.sessionStore);

  registerFormBodyParser(app);
  registerErrorHandler(app);

  app.addHook('onRequest', (req, _reply, done) => {
    withRequestContext(req).info('request', {
      method: req.method,
      url: req.url,
      env: opts.config.nodeEnv,
    });
    done();
  });

  return app;
}
