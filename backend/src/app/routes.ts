/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/ping)
 *   - module routes (auth, users, query history)
 *
 * RULES:
 * - No business logic here.
 * - Only wiring.
 */

import type { FastifyInstance } from 'fastify';

import type { AppDeps } from './di';

export function registerRoutes(app: FastifyInstance, opts: { deps: AppDeps }) {
  // Liveness
  app.get('/ping', () => {
    return { message: 'Server is running' };
  });

  // Module routes
  opts.deps.auth.registerRoutes(app);
  opts.deps.users.registerRoutes(app);
  opts.deps.queryHistory.registerRoutes(app);
}
