/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { Logger } from '../../shared/logger/logger';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { SessionStore } from '../../shared/session/session.store';
import type { UserStore } from '../users';

import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  userStore: UserStore;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;
  logger: Logger;
  rateLimiter: RateLimiter;
  sessionStore: SessionStore;
}) {
  const authService = new AuthService({
    userStore: deps.userStore,
    tokenHasher: deps.tokenHasher,
    passwordHasher: deps.passwordHasher,
    logger: deps.logger,
    rateLimiter: deps.rateLimiter,
    sessionStore: deps.sessionStore,
  });

  const controller = new AuthController(authService);

  return {
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
