/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - Exposes the UserStore so auth can register/login against it.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { SessionStore } from '../../shared/session/session.store';
import type { QueryHistoryStore } from '../query-history';

import type { UserStore } from './user.store';
import { UserService } from './user.service';
import { UserController } from './user.controller';
import { registerUserRoutes } from './user.routes';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  userStore: UserStore;
  queryHistoryStore: QueryHistoryStore;
  sessionStore: SessionStore;
  logger: Logger;
}) {
  const userService = new UserService({
    userStore: deps.userStore,
    queryHistoryStore: deps.queryHistoryStore,
    sessionStore: deps.sessionStore,
    logger: deps.logger,
  });

  const controller = new UserController(userService);

  return {
    userStore: deps.userStore,
    userService,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller);
    },
  };
}
