/**
 * backend/src/modules/users/user.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { UserController } from './user.controller';

export function registerUserRoutes(app: FastifyInstance, controller: UserController) {
  app.get('/users/me', controller.me.bind(controller));
  app.get('/users/:id', controller.getById.bind(controller));
  app.delete('/users/:id', controller.deleteById.bind(controller));
}
