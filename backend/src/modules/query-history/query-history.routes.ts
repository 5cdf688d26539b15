/**
 * backend/src/modules/query-history/query-history.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { QueryHistoryController } from './query-history.controller';

export function registerQueryHistoryRoutes(app: FastifyInstance, controller: QueryHistoryController) {
  app.post('/query', controller.submit.bind(controller));
  app.get('/history', controller.list.bind(controller));
}
