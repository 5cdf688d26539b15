/**
 * backend/src/modules/query-history/query-history.module.ts
 *
 * WHY:
 * - Encapsulates Query History wiring: service, controller, routes,
 *   and the optional /result resolver stub.
 *
 * RULES:
 * - No infra creation here (DI passes store + resolver in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';

import type { CadastralResolver } from './resolver/cadastral-resolver';
import { registerResolverStubRoutes } from './resolver/resolver-stub.routes';
import type { ResolverStubOptions } from './resolver/resolver-stub.routes';
import type { QueryHistoryStore } from './query-history.store';
import { QueryHistoryService } from './query-history.service';
import { QueryHistoryController } from './query-history.controller';
import { registerQueryHistoryRoutes } from './query-history.routes';

export type QueryHistoryModule = ReturnType<typeof createQueryHistoryModule>;

export function createQueryHistoryModule(deps: {
  store: QueryHistoryStore;
  resolver: CadastralResolver;
  logger: Logger;
  /** null = /result stub not registered */
  resolverStub: ResolverStubOptions | null;
}) {
  const queryHistoryService = new QueryHistoryService({
    store: deps.store,
    resolver: deps.resolver,
    logger: deps.logger,
  });

  const controller = new QueryHistoryController(queryHistoryService);

  return {
    store: deps.store,
    queryHistoryService,
    registerRoutes(app: FastifyInstance) {
      registerQueryHistoryRoutes(app, controller);

      if (deps.resolverStub) {
        registerResolverStubRoutes(app, deps.resolverStub);
      }
    },
  };
}
