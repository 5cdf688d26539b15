/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> storage setup -> server -> routes -> dev seed
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps } from './di';
import type { DepsOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runDevSeed } from '../shared/db/seed/dev-seed';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, overrides: DepsOverrides = {}) {
  const deps = await buildDeps(config, overrides);

  await deps.queryHistory.store.setCoordinateUniqueness(config.enforceUniqueCoordinates);
  logger.info('storage.coordinate_uniqueness', {
    flow: 'startup',
    enforced: config.enforceUniqueCoordinates,
  });

  const app = await buildServer({ config, deps });

  registerRoutes(app, { deps });

  // DEV-only seed bootstrap
  if (config.seed.enabled) {
    const flow = 'seed.dev';

    if (config.nodeEnv === 'production') {
      logger.warn('seed.skipped_in_production', { flow });
    } else {
      logger.info('seed.start', { flow });

      await runDevSeed({
        userStore: deps.users.userStore,
        passwordHasher: deps.passwordHasher,
        options: {
          superuserEmail: config.seed.superuserEmail,
          superuserPassword: config.seed.superuserPassword,
        },
      });

      logger.info('seed.done', { flow });
    }
  }

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
