/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them safely.
 * - Keeps modules testable: stores, cache and resolver can be swapped via overrides.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { SessionStore } from '../shared/session/session.store';

import { UserRepo } from '../modules/users';
import type { UserStore } from '../modules/users';
import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

import { QueryHistoryRepo, HttpCadastralResolver } from '../modules/query-history';
import type { CadastralResolver, QueryHistoryStore } from '../modules/query-history';
import { createQueryHistoryModule } from '../modules/query-history/query-history.module';
import type { QueryHistoryModule } from '../modules/query-history/query-history.module';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

/** Test seams. Anything left out is built from config. */
export type DepsOverrides = {
  cache?: Cache;
  userStore?: UserStore;
  queryHistoryStore?: QueryHistoryStore;
  resolver?: CadastralResolver;
  passwordHasher?: PasswordHasher;
};

export type AppDeps = {
  db: Db;
  cache: Cache;

  logger: Logger;

  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;

  sessionStore: SessionStore;

  // modules
  users: UserModule;
  queryHistory: QueryHistoryModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  // pg Pool connects lazily: no connection is opened until the first query.
  const db = createDb(config.databaseUrl);

  // Redis is mandatory (dev + prod) unless a cache is injected
  let redis: RedisCache | null = null;
  let cache: Cache;
  if (overrides.cache) {
    cache = overrides.cache;
  } else {
    redis = await RedisCache.connect(config.redisUrl);
    cache = redis;
  }

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher =
    overrides.passwordHasher ?? new BcryptPasswordHasher({ cost: config.bcryptCost });

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  const sessionStore = new SessionStore(cache, tokenHasher, config.accessTokenTtlSeconds);

  // stores + outbound clients
  const userStore = overrides.userStore ?? new UserRepo(db);
  const queryHistoryStore = overrides.queryHistoryStore ?? new QueryHistoryRepo(db);
  const resolver =
    overrides.resolver ??
    new HttpCadastralResolver({
      baseUrl: config.resolver.baseUrl,
      timeoutMs: config.resolver.timeoutMs,
      logger,
    });

  // modules (no HTTP / no business logic here)
  const queryHistory = createQueryHistoryModule({
    store: queryHistoryStore,
    resolver,
    logger,
    resolverStub: config.resolverStub.enabled
      ? {
          minDelaySeconds: config.resolverStub.minDelaySeconds,
          maxDelaySeconds: config.resolverStub.maxDelaySeconds,
        }
      : null,
  });

  const users = createUserModule({
    userStore,
    queryHistoryStore,
    sessionStore,
    logger,
  });

  const auth = createAuthModule({
    userStore,
    tokenHasher,
    passwordHasher,
    logger,
    rateLimiter,
    sessionStore,
  });

  return {
    db,
    cache,
    logger,
    rateLimiter,
    tokenHasher,
    passwordHasher,
    sessionStore,
    users,
    queryHistory,
    auth,
    close: async () => {
      if (redis) await redis.close();
      await db.destroy();
    },
  };
}
