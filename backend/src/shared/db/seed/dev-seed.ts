/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates:
 * - a superuser (if missing), verified, so /users/:id can be tried locally.
 *
 * Idempotent: safe to run on every start.
 *
 * IMPORTANT:
 * - The password is hashed before storage and never logged.
 */

import type { UserStore } from '../../../modules/users';
import type { PasswordHasher } from '../../security/password-hasher';
import { logger } from '../../logger/logger';

type DevSeedOptions = {
  superuserEmail: string;
  superuserPassword: string;
};

export async function runDevSeed(opts: {
  userStore: UserStore;
  passwordHasher: PasswordHasher;
  options: DevSeedOptions;
}): Promise<void> {
  const { userStore, passwordHasher, options } = opts;

  const flow = 'seed.dev';
  const email = options.superuserEmail.toLowerCase();

  const existing = await userStore.findByEmail(email);
  if (existing) {
    logger.info('seed.superuser.exists', {
      flow,
      userId: existing.id,
      email,
      isSuperuser: existing.isSuperuser,
    });
    return;
  }

  const created = await userStore.insertUser({
    email,
    hashedPassword: await passwordHasher.hash(options.superuserPassword),
    isSuperuser: true,
    isVerified: true,
  });

  logger.info('seed.superuser.created', {
    flow,
    userId: created.id,
    email,
  });
}
