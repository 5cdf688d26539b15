/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Apply schema migrations (TS files in src/shared/db/migrations) with Kysely's Migrator.
 * - Runs under `tsx`, so dynamic imports of `.ts` migrations work.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 */

import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { readdir } from 'node:fs/promises';

import { Migrator, type Migration, type MigrationProvider } from 'kysely';
import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

function isMigration(mod: unknown): mod is Migration {
  return (
    typeof mod === 'object' &&
    mod !== null &&
    'up' in mod &&
    typeof mod.up === 'function'
  );
}

class TsFileMigrationProvider implements MigrationProvider {
  constructor(private readonly migrationsDir: string) {}

  async getMigrations(): Promise<Record<string, Migration>> {
    const files = (await readdir(this.migrationsDir)).filter((f) => f.endsWith('.ts')).sort();

    logger.info('migrations.found', { count: files.length, files });

    const migrations: Record<string, Migration> = {};

    for (const file of files) {
      const url = pathToFileURL(path.join(this.migrationsDir, file)).href;
      const mod: unknown = await import(url);

      if (!isMigration(mod)) {
        throw new Error(`Migration ${file} does not export an up() function`);
      }

      migrations[file.replace(/\.ts$/, '')] = mod;
    }

    return migrations;
  }
}

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  // Source folder on purpose: avoids any dist/path confusion.
  const migrationsDir = path.join(process.cwd(), 'src/shared/db/migrations');

  const migrator = new Migrator({ db, provider: new TsFileMigrationProvider(migrationsDir) });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migrations.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migrations.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('migrations.failed', { err: error });
    process.exit(1);
  }

  logger.info('migrations.up_to_date');
}

void runMigrations().catch((err: unknown) => {
  logger.error('migrations.fatal', { err });
  process.exit(1);
});
