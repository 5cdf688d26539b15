/**
 * backend/src/shared/db/make-migration.ts
 *
 * WHY:
 * - One command to scaffold the next numbered migration (0001, 0002, ...).
 *
 * HOW TO USE:
 * - npm run db:make --workspace backend -- add_history_source
 *   -> src/shared/db/migrations/0003_add_history_source.ts
 */

import fs from 'node:fs';
import path from 'node:path';

import { logger } from '../logger/logger';

function normalizeMigrationName(input: string): string {
  // "Add History Source" -> "add_history_source"
  return input
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '_')
    .replace(/[^a-z0-9_]/g, '');
}

function getNextMigrationNumber(existingFiles: string[]): string {
  const numbers = existingFiles
    .map((file) => file.match(/^(\d{4})_/))
    .filter((m): m is RegExpMatchArray => Boolean(m))
    .map((m) => Number(m[1]));

  const max = numbers.length ? Math.max(...numbers) : 0;
  return String(max + 1).padStart(4, '0');
}

function buildMigrationFileContents(fileName: string): string {
  return `/**
 * src/shared/db/migrations/${fileName}
 */

import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  void db;
}

export async function down(db: Kysely<unknown>): Promise<void> {
  void db;
}
`;
}

function main(): void {
  const rawName = process.argv[2];

  if (!rawName) {
    logger.error('migrations.make.missing_name', {
      example: 'npm run db:make --workspace backend -- add_history_source',
    });
    process.exit(1);
  }

  // The package script runs from backend/, so process.cwd() is backend/.
  const migrationsDir = path.join(process.cwd(), 'src/shared/db/migrations');
  fs.mkdirSync(migrationsDir, { recursive: true });

  const nextNumber = getNextMigrationNumber(fs.readdirSync(migrationsDir));
  const fileName = `${nextNumber}_${normalizeMigrationName(rawName)}.ts`;
  const fullPath = path.join(migrationsDir, fileName);

  if (fs.existsSync(fullPath)) {
    logger.error('migrations.make.exists', { fileName });
    process.exit(1);
  }

  fs.writeFileSync(fullPath, buildMigrationFileContents(fileName), 'utf8');
  logger.info('migrations.make.created', { path: fullPath });
}

main();
