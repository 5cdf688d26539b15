/**
 * src/shared/db/migrations/0002_query_history.ts
 *
 * WHY:
 * - One row per submitted cadastral query, owned by a user.
 * - Storage-level coordinate ranges are INCLUSIVE; the request schema narrows them to
 *   open intervals before anything reaches the DB.
 * - Deleting a user removes their history (FK cascade). The delete-user path in the
 *   history repo also deletes rows explicitly, so both layers agree.
 *
 * NOTE:
 * - The optional (latitude, longitude) unique index is NOT created here.
 *   It is toggled at startup by ENFORCE_UNIQUE_COORDINATES
 *   (QueryHistoryRepo.setCoordinateUniqueness, called from app/build-app.ts).
 */

import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('query_history')
    .addColumn('id', 'integer', (col) => col.primaryKey().generatedAlwaysAsIdentity())
    .addColumn('cadastral_number', 'varchar(25)', (col) => col.notNull())
    .addColumn('latitude', sql`numeric(8, 6)`)
    .addColumn('longitude', sql`numeric(9, 6)`)
    .addColumn('result', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('user_id', 'integer', (col) =>
      col.notNull().references('users.id').onDelete('cascade'),
    )
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addCheckConstraint('latitude_range', sql`-90 <= latitude AND latitude <= 90`)
    .addCheckConstraint('longitude_range', sql`-180 <= longitude AND longitude <= 180`)
    .execute();

  await db.schema
    .createIndex('query_history_cadastral_number_idx')
    .on('query_history')
    .column('cadastral_number')
    .execute();

  // History listing: WHERE user_id = ? ORDER BY created_at DESC
  await db.schema
    .createIndex('query_history_user_created_at_idx')
    .on('query_history')
    .columns(['user_id', 'created_at desc'])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('query_history').ifExists().execute();
}
