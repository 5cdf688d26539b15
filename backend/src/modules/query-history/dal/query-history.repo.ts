/**
 * backend/src/modules/query-history/dal/query-history.repo.ts
 *
 * WHY:
 * - Postgres-backed History Store (Kysely).
 *
 * RULES:
 * - Each write runs in its own transaction (insert … returning reloads id/created_at).
 * - Unique violations surface as UniqueViolationError (constraint name kept).
 * - NUMERIC columns arrive as strings from `pg`; converted to numbers here.
 */

import type { Db } from '../../../shared/db/db';
import { translateUniqueViolation } from '../../../shared/db/unique-violation';
import { COORDINATES_UNIQUE_CONSTRAINT } from '../query-history.errors';
import type { HistoryPageQuery, QueryHistoryStore } from '../query-history.store';
import type { NewQueryHistoryRecord, QueryHistoryRecord } from '../query-history.types';
import { selectHistoryPageSql } from './query-history.query-sql';
import type { QueryHistoryRow } from './query-history.query-sql';

function toNumberOrNull(value: string | null): number | null {
  return value === null ? null : Number(value);
}

function toRecord(row: QueryHistoryRow): QueryHistoryRecord {
  return {
    id: row.id,
    cadastralNumber: row.cadastral_number,
    latitude: toNumberOrNull(row.latitude),
    longitude: toNumberOrNull(row.longitude),
    result: row.result,
    createdAt: row.created_at,
  };
}

export class QueryHistoryRepo implements QueryHistoryStore {
  // Opens its own transactions, so it takes the root Db, never a trx.
  constructor(private readonly db: Db) {}

  async insert(record: NewQueryHistoryRecord): Promise<QueryHistoryRecord> {
    const row = await translateUniqueViolation(() =>
      this.db.transaction().execute((trx) =>
        trx
          .insertInto('query_history')
          .values({
            user_id: record.userId,
            cadastral_number: record.cadastralNumber,
            latitude: record.latitude,
            longitude: record.longitude,
            result: record.result,
          })
          .returningAll()
          .executeTakeFirstOrThrow(),
      ),
    );

    return toRecord(row);
  }

  async listForUser(query: HistoryPageQuery): Promise<QueryHistoryRecord[]> {
    const rows = await selectHistoryPageSql(this.db, query);
    return rows.map(toRecord);
  }

  async deleteUserCascade(userId: number): Promise<boolean> {
    return this.db.transaction().execute(async (trx) => {
      await trx.deleteFrom('query_history').where('user_id', '=', userId).execute();

      const deleted = await trx
        .deleteFrom('users')
        .where('id', '=', userId)
        .returning('id')
        .executeTakeFirst();

      return deleted !== undefined;
    });
  }

  async setCoordinateUniqueness(enforced: boolean): Promise<void> {
    if (enforced) {
      await this.db.schema
        .createIndex(COORDINATES_UNIQUE_CONSTRAINT)
        .ifNotExists()
        .unique()
        .on('query_history')
        .columns(['latitude', 'longitude'])
        .execute();
      return;
    }

    await this.db.schema.dropIndex(COORDINATES_UNIQUE_CONSTRAINT).ifExists().execute();
  }
}
