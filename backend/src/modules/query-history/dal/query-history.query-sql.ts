/**
 * backend/src/modules/query-history/dal/query-history.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for query history.
 *
 * RULES:
 * - Every read is scoped by user_id.
 * - No AppError.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { QueryHistoryTable } from '../../../shared/db/schema';
import type { HistoryPageQuery } from '../query-history.store';

export type QueryHistoryRow = Selectable<QueryHistoryTable>;

export function buildHistoryPageQuery(db: DbExecutor, query: HistoryPageQuery) {
  let q = db.selectFrom('query_history').selectAll().where('user_id', '=', query.userId);

  if (query.cadastralNumber !== undefined) {
    q = q.where('cadastral_number', '=', query.cadastralNumber);
  }

  return q
    .orderBy('created_at', 'desc')
    .orderBy('id', 'desc')
    .limit(query.limit)
    .offset(query.offset);
}

export async function selectHistoryPageSql(
  db: DbExecutor,
  query: HistoryPageQuery,
): Promise<QueryHistoryRow[]> {
  return buildHistoryPageQuery(db, query).execute();
}
