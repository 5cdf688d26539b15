/**
 * backend/src/modules/query-history/query-history.store.ts
 *
 * WHY:
 * - The History Store contract. Services depend on it, not on Kysely (DIP).
 * - Postgres implementation: dal/query-history.repo.ts. Tests use an in-memory one.
 *
 * RULES:
 * - Rows are append-only. No update operation exists.
 * - insert() assigns id + createdAt and returns the stored record.
 * - insert() throws UniqueViolationError when a uniqueness rule rejects the row.
 * - listForUser() is ALWAYS user-scoped and ordered by createdAt DESC.
 */

import type { NewQueryHistoryRecord, QueryHistoryRecord } from './query-history.types';

export type HistoryPageQuery = {
  userId: number;
  cadastralNumber?: string;
  limit: number;
  offset: number;
};

export interface QueryHistoryStore {
  insert(record: NewQueryHistoryRecord): Promise<QueryHistoryRecord>;

  listForUser(query: HistoryPageQuery): Promise<QueryHistoryRecord[]>;

  /**
   * Deletes the user's history rows, then the user, in one transaction.
   * Returns false when the user did not exist.
   */
  deleteUserCascade(userId: number): Promise<boolean>;

  /** Creates (true) or drops (false) the unique index on (latitude, longitude). */
  setCoordinateUniqueness(enforced: boolean): Promise<void>;
}
