/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs a `DB` interface describing every table it queries.
 * - The schema is declared here explicitly and kept in lockstep with migrations/.
 *
 * COLUMN TYPES:
 * - ColumnType<Select, Insert, Update>.
 * - `never` on insert/update = the column is owned by the database (defaults) or immutable.
 * - NUMERIC columns come back from `pg` as strings; queries convert them to numbers.
 *
 * RULES:
 * - Snake_case here only. Domain types (camelCase) live in each module's *.types.ts.
 */

import type { ColumnType, Generated } from 'kysely';

export type CreatedAt = ColumnType<Date, never, never>;

export interface UsersTable {
  id: Generated<number>;
  email: string;
  hashed_password: string;
  is_active: Generated<boolean>;
  is_verified: Generated<boolean>;
  is_superuser: Generated<boolean>;
  created_at: CreatedAt;
}

/**
 * History rows are append-only: nothing is updatable.
 */
export interface QueryHistoryTable {
  id: ColumnType<number, never, never>;
  cadastral_number: ColumnType<string, string, never>;
  latitude: ColumnType<string | null, number | null, never>;
  longitude: ColumnType<string | null, number | null, never>;
  result: ColumnType<boolean, boolean | undefined, never>;
  user_id: ColumnType<number, number, never>;
  created_at: CreatedAt;
}

export interface DB {
  users: UsersTable;
  query_history: QueryHistoryTable;
}
