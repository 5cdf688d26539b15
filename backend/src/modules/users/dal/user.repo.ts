/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - Postgres-backed UserStore.
 * - Shapes snake_case rows into User domain types.
 *
 * RULES:
 * - No transactions started here (the History Store owns the delete-user cascade).
 * - No AppError. Unique violations surface as UniqueViolationError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { translateUniqueViolation } from '../../../shared/db/unique-violation';
import type { NewUser, UserStore } from '../user.store';
import type { User, UserCredentials, UserId } from '../user.types';
import { selectUserByEmailSql, selectUserByIdSql } from './user.query-sql';
import type { UserRow } from './user.query-sql';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    isActive: row.is_active,
    isVerified: row.is_verified,
    isSuperuser: row.is_superuser,
    createdAt: row.created_at,
  };
}

export class UserRepo implements UserStore {
  constructor(private readonly db: DbExecutor) {}

  async findById(userId: UserId): Promise<User | undefined> {
    const row = await selectUserByIdSql(this.db, userId);
    return row ? toUser(row) : undefined;
  }

  async findByEmail(email: string): Promise<User | undefined> {
    const row = await selectUserByEmailSql(this.db, email);
    return row ? toUser(row) : undefined;
  }

  async findCredentialsByEmail(email: string): Promise<UserCredentials | undefined> {
    const row = await selectUserByEmailSql(this.db, email);
    if (!row) return undefined;
    return { ...toUser(row), hashedPassword: row.hashed_password };
  }

  /**
   * Creates a new user. Email must be globally unique (enforced by DB constraint).
   */
  async insertUser(params: NewUser): Promise<User> {
    const row = await translateUniqueViolation(() =>
      this.db
        .insertInto('users')
        .values({
          email: params.email.toLowerCase(),
          hashed_password: params.hashedPassword,
          is_superuser: params.isSuperuser ?? false,
          is_verified: params.isVerified ?? false,
        })
        .returningAll()
        .executeTakeFirstOrThrow(),
    );

    return toUser(row);
  }
}
