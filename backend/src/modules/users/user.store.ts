/**
 * backend/src/modules/users/user.store.ts
 *
 * WHY:
 * - Services depend on this interface, not on Kysely (DIP).
 * - Postgres implementation: dal/user.repo.ts. Tests use an in-memory implementation.
 *
 * RULES:
 * - Lookups by email are case-insensitive (implementations lowercase the input).
 * - insertUser throws UniqueViolationError when the email is taken.
 */

import type { User, UserCredentials, UserId } from './user.types';

export type NewUser = {
  email: string;
  hashedPassword: string;
  isSuperuser?: boolean;
  isVerified?: boolean;
};

export interface UserStore {
  findById(userId: UserId): Promise<User | undefined>;
  findByEmail(email: string): Promise<User | undefined>;
  findCredentialsByEmail(email: string): Promise<UserCredentials | undefined>;
  insertUser(params: NewUser): Promise<User>;
}
