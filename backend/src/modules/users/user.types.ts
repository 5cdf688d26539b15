/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - One email = one user. Emails are stored lowercase.
 *
 * RULES:
 * - Keep aligned with DB schema (shared/db/schema.ts).
 * - Avoid leaking DB naming (snake_case) outside DAL.
 * - The password hash only travels in UserCredentials (login path).
 */

export type UserId = number;

/** users.id is a Postgres `integer`; larger ids cannot exist. */
export const MAX_USER_ID = 2_147_483_647;

export type User = {
  id: UserId;
  email: string;
  isActive: boolean;
  isVerified: boolean;
  isSuperuser: boolean;
  createdAt: Date;
};

export type UserCredentials = User & {
  hashedPassword: string;
};

/** What the API returns for a user. */
export type PublicUser = {
  id: UserId;
  email: string;
  isActive: boolean;
  isVerified: boolean;
  isSuperuser: boolean;
};

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    email: user.email,
    isActive: user.isActive,
    isVerified: user.isVerified,
    isSuperuser: user.isSuperuser,
  };
}
