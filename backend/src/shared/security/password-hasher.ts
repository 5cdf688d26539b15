/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - AuthService, the dev seed and the tests hash passwords through this port.
 * - Stored value goes to users.hashed_password as-is.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
