/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * PasswordHasher backed by bcrypt.
 * Cost comes from BCRYPT_COST (config.bcryptCost); tests run at 4.
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? 12;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }
}
