/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: login errors never reveal whether an email exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  /** Login: unknown email, wrong password, or inactive account. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid email or password.', meta);
  },

  /** Registration: a user with this email already exists. */
  alreadyRegistered(meta?: AppErrorMeta) {
    return AppError.conflict('This email is already registered. Please sign in.', meta);
  },
} as const;
