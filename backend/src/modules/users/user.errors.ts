/**
 * backend/src/modules/users/user.errors.ts
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  notFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found', meta);
  },

  superuserRequired(meta?: AppErrorMeta) {
    return AppError.forbidden('Superuser privileges required', meta);
  },

  /** Session outlived its user (deleted between requests). */
  sessionUserMissing(meta?: AppErrorMeta) {
    return AppError.unauthorized('Authentication required', meta);
  },
} as const;
