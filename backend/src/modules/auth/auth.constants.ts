/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

export const AUTH_RATE_LIMITS = {
  login: {
    perEmail: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 20, windowSeconds: 900 },
  },
  register: {
    perEmail: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 20, windowSeconds: 900 },
  },
} as const;

export const TOKEN_TYPE = 'bearer';
