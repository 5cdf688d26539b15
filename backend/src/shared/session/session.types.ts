/**
 * src/shared/session/session.types.ts
 *
 * WHY:
 * - Server-side data behind an opaque bearer access token.
 * - Stored in Redis (via Cache) as JSON with a TTL, keyed by the SHA-256 of the token.
 *
 * RULES:
 * - Session data must be JSON-serializable.
 * - Never store passwords or raw tokens in session data.
 */

import { z } from 'zod';

export const SessionDataSchema = z.object({
  userId: z.number().int().positive(),
  createdAt: z.string(), // ISO string (JSON-safe)
});

export type SessionData = z.infer<typeof SessionDataSchema>;

/** Full key: `session:{tokenHash}`. */
export const SESSION_KEY_PREFIX = 'session';

/**
 * Full key: `session:user:{userId}`: a SET of token hashes for the user.
 * Used by destroyAllForUser() when the account is deleted.
 */
export const SESSION_USER_INDEX_PREFIX = 'session:user';
