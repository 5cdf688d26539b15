/**
 * backend/src/shared/security/token.ts
 *
 * HOW TO USE:
 * - const token = generateSecureToken()   // 32 random bytes, URL-safe base64
 * - Hand the raw token to the client, key server-side state by its hash.
 */

import { randomBytes } from 'node:crypto';

export function generateSecureToken(bytes: number = 32): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}
