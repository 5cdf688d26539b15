/**
 * backend/src/shared/security/sha256-token-hasher.ts
 *
 * SHA-256 (hex) TokenHasher. Keys session entries and the per-email
 * login rate-limit buckets, so raw tokens and emails never reach Redis.
 */

import { createHash } from 'node:crypto';
import type { TokenHasher } from './token-hasher';

export class Sha256TokenHasher implements TokenHasher {
  hash(rawToken: string): string {
    return createHash('sha256').update(rawToken).digest('hex');
  }
}
