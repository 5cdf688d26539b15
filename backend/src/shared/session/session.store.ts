/**
 * src/shared/session/session.store.ts
 *
 * WHY:
 * - Bearer access tokens are opaque random strings backed by server-side sessions.
 * - Sessions are instantly revocable (logout, user deletion). No JWT revocation lists.
 * - TTL enforced by the cache (no expired session can be read).
 * - Only the SHA-256 of the token is used as a key; a cache dump does not leak usable tokens.
 *
 * USER-SESSION INDEX:
 * - create(): SADD session:user:{userId} {tokenHash} with TTL refresh.
 * - destroy(): SREM from the index, then DEL the session.
 * - destroyAllForUser(): SMEMBERS → DEL each → DEL the index.
 *
 * RULES:
 * - Depends only on Cache + TokenHasher interfaces. Redis in prod, InMemCache in tests.
 * - No HTTP concerns here (header parsing lives in the bearer middleware).
 */

import type { Cache } from '../cache/cache';
import type { TokenHasher } from '../security/token-hasher';
import { generateSecureToken } from '../security/token';
import { SessionDataSchema, SESSION_KEY_PREFIX, SESSION_USER_INDEX_PREFIX } from './session.types';
import type { SessionData } from './session.types';

export class SessionStore {
  constructor(
    private readonly cache: Cache,
    private readonly tokenHasher: TokenHasher,
    private readonly ttlSeconds: number,
  ) {}

  get lifetimeSeconds(): number {
    return this.ttlSeconds;
  }

  private key(tokenHash: string): string {
    return `${SESSION_KEY_PREFIX}:${tokenHash}`;
  }

  private userIndexKey(userId: number): string {
    return `${SESSION_USER_INDEX_PREFIX}:${userId}`;
  }

  /**
   * Creates a session and returns the RAW access token (shown to the client once).
   */
  async create(userId: number, now: Date = new Date()): Promise<string> {
    const accessToken = generateSecureToken();
    const tokenHash = this.tokenHasher.hash(accessToken);

    const data: SessionData = { userId, createdAt: now.toISOString() };

    await this.cache.set(this.key(tokenHash), JSON.stringify(data), {
      ttlSeconds: this.ttlSeconds,
    });
    await this.cache.sadd(this.userIndexKey(userId), tokenHash, {
      ttlSeconds: this.ttlSeconds,
    });

    return accessToken;
  }

  /**
   * Loads session data for a raw access token. Null if expired, unknown or corrupted.
   */
  async get(accessToken: string): Promise<SessionData | null> {
    const tokenHash = this.tokenHasher.hash(accessToken);
    const raw = await this.cache.get(this.key(tokenHash));
    if (!raw) return null;

    const parsed = SessionDataSchema.safeParse(safeJsonParse(raw));
    if (!parsed.success) {
      // Corrupted session: treat as missing
      await this.cache.del(this.key(tokenHash));
      return null;
    }

    return parsed.data;
  }

  async destroy(accessToken: string): Promise<void> {
    const tokenHash = this.tokenHasher.hash(accessToken);
    const session = await this.get(accessToken);

    if (session) {
      await this.cache.srem(this.userIndexKey(session.userId), tokenHash);
    }

    await this.cache.del(this.key(tokenHash));
  }

  /**
   * Revokes every access token issued to the user.
   * Stale hashes (already expired sessions) are harmless: DEL on a missing key is a no-op.
   */
  async destroyAllForUser(userId: number): Promise<void> {
    const indexKey = this.userIndexKey(userId);
    const tokenHashes = await this.cache.smembers(indexKey);

    await Promise.all(tokenHashes.map((hash) => this.cache.del(this.key(hash))));
    await this.cache.del(indexKey);
  }
}

function safeJsonParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}
