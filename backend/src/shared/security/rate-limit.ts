/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Throttles credential guessing on the token endpoint (per email + per IP).
 * - Uses Redis in prod, but depends only on Cache (DIP).
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: "rl" })
 * - await limiter.hitOrThrow({ key: "login:ip:1.2.3.4", limit: 20, windowSeconds: 900 })
 *
 * ATOMICITY:
 * - INCR-then-check, not check-then-INCR. INCR is atomic in Redis, so two concurrent
 *   requests cannot both slip under the limit.
 *
 * DISABLING:
 * - Pass `disabled: true` to skip all checks (decided by the composition root, di.ts).
 */

import type { Cache } from '../cache/cache';

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly windowSeconds: number,
  ) {
    super('Rate limit exceeded');
    this.name = 'RateLimitError';
  }
}

export class RateLimiter {
  constructor(
    private readonly cache: Cache,
    private readonly opts?: { prefix?: string; disabled?: boolean },
  ) {}

  private buildKey(key: string): string {
    return this.opts?.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  /**
   * Increments the counter for `key`; throws RateLimitError once it exceeds `limit`.
   */
  async hitOrThrow(input: { key: string; limit: number; windowSeconds: number }): Promise<void> {
    if (this.opts?.disabled) return;

    const fullKey = this.buildKey(input.key);
    const current = await this.cache.incr(fullKey, { ttlSeconds: input.windowSeconds });

    if (current > input.limit) {
      throw new RateLimitError(fullKey, input.limit, input.windowSeconds);
    }
  }
}
