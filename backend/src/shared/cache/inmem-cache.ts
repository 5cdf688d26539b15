/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Lets tests (and local dev without Redis) run without external infra.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - new InMemCache(() => fakeNowMs) to control expiry in tests.
 */

import type { Cache, CacheSetOptions } from './cache';

type Entry<T> = { value: T; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly strings = new Map<string, Entry<string>>();
  private readonly sets = new Map<string, Entry<Set<string>>>();

  constructor(private readonly now: () => number = Date.now) {}

  private expiryFor(ttlSeconds: number | undefined, fallback: number | null): number | null {
    return ttlSeconds ? this.now() + ttlSeconds * 1000 : fallback;
  }

  private live<T>(map: Map<string, Entry<T>>, key: string): Entry<T> | null {
    const entry = map.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      map.delete(key);
      return null;
    }

    return entry;
  }

  get(key: string): Promise<string | null> {
    return Promise.resolve(this.live(this.strings, key)?.value ?? null);
  }

  set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    this.strings.set(key, { value, expiresAtMs: this.expiryFor(opts?.ttlSeconds, null) });
    return Promise.resolve();
  }

  del(key: string): Promise<void> {
    this.strings.delete(key);
    this.sets.delete(key);
    return Promise.resolve();
  }

  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const entry = this.live(this.strings, key);
    const next = entry ? Number(entry.value) + 1 : 1;

    // Like INCR + EXPIRE-if-missing: the first hit starts the window.
    const expiresAtMs = entry ? entry.expiresAtMs : this.expiryFor(opts?.ttlSeconds, null);
    this.strings.set(key, { value: String(next), expiresAtMs });

    return Promise.resolve(next);
  }

  sadd(key: string, member: string, opts?: { ttlSeconds?: number }): Promise<void> {
    const entry = this.live(this.sets, key);
    const members = entry?.value ?? new Set<string>();
    members.add(member);

    this.sets.set(key, {
      value: members,
      expiresAtMs: this.expiryFor(opts?.ttlSeconds, entry?.expiresAtMs ?? null),
    });

    return Promise.resolve();
  }

  smembers(key: string): Promise<string[]> {
    const entry = this.live(this.sets, key);
    return Promise.resolve(entry ? Array.from(entry.value) : []);
  }

  srem(key: string, member: string): Promise<void> {
    this.live(this.sets, key)?.value.delete(member);
    return Promise.resolve();
  }
}
