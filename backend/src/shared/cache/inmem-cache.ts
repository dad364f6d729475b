/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests (and local dev if Redis is down) to run without external infra.
 * - Used primarily for unit/service tests.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 *
 * ATOMICITY:
 * - Every method completes synchronously before resolving, so setIfAbsent
 *   has the same first-writer-wins semantics as Redis SET NX.
 */

import type { Cache, CacheSetOptions } from './cache';

type StringEntry = { value: string; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly store = new Map<string, StringEntry>();

  private now(): number {
    return Date.now();
  }

  private getEntry(key: string): StringEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  private expiryFor(ttlSeconds: number | undefined): number | null {
    return ttlSeconds ? this.now() + ttlSeconds * 1000 : null;
  }

  get(key: string): Promise<string | null> {
    const entry = this.getEntry(key);
    return Promise.resolve(entry ? entry.value : null);
  }

  set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    const existing = this.getEntry(key);

    const expiresAtMs =
      opts?.keepTtl && existing ? existing.expiresAtMs : this.expiryFor(opts?.ttlSeconds);

    this.store.set(key, { value, expiresAtMs });
    return Promise.resolve();
  }

  setIfAbsent(key: string, value: string, opts?: { ttlSeconds?: number }): Promise<boolean> {
    if (this.getEntry(key)) return Promise.resolve(false);

    this.store.set(key, { value, expiresAtMs: this.expiryFor(opts?.ttlSeconds) });
    return Promise.resolve(true);
  }

  del(key: string): Promise<void> {
    this.store.delete(key);
    return Promise.resolve();
  }

  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const entry = this.getEntry(key);
    const next = entry ? Number(entry.value) + 1 : 1;

    // Like the Redis implementation: the window starts at the first hit.
    const expiresAtMs = entry?.expiresAtMs ?? this.expiryFor(opts?.ttlSeconds);

    this.store.set(key, { value: String(next), expiresAtMs });

    return Promise.resolve(next);
  }
}
