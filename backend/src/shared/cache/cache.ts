/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Sessions, satellite recognition, the handoff single-use ledger and rate limits
 *   are short-lived security state that must be fast and externalized.
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * HOW TO USE:
 * - cache.get(key)
 * - cache.set(key, value, { ttlSeconds })
 * - cache.set(key, value, { keepTtl: true })  // do NOT refresh TTL
 * - cache.setIfAbsent(key, value, { ttlSeconds }) -> true only for the first writer
 * - cache.incr(key, { ttlSeconds }) -> counter with expiration
 */

export interface CacheSetOptions {
  ttlSeconds?: number;

  /**
   * Keep existing TTL when overwriting a key.
   *
   * Used by session revocation: mark the session revoked WITHOUT
   * extending its lifetime.
   *
   * Redis supports this via SET ... KEEPTTL.
   * InMemCache preserves the existing expiry timestamp.
   */
  keepTtl?: boolean;
}

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
  del(key: string): Promise<void>;

  /**
   * Atomically write `value` only if `key` does not exist (Redis SET NX).
   * Returns true for the single caller that created the key.
   */
  setIfAbsent(key: string, value: string, opts?: { ttlSeconds?: number }): Promise<boolean>;

  /**
   * Atomically increment a counter and (optionally) ensure it expires.
   * Returns the new value.
   */
  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number>;
}
