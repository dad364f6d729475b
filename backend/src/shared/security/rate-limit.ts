/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Sign-in on the primary is the only place credentials are checked, so it is the
 *   place credential stuffing lands:
 *   - per email (hashed): 5 / 15min
 *   - per IP: 20 / 15min
 * - Uses Redis in prod, but depends only on Cache (DIP).
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: "rl" })
 * - await limiter.hitOrThrow({ key: "signin:ip:1.2.3.4", limit: 20, windowSeconds: 900 })
 *
 * ATOMICITY:
 * - INCR-then-check, not check-then-INCR. INCR is atomic in Redis, so two concurrent
 *   requests cannot both slip under the limit.
 *
 * DISABLING:
 * - Pass `disabled: true` in opts to skip all checks (used in tests via di.ts).
 * - Never check NODE_ENV here; that decision belongs to the composition root.
 */

import type { Cache } from '../cache/cache';

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly windowSeconds: number,
  ) {
    super('Rate limit exceeded');
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
   * Increments the counter for `key`.
   * Throws RateLimitError if the counter exceeds `limit`.
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
