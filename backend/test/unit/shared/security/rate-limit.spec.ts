import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { RateLimiter, RateLimitError } from '../../../../src/shared/security/rate-limit';

describe('RateLimiter', () => {
  it('throws once the limit is exceeded', async () => {
    const limiter = new RateLimiter(new InMemCache(), { prefix: 'rl' });
    const input = { key: 'signin:ip:127.0.0.1', limit: 2, windowSeconds: 60 };

    await limiter.hitOrThrow(input);
    await limiter.hitOrThrow(input);

    await expect(limiter.hitOrThrow(input)).rejects.toBeInstanceOf(RateLimitError);
  });

  it('disabled limiter never throws', async () => {
    const limiter = new RateLimiter(new InMemCache(), { disabled: true });
    const input = { key: 'k', limit: 0, windowSeconds: 60 };

    await expect(limiter.hitOrThrow(input)).resolves.toBeUndefined();
  });
});
