/**
 * src/shared/session/session.store.ts
 *
 * WHY:
 * - Server-side session management for the PRIMARY instance via Redis (through Cache).
 * - Sessions are instantly revocable; TTL is enforced at the cache level.
 *
 * RULES:
 * - Only the primary instance constructs this store.
 * - Depends only on Cache interface (DIP). Works with Redis in prod, InMemCache in tests.
 * - No HTTP concerns here (cookie handling lives in middleware / controllers).
 */

import type { Cache } from '../cache/cache';
import { generateSecureToken } from '../security/token';
import { SESSION_KEY_PREFIX, SessionSchema } from './session.types';
import type { Session } from './session.types';

export class SessionStore {
  constructor(
    private readonly cache: Cache,
    private readonly ttlSeconds: number,
    private readonly now: () => Date = () => new Date(),
  ) {}

  private key(sessionId: string): string {
    return `${SESSION_KEY_PREFIX}:${sessionId}`;
  }

  private async read(sessionId: string): Promise<Session | null> {
    const raw = await this.cache.get(this.key(sessionId));
    if (!raw) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      json = null;
    }

    const parsed = SessionSchema.safeParse(json);
    if (!parsed.success) {
      // Corrupted session: treat as missing
      await this.cache.del(this.key(sessionId));
      return null;
    }
    return parsed.data;
  }

  /**
   * Creates a new session for `subject`.
   * The caller is responsible for setting the cookie.
   */
  async create(subject: string): Promise<Session> {
    const issuedAt = this.now();
    const session: Session = {
      id: generateSecureToken(),
      subject,
      issuedAt: issuedAt.toISOString(),
      expiresAt: new Date(issuedAt.getTime() + this.ttlSeconds * 1000).toISOString(),
      revokedAt: null,
    };

    await this.cache.set(this.key(session.id), JSON.stringify(session), {
      ttlSeconds: this.ttlSeconds,
    });

    return session;
  }

  /**
   * Returns the session if it exists, is not expired and is not revoked.
   */
  async validate(sessionId: string): Promise<Session | null> {
    const session = await this.read(sessionId);
    if (!session) return null;
    if (session.revokedAt !== null) return null;
    if (Date.parse(session.expiresAt) <= this.now().getTime()) return null;
    return session;
  }

  /**
   * Marks the session revoked WITHOUT extending its lifetime.
   * No-op if the session does not exist (already expired or never created).
   */
  async revoke(sessionId: string): Promise<void> {
    const existing = await this.read(sessionId);
    if (!existing || existing.revokedAt !== null) return;

    const revoked: Session = { ...existing, revokedAt: this.now().toISOString() };
    await this.cache.set(this.key(sessionId), JSON.stringify(revoked), { keepTtl: true });
  }
}
