/**
 * src/shared/session/satellite-session.store.ts
 *
 * WHY:
 * - A satellite cannot read the primary's cookie (different origin). After a handoff
 *   token is redeemed, the satellite records local recognition of the primary session
 *   and hands the browser its own cookie.
 *
 * RULES:
 * - Created ONLY from a successfully redeemed handoff (HandoffService.redeem).
 * - Lifetime is bounded by both the configured max TTL and the primary session expiry.
 * - A record is honoured only on the origin that created it.
 */

import type { Cache } from '../cache/cache';
import { generateSecureToken } from '../security/token';
import { SATELLITE_SESSION_KEY_PREFIX, SatelliteSessionSchema } from './session.types';
import type { SatelliteSession } from './session.types';

export type CreateSatelliteSessionInput = {
  subject: string;
  primarySessionId: string;
  primarySessionExpiresAt: Date;
  origin: string;
};

export class SatelliteSessionStore {
  constructor(
    private readonly cache: Cache,
    private readonly maxTtlSeconds: number,
    private readonly now: () => Date = () => new Date(),
  ) {}

  private key(id: string): string {
    return `${SATELLITE_SESSION_KEY_PREFIX}:${id}`;
  }

  async create(input: CreateSatelliteSessionInput): Promise<SatelliteSession> {
    const createdAt = this.now();
    const remainingSeconds = Math.floor(
      (input.primarySessionExpiresAt.getTime() - createdAt.getTime()) / 1000,
    );
    const ttlSeconds = Math.max(1, Math.min(this.maxTtlSeconds, remainingSeconds));

    const record: SatelliteSession = {
      id: generateSecureToken(),
      subject: input.subject,
      primarySessionId: input.primarySessionId,
      origin: input.origin,
      createdAt: createdAt.toISOString(),
      expiresAt: new Date(createdAt.getTime() + ttlSeconds * 1000).toISOString(),
    };

    await this.cache.set(this.key(record.id), JSON.stringify(record), { ttlSeconds });
    return record;
  }

  async get(id: string, origin: string): Promise<SatelliteSession | null> {
    const raw = await this.cache.get(this.key(id));
    if (!raw) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      json = null;
    }

    const parsed = SatelliteSessionSchema.safeParse(json);
    if (!parsed.success) {
      await this.cache.del(this.key(id));
      return null;
    }

    const record = parsed.data;
    if (record.origin !== origin) return null;
    if (Date.parse(record.expiresAt) <= this.now().getTime()) return null;
    return record;
  }

  async destroy(id: string): Promise<void> {
    await this.cache.del(this.key(id));
  }
}
