/**
 * src/modules/handoff/handoff.ledger.ts
 *
 * WHY:
 * - Single-use enforcement for handoff tokens on the receiving satellite.
 *
 * ATOMICITY:
 * - consume() is one SET NX. Two concurrent redemptions of the same jti both reach
 *   the cache; exactly one creates the key and wins, the other gets false.
 * - The key expires with the token, so no cleanup pass is needed: after expiry
 *   the token fails the time check before the ledger is consulted.
 */

import type { Cache } from '../../shared/cache/cache';
import { HANDOFF_LEDGER_KEY_PREFIX } from './handoff.constants';

export class HandoffLedger {
  constructor(private readonly cache: Cache) {}

  /** Returns true for the first and only successful consumption of `jti`. */
  async consume(jti: string, ttlSeconds: number): Promise<boolean> {
    return this.cache.setIfAbsent(`${HANDOFF_LEDGER_KEY_PREFIX}:${jti}`, '1', {
      ttlSeconds: Math.max(1, ttlSeconds),
    });
  }
}
