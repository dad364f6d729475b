/**
 * src/shared/security/hmac-signer.ts
 *
 * WHY:
 * - Handoff tokens carry their own proof: the primary signs the claims, the
 *   satellite verifies them with the same shared key. No cross-origin storage.
 *
 * KEY:
 * - SECRET_KEY from environment (min 32 chars, validated at startup).
 * - Generate with: openssl rand -base64 32
 *
 * RULES:
 * - Deterministic: same (input, key) → same signature.
 * - verify() is constant-time for equal-length inputs.
 * - No business logic.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';

export interface Signer {
  sign(value: string): string;
  verify(value: string, signature: string): boolean;
}

export class HmacSha256Signer implements Signer {
  private readonly key: string;

  constructor(key: string) {
    if (key.length < 32) {
      throw new Error(`HmacSha256Signer: key must be at least 32 characters. Got ${key.length}.`);
    }
    this.key = key;
  }

  /**
   * Returns HMAC-SHA256(value, key) as base64url.
   */
  sign(value: string): string {
    return createHmac('sha256', this.key).update(value).digest('base64url');
  }

  verify(value: string, signature: string): boolean {
    const expected = Buffer.from(this.sign(value), 'base64url');
    const actual = Buffer.from(signature, 'base64url');

    if (actual.length !== expected.length) return false;
    return timingSafeEqual(actual, expected);
  }
}
