/**
 * backend/src/modules/handoff/handoff-token.codec.ts
 *
 * FORMAT:
 *   v1.<base64url(JSON claims)>.<base64url(HMAC-SHA256("v1." + payload))>
 *
 * RULES:
 * - decode() checks structure and signature only. Time, audience and single-use
 *   checks belong to HandoffService.
 * - The version prefix is covered by the signature.
 */

import type { Signer } from '../../shared/security/hmac-signer';
import { HANDOFF_TOKEN_VERSION } from './handoff.constants';
import { HandoffClaimsSchema, type HandoffClaims } from './handoff.types';

export type DecodeResult =
  | { ok: true; claims: HandoffClaims }
  | { ok: false; reason: 'malformed' | 'bad_signature' };

const SEGMENT = /^[A-Za-z0-9_-]+$/;

export class HandoffTokenCodec {
  constructor(private readonly signer: Signer) {}

  encode(claims: HandoffClaims): string {
    const payload = Buffer.from(JSON.stringify(claims), 'utf8').toString('base64url');
    const signingInput = `${HANDOFF_TOKEN_VERSION}.${payload}`;
    return `${signingInput}.${this.signer.sign(signingInput)}`;
  }

  decode(token: string): DecodeResult {
    const parts = token.split('.');
    if (parts.length !== 3) return { ok: false, reason: 'malformed' };

    const [version, payload, signature] = parts;
    if (version !== HANDOFF_TOKEN_VERSION || !payload || !signature) {
      return { ok: false, reason: 'malformed' };
    }
    if (!SEGMENT.test(payload) || !SEGMENT.test(signature)) {
      return { ok: false, reason: 'malformed' };
    }

    if (!this.signer.verify(`${version}.${payload}`, signature)) {
      return { ok: false, reason: 'bad_signature' };
    }

    let json: unknown;
    try {
      json = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
    } catch {
      return { ok: false, reason: 'malformed' };
    }

    const parsed = HandoffClaimsSchema.safeParse(json);
    if (!parsed.success) return { ok: false, reason: 'malformed' };

    return { ok: true, claims: parsed.data };
  }
}
