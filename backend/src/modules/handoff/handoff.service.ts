/**
 * src/modules/handoff/handoff.service.ts
 *
 * WHY:
 * - Cross-domain handoff: the primary mints a token bound to one satellite origin,
 *   the satellite redeems it exactly once for local recognition.
 * - All cross-origin trust flows through the signed token carried in the URL.
 *   Primary cookies are never sent to a satellite and no storage is shared.
 *
 * STATES (per browser attempting to establish trust on a satellite):
 *   Unauthenticated-Satellite → Redirected-To-Primary → Authenticated-On-Primary
 *   → Redirected-To-Satellite → Satellite-Session-Established | Handoff-Failed
 *   issue() runs on Authenticated-On-Primary; redeem() decides the last step.
 *
 * REDEEM CHECK ORDER:
 *   structure → signature → app → exp → iat → sexp → aud → single-use ledger.
 *   The ledger is consulted last so that a token failing any other check is
 *   never marked consumed.
 *
 * RULES:
 * - Every failure is the same HandoffErrors.failed() to the caller; the reason is
 *   logged server-side.
 * - A ledger call that exceeds lookupTimeoutMs fails closed with 503.
 */

import type { Logger } from '../../shared/logger/logger';
import type { Session } from '../../shared/session/session.types';
import { generateSecureToken } from '../../shared/security/token';
import { withTimeout } from '../../shared/util/with-timeout';
import type { HandoffTokenCodec } from './handoff-token.codec';
import type { HandoffLedger } from './handoff.ledger';
import { HandoffErrors } from './handoff.errors';
import { HANDOFF_CLOCK_SKEW_SECONDS, HANDOFF_JTI_BYTES } from './handoff.constants';
import type {
  HandoffClaims,
  HandoffRedemption,
  HandoffRejectReason,
  IssuedHandoff,
} from './handoff.types';

export type IssueHandoffParams = {
  session: Session;
  primaryOrigin: string;
  targetOrigin: string;
  requestId?: string;
};

export type RedeemHandoffParams = {
  token: string;
  origin: string;
  requestId?: string;
};

function toSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export class HandoffService {
  constructor(
    private readonly deps: {
      codec: HandoffTokenCodec;
      ledger: HandoffLedger;
      logger: Logger;
      publishableKey: string;
      ttlSeconds: number;
      lookupTimeoutMs: number;
      now?: () => Date;
    },
  ) {}

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  issue(params: IssueHandoffParams): IssuedHandoff {
    const now = this.now();
    const iat = toSeconds(now);
    const sexp = toSeconds(new Date(params.session.expiresAt));

    if (sexp <= iat || params.session.revokedAt !== null) {
      // Callers only pass validated sessions; this guards the expiry boundary.
      throw HandoffErrors.failed({ flow: 'handoff.issue', reason: 'session_inactive' });
    }

    const claims: HandoffClaims = {
      v: 1,
      jti: generateSecureToken(HANDOFF_JTI_BYTES),
      sub: params.session.subject,
      sid: params.session.id,
      iss: params.primaryOrigin,
      aud: params.targetOrigin,
      app: this.deps.publishableKey,
      iat,
      exp: Math.min(iat + this.deps.ttlSeconds, sexp),
      sexp,
    };

    const token = this.deps.codec.encode(claims);

    this.deps.logger.info('handoff.issued', {
      flow: 'handoff.issue',
      requestId: params.requestId,
      jti: claims.jti,
      subject: claims.sub,
      aud: claims.aud,
      exp: claims.exp,
    });

    return { token, jti: claims.jti, expiresAt: new Date(claims.exp * 1000) };
  }

  async redeem(params: RedeemHandoffParams): Promise<HandoffRedemption> {
    const reject = (reason: HandoffRejectReason, claims?: HandoffClaims): never => {
      this.deps.logger.warn('handoff.rejected', {
        flow: 'handoff.redeem',
        requestId: params.requestId,
        reason,
        origin: params.origin,
        jti: claims?.jti ?? null,
        aud: claims?.aud ?? null,
      });
      throw HandoffErrors.failed({ flow: 'handoff.redeem' });
    };

    const decoded = this.deps.codec.decode(params.token);
    if (!decoded.ok) return reject(decoded.reason);

    const { claims } = decoded;
    const nowMs = this.now().getTime();

    if (claims.app !== this.deps.publishableKey) return reject('wrong_app', claims);
    if (nowMs >= claims.exp * 1000) return reject('expired', claims);
    if (claims.iat * 1000 > nowMs + HANDOFF_CLOCK_SKEW_SECONDS * 1000) {
      return reject('not_yet_valid', claims);
    }
    if (nowMs >= claims.sexp * 1000) return reject('session_expired', claims);
    if (claims.aud !== params.origin) return reject('wrong_audience', claims);

    const ledgerTtl = claims.exp - Math.floor(nowMs / 1000) + HANDOFF_CLOCK_SKEW_SECONDS;
    const firstUse = await withTimeout(
      this.deps.ledger.consume(claims.jti, ledgerTtl),
      this.deps.lookupTimeoutMs,
      () => HandoffErrors.unavailable({ flow: 'handoff.ledger' }),
    );
    if (!firstUse) return reject('replayed', claims);

    this.deps.logger.info('handoff.redeemed', {
      flow: 'handoff.redeem',
      requestId: params.requestId,
      jti: claims.jti,
      subject: claims.sub,
      origin: params.origin,
    });

    return {
      subject: claims.sub,
      primarySessionId: claims.sid,
      primarySessionExpiresAt: new Date(claims.sexp * 1000),
    };
  }
}
