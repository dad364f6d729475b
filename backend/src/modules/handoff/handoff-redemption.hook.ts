/**
 * backend/src/modules/handoff/handoff-redemption.hook.ts
 *
 * WHY:
 * - Final leg of the handoff: a satellite request arriving with `__handoff=<token>`.
 *
 * FLOW:
 * 1. Redeem the token against this request's classified origin.
 * 2. Create local recognition + set the satellite cookie.
 * 3. 302 to the same raw URL with only `__handoff` removed, so the browser ends on
 *    exactly the route it first asked for and the token leaves the address bar.
 *
 * RULES:
 * - Satellite classification only; on the primary the parameter is ignored.
 * - Runs BEFORE the route guard. Failure throws (generic 401 / 503) and nothing is
 *   written, so a session is never partially established.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { stripQueryParam } from '../../shared/http/url';
import type { SatelliteSessionStore } from '../../shared/session/satellite-session.store';
import { SATELLITE_SESSION_COOKIE_NAME } from '../../shared/session/session.types';
import { setSessionCookie } from '../../shared/session/set-session-cookie';
import { withTimeout } from '../../shared/util/with-timeout';
import { HANDOFF_PARAM } from './handoff.constants';
import type { HandoffService } from './handoff.service';

export function registerHandoffRedemption(
  app: FastifyInstance,
  deps: {
    handoffService: HandoffService;
    satelliteSessionStore: SatelliteSessionStore;
    lookupTimeoutMs: number;
    isProduction: boolean;
  },
): void {
  app.addHook('onRequest', async (req: FastifyRequest, reply: FastifyReply) => {
    const domain = req.domainContext;
    const url = req.requestContext.requestUrl;
    if (!domain?.ok || !domain.classification.isSatellite || !url) return;

    const token = url.searchParams.get(HANDOFF_PARAM);
    if (token === null) return;

    const redemption = await deps.handoffService.redeem({
      token,
      origin: domain.classification.origin,
      requestId: req.requestContext.requestId,
    });

    const record = await withTimeout(
      deps.satelliteSessionStore.create({
        subject: redemption.subject,
        primarySessionId: redemption.primarySessionId,
        primarySessionExpiresAt: redemption.primarySessionExpiresAt,
        origin: domain.classification.origin,
      }),
      deps.lookupTimeoutMs,
      () => AppError.unavailable(undefined, { flow: 'satellite_session.create' }),
    );

    const maxAgeSeconds = Math.max(
      1,
      Math.floor((Date.parse(record.expiresAt) - Date.parse(record.createdAt)) / 1000),
    );

    setSessionCookie(reply, record.id, {
      name: SATELLITE_SESSION_COOKIE_NAME,
      isProduction: deps.isProduction,
      maxAgeSeconds,
    });

    return reply.code(302).header('location', stripQueryParam(req.url, HANDOFF_PARAM)).send();
  });
}
