/**
 * backend/src/shared/session/session.middleware.ts
 *
 * WHY:
 * - Reads local session evidence on every request and populates req.authContext.
 * - Primary classification: `__session` cookie → SessionStore.validate().
 * - Satellite classification: `__satellite_session` cookie → SatelliteSessionStore.get().
 * - Does NOT throw if no session; the route guard decides what is protected.
 *
 * RULES:
 * - Runs AFTER requestContext, authContext and domainContext hooks.
 * - Lookups are bounded by lookupTimeoutMs. A lookup that times out fails CLOSED
 *   with 503; it never leaves the request authenticated.
 * - No session mutation here.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { parseCookies } from '../http/cookies';
import { AppError } from '../http/errors';
import { withTimeout } from '../util/with-timeout';
import type { SessionStore } from './session.store';
import type { SatelliteSessionStore } from './satellite-session.store';
import { SATELLITE_SESSION_COOKIE_NAME, SESSION_COOKIE_NAME } from './session.types';

export type SessionMiddlewareDeps = {
  sessionStore: SessionStore;
  satelliteSessionStore: SatelliteSessionStore;
  lookupTimeoutMs: number;
};

export function registerSessionMiddleware(app: FastifyInstance, deps: SessionMiddlewareDeps): void {
  const bounded = <T>(promise: Promise<T>) =>
    withTimeout(promise, deps.lookupTimeoutMs, () =>
      AppError.unavailable(undefined, { flow: 'session.lookup' }),
    );

  app.addHook('onRequest', async (req: FastifyRequest) => {
    const domain = req.domainContext;
    if (!domain?.ok) return;

    const cookies = parseCookies(req.headers.cookie);

    if (domain.classification.isSatellite) {
      const id = cookies[SATELLITE_SESSION_COOKIE_NAME];
      if (!id) return;

      const record = await bounded(
        deps.satelliteSessionStore.get(id, domain.classification.origin),
      );
      if (!record) return;

      req.authContext = {
        subject: record.subject,
        sessionId: record.id,
        source: 'satellite',
        expiresAt: record.expiresAt,
      };
      return;
    }

    const sessionId = cookies[SESSION_COOKIE_NAME];
    if (!sessionId) return;

    const session = await bounded(deps.sessionStore.validate(sessionId));
    if (!session) return;

    req.authContext = {
      subject: session.subject,
      sessionId: session.id,
      source: 'primary',
      expiresAt: session.expiresAt,
    };
  });
}
