/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication state is read once per request and shared by the route guard,
 *   controllers and request logging.
 * - On the primary it comes from the primary session; on a satellite it comes from
 *   the local recognition created by a redeemed handoff.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an empty context on every request.
 * 2. Session middleware overwrites it if valid local evidence exists.
 * 3. The route guard and controllers read req.authContext.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

export type SessionSource = 'primary' | 'satellite';

export type AuthContext = {
  subject: string | null;
  sessionId: string | null;
  source: SessionSource | null;
  expiresAt: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function emptyAuthContext(): AuthContext {
  return { subject: null, sessionId: null, source: null, expiresAt: null };
}

export function isAuthenticated(ctx: AuthContext | null | undefined): boolean {
  return Boolean(ctx?.subject && ctx.sessionId);
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = emptyAuthContext();
    done();
  });
}
