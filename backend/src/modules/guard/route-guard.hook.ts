/**
 * backend/src/modules/guard/route-guard.hook.ts
 *
 * WHY:
 * - The single decision point the request pipeline calls before handler dispatch.
 *
 * RULES:
 * - Registered AFTER session middleware and handoff redemption.
 * - Emits the redirect/reject response itself; no session mutation.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { isAuthenticated } from '../../shared/http/auth-context';
import { withRequestContext } from '../../shared/logger/with-context';
import type { RoutePredicate } from './guard.types';
import { decideRouteAccess } from './policies/route-access.policy';

export function registerRouteGuard(
  app: FastifyInstance,
  opts: { isProtectedRoute: RoutePredicate; signInPath: string },
): void {
  app.addHook('onRequest', async (req: FastifyRequest, reply: FastifyReply) => {
    const url = req.requestContext.requestUrl;
    // The sign-in route itself is always public, otherwise `(.*)` would loop.
    const isProtected = url
      ? url.pathname !== opts.signInPath && opts.isProtectedRoute({ method: req.method, url })
      : true;

    const decision = decideRouteAccess({
      domain: req.domainContext,
      isProtected,
      authenticated: isAuthenticated(req.authContext),
      rawUrl: req.url,
      signInPath: opts.signInPath,
    });

    if (decision.action === 'allow') return;

    const log = withRequestContext(req);

    if (decision.action === 'redirect') {
      log.info('guard.redirect', { flow: 'guard', path: url?.pathname ?? null });
      return reply.code(302).header('location', decision.location).send();
    }

    log.error('guard.reject', {
      flow: 'guard',
      reason: req.domainContext.ok ? null : req.domainContext.error.message,
    });
    return reply
      .code(decision.status)
      .send({ error: { code: decision.code, message: decision.message } });
  });
}
