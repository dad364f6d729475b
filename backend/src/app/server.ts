/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest, registration order is execution order):
 * 1. request context   → requestId + absolute request URL
 * 2. auth context      → empty, unauthenticated
 * 3. domain context    → primary/satellite classification
 * 4. request logging
 * 5. session middleware→ local session evidence → authContext
 * 6. handoff redemption→ satellite requests carrying `__handoff`
 * 7. route guard       → allow / redirect / reject, before any handler
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { withRequestContext } from '../shared/logger/with-context';
import { registerSessionMiddleware } from '../shared/session/session.middleware';
import { registerDomainContext } from '../modules/domains/domain-context';
import { registerRouteGuard } from '../modules/guard/route-guard.hook';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const { config, deps } = opts;

  const app = Fastify({
    logger: false, // we use our own Winston logger
    trustProxy: config.trustProxy,
  });

  registerRequestContext(app);
  registerAuthContext(app);
  registerDomainContext(app, deps.classifier);
  registerErrorHandler(app);

  app.addHook('onRequest', (req, _reply, done) => {
    withRequestContext(req).info('request', {
      method: req.method,
      path: req.requestContext.requestUrl?.pathname ?? null,
    });
    done();
  });

  registerSessionMiddleware(app, {
    sessionStore: deps.sessionStore,
    satelliteSessionStore: deps.satelliteSessionStore,
    lookupTimeoutMs: config.lookupTimeoutMs,
  });

  deps.handoff.registerHooks(app);

  registerRouteGuard(app, {
    isProtectedRoute: deps.isProtectedRoute,
    signInPath: config.instance.signInPath,
  });

  return app;
}
