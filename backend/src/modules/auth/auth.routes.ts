/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthController } from './auth.controller';

export function registerAuthRoutes(
  app: FastifyInstance,
  controller: AuthController,
  opts: { signInPath: string },
) {
  app.get(opts.signInPath, controller.getSignIn.bind(controller));
  app.post(opts.signInPath, controller.postSignIn.bind(controller));
  app.post('/sign-out', controller.signOut.bind(controller));
  app.get('/me', controller.me.bind(controller));
}
