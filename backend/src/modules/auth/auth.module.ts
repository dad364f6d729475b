/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { SessionStore } from '../../shared/session/session.store';
import type { SatelliteSessionStore } from '../../shared/session/satellite-session.store';
import type { HandoffService } from '../handoff/handoff.service';

import type { CredentialDirectory } from './credentials/credential-directory';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  credentials: CredentialDirectory;
  passwordHasher: PasswordHasher;
  tokenHasher: TokenHasher;
  rateLimiter: RateLimiter;
  sessionStore: SessionStore;
  satelliteSessionStore: SatelliteSessionStore;
  handoffService: HandoffService;
  logger: Logger;
  satelliteOrigins: readonly string[];
  lookupTimeoutMs: number;
  isProduction: boolean;
  sessionTtlSeconds: number;
  signInPath: string;
}) {
  const authService = new AuthService({
    credentials: deps.credentials,
    passwordHasher: deps.passwordHasher,
    tokenHasher: deps.tokenHasher,
    rateLimiter: deps.rateLimiter,
    sessionStore: deps.sessionStore,
    satelliteSessionStore: deps.satelliteSessionStore,
    handoffService: deps.handoffService,
    logger: deps.logger,
    satelliteOrigins: deps.satelliteOrigins,
    lookupTimeoutMs: deps.lookupTimeoutMs,
  });

  const controller = new AuthController(authService, {
    isProduction: deps.isProduction,
    sessionTtlSeconds: deps.sessionTtlSeconds,
  });

  return {
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller, { signInPath: deps.signInPath });
    },
  };
}
