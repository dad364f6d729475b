/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (redis) and shares them safely.
 * - Keeps modules testable (tests inject InMemCache and their own directory).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves (DIP).
 * - Configuration faults (ConfigurationError) surface from here, at startup.
 */

import type { AppConfig } from './config';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';
import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';
import { HmacSha256Signer } from '../shared/security/hmac-signer';
import type { Signer } from '../shared/security/hmac-signer';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { SessionStore } from '../shared/session/session.store';
import { SatelliteSessionStore } from '../shared/session/satellite-session.store';

import { DomainClassifier, toOrigin } from '../modules/domains/domain-classifier';
import { createRouteMatcher } from '../modules/guard/route-matcher';
import type { RoutePredicate } from '../modules/guard/guard.types';

import { InMemCredentialDirectory } from '../modules/auth/credentials/credential-directory';
import type { CredentialDirectory } from '../modules/auth/credentials/credential-directory';

import { createHandoffModule } from '../modules/handoff/handoff.module';
import type { HandoffModule } from '../modules/handoff/handoff.module';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

export type AppDeps = {
  cache: Cache;
  logger: Logger;

  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;
  signer: Signer;

  sessionStore: SessionStore;
  satelliteSessionStore: SatelliteSessionStore;
  credentials: CredentialDirectory;

  classifier: DomainClassifier;
  isProtectedRoute: RoutePredicate;
  satelliteOrigins: string[];

  // modules
  handoff: HandoffModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  cache?: Cache;
  credentials?: CredentialDirectory;
};

async function connectCache(
  config: AppConfig,
  override: Cache | undefined,
): Promise<{ cache: Cache; closeCache: () => Promise<void> }> {
  if (override) return { cache: override, closeCache: () => Promise.resolve() };

  const redis = await RedisCache.connect(config.redisUrl);
  return { cache: redis, closeCache: () => redis.close() };
}

export async function buildDeps(
  config: AppConfig,
  overrides: DepsOverrides = {},
): Promise<AppDeps> {
  const isProduction = config.nodeEnv === 'production';

  // Pure config validation first: a misconfigured satellite must not even open a
  // Redis connection.
  const classifier = new DomainClassifier(config.instance);
  const satelliteOrigins = config.satelliteOrigins.map((o) => toOrigin(o, 'https:'));
  const isProtectedRoute = createRouteMatcher(config.protectedRoutes);
  const signer: Signer = new HmacSha256Signer(config.secretKey);

  // Redis is mandatory outside tests (tests inject InMemCache)
  const { cache, closeCache } = await connectCache(config, overrides.cache);

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.bcryptCost,
  });

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  const sessionStore = new SessionStore(cache, config.sessionTtlSeconds);
  const satelliteSessionStore = new SatelliteSessionStore(
    cache,
    config.satelliteSessionTtlSeconds,
  );
  const credentials = overrides.credentials ?? new InMemCredentialDirectory();

  // modules (no HTTP / no business logic here)
  const handoff = createHandoffModule({
    cache,
    signer,
    logger,
    satelliteSessionStore,
    publishableKey: config.publishableKey,
    tokenTtlSeconds: config.handoffTokenTtlSeconds,
    lookupTimeoutMs: config.lookupTimeoutMs,
    isProduction,
  });

  const auth = createAuthModule({
    credentials,
    passwordHasher,
    tokenHasher,
    rateLimiter,
    sessionStore,
    satelliteSessionStore,
    handoffService: handoff.handoffService,
    logger,
    satelliteOrigins,
    lookupTimeoutMs: config.lookupTimeoutMs,
    isProduction,
    sessionTtlSeconds: config.sessionTtlSeconds,
    signInPath: config.instance.signInPath,
  });

  return {
    cache,
    logger,
    rateLimiter,
    tokenHasher,
    passwordHasher,
    signer,
    sessionStore,
    satelliteSessionStore,
    credentials,
    classifier,
    isProtectedRoute,
    satelliteOrigins,
    handoff,
    auth,
    close: async () => {
      await closeCache();
    },
  };
}
