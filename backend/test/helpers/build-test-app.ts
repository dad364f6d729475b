import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import type { InstanceConfig } from '../../src/modules/domains/domain.types';
import type { Cache } from '../../src/shared/cache/cache';
import { InMemCache } from '../../src/shared/cache/inmem-cache';

export const TEST_SECRET_KEY = 'test-secret-test-secret-test-secret';
export const TEST_PUBLISHABLE_KEY = 'pk_test_session_bridge';

export const PRIMARY_HOST = 'primary.dev';
export const SATELLITE_HOST = 'satellite.dev';

export const TEST_EMAIL = 'user@example.com';
export const TEST_PASSWORD = 'test-password';

type TestConfigOverrides = Partial<Omit<AppConfig, 'instance' | 'seed'>> & {
  instance?: Partial<InstanceConfig>;
};

export function buildTestConfig(overrides: TestConfigOverrides = {}): AppConfig {
  const { instance, ...rest } = overrides;

  return {
    nodeEnv: 'test',
    port: 0,
    trustProxy: false,
    redisUrl: 'redis://unused-in-tests',

    logLevel: process.env.LOG_LEVEL ?? 'error',
    serviceName: 'session-bridge-test',

    publishableKey: TEST_PUBLISHABLE_KEY,
    secretKey: TEST_SECRET_KEY,

    satelliteOrigins: [`https://${SATELLITE_HOST}`],
    protectedRoutes: ['/dashboard(.*)'],

    sessionTtlSeconds: 86400,
    satelliteSessionTtlSeconds: 3600,
    handoffTokenTtlSeconds: 60,
    lookupTimeoutMs: 2000,

    bcryptCost: 10,

    ...rest,

    instance: {
      isSatellite: false,
      domain: PRIMARY_HOST,
      signInUrl: null,
      primaryDomain: null,
      signInPath: '/sign-in',
      isProduction: false,
      ...instance,
    },

    seed: {
      enabled: false, // IMPORTANT: OFF in tests by default
      email: 'dev@example.com',
      password: 'dev-password',
    },
  };
}

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build once, inject, close.
 *
 * RULES:
 * - Never touches Redis: each app gets its own InMemCache unless one is passed.
 * - A protected `/dashboard` route is registered so the guard has something to allow.
 */
export async function buildTestApp(
  overrides: TestConfigOverrides = {},
  opts: { cache?: Cache } = {},
) {
  const config = buildTestConfig(overrides);
  const built = await buildApp(config, { cache: opts.cache ?? new InMemCache() });

  built.app.get('/dashboard', (req) => ({ page: 'dashboard', subject: req.authContext.subject }));

  return { app: built.app, deps: built.deps, config, close: built.close };
}

export function buildSatelliteTestApp(
  overrides: TestConfigOverrides = {},
  opts: { cache?: Cache } = {},
) {
  return buildTestApp(
    {
      ...overrides,
      instance: {
        isSatellite: true,
        domain: SATELLITE_HOST,
        signInUrl: `https://${PRIMARY_HOST}/sign-in`,
        ...overrides.instance,
      },
    },
    opts,
  );
}

type BuiltTestApp = Awaited<ReturnType<typeof buildTestApp>>;

export async function seedTestUser(
  built: BuiltTestApp,
  email = TEST_EMAIL,
  password = TEST_PASSWORD,
) {
  const passwordHash = await built.deps.passwordHasher.hash(password);
  return built.deps.credentials.upsert({ email, passwordHash });
}
