/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load .env via dotenv.
 * - In prod, the platform injects env vars (no file).
 * - Tests call buildConfig(env) with a plain object, or build AppConfig directly
 *   (which is also where function-valued isSatellite/domain come from).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 * - Booleans are parsed from the literal strings 'true'/'false'. z.coerce.boolean()
 *   would turn "false" into true.
 */

import 'dotenv/config';
import { z } from 'zod';
import type { InstanceConfig } from '../modules/domains/domain.types';
import type { RoutePattern, RoutePredicate } from '../modules/guard/guard.types';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const BooleanString = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const CommaList = z
  .string()
  .default('')
  .transform((v) =>
    v
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean),
  );

const OptionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : null));

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),
  // Behind a load balancer: take protocol/host from X-Forwarded-* headers
  TRUST_PROXY: BooleanString,

  REDIS_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('session-bridge'),

  // Session space
  PUBLISHABLE_KEY: z.string().regex(/^pk_(test|live)_[A-Za-z0-9_-]+$/, 'Invalid publishable key'),
  SECRET_KEY: z.string().min(32, 'SECRET_KEY must be at least 32 characters'),

  // Instance / domain
  DOMAIN: OptionalString,
  IS_SATELLITE: BooleanString,
  SIGN_IN_URL: OptionalString,
  PRIMARY_DOMAIN: OptionalString,
  SIGN_IN_PATH: z.string().startsWith('/').default('/sign-in'),
  SATELLITE_ORIGINS: CommaList,
  PROTECTED_ROUTES: CommaList,

  // Lifetimes / bounds
  SESSION_TTL_SECONDS: z.coerce.number().int().min(300).max(604800).default(86400),
  SATELLITE_SESSION_TTL_SECONDS: z.coerce.number().int().min(60).max(604800).default(3600),
  HANDOFF_TOKEN_TTL_SECONDS: z.coerce.number().int().min(5).max(300).default(60),
  LOOKUP_TIMEOUT_MS: z.coerce.number().int().min(50).max(30000).default(2000),

  BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

  // DEV seed bootstrap (idempotent)
  SEED_ON_START: BooleanString,
  SEED_USER_EMAIL: z.string().email().default('dev@example.com'),
  SEED_USER_PASSWORD: z.string().min(8).default('dev-password'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  trustProxy: boolean;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  publishableKey: string;
  secretKey: string;

  instance: InstanceConfig;
  satelliteOrigins: string[];
  protectedRoutes: RoutePattern[] | RoutePredicate;

  sessionTtlSeconds: number;
  satelliteSessionTtlSeconds: number;
  handoffTokenTtlSeconds: number;
  lookupTimeoutMs: number;

  bcryptCost: number;

  seed: {
    enabled: boolean;
    email: string;
    password: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);
  const isProduction = parsed.NODE_ENV === 'production';

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    trustProxy: parsed.TRUST_PROXY,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    publishableKey: parsed.PUBLISHABLE_KEY,
    secretKey: parsed.SECRET_KEY,

    instance: {
      isSatellite: parsed.IS_SATELLITE,
      domain: parsed.DOMAIN,
      signInUrl: parsed.SIGN_IN_URL,
      primaryDomain: parsed.PRIMARY_DOMAIN,
      signInPath: parsed.SIGN_IN_PATH,
      isProduction,
    },
    satelliteOrigins: parsed.SATELLITE_ORIGINS,
    protectedRoutes: parsed.PROTECTED_ROUTES,

    sessionTtlSeconds: parsed.SESSION_TTL_SECONDS,
    satelliteSessionTtlSeconds: parsed.SATELLITE_SESSION_TTL_SECONDS,
    handoffTokenTtlSeconds: parsed.HANDOFF_TOKEN_TTL_SECONDS,
    lookupTimeoutMs: parsed.LOOKUP_TIMEOUT_MS,

    bcryptCost: parsed.BCRYPT_COST,

    seed: {
      enabled: parsed.SEED_ON_START,
      email: parsed.SEED_USER_EMAIL,
      password: parsed.SEED_USER_PASSWORD,
    },
  };
}
