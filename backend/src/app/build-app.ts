/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 * - Clean place to run dev-only seed/bootstrap.
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps, type DepsOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { seedCredentials } from '../modules/auth/credentials/seed-credentials';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, overrides: DepsOverrides = {}) {
  const deps = await buildDeps(config, overrides);
  const app = await buildServer({ config, deps });

  registerRoutes(app, { config, deps });

  // DEV-only seed bootstrap
  if (config.seed.enabled) {
    const flow = 'seed.dev';

    if (config.nodeEnv === 'production') {
      logger.warn('seed.skipped_in_production', { flow });
    } else {
      await seedCredentials({
        credentials: deps.credentials,
        passwordHasher: deps.passwordHasher,
        email: config.seed.email,
        password: config.seed.password,
      });
    }
  }

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
