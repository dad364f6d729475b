/**
 * backend/src/modules/auth/credentials/seed-credentials.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates (or resets the password of) one sign-in credential.
 * Idempotent: safe to run on every start.
 *
 * IMPORTANT:
 * - Stores only the bcrypt hash.
 * - Never logs the password.
 */

import type { PasswordHasher } from '../../../shared/security/password-hasher';
import { logger } from '../../../shared/logger/logger';
import type { CredentialDirectory } from './credential-directory';

export async function seedCredentials(opts: {
  credentials: CredentialDirectory;
  passwordHasher: PasswordHasher;
  email: string;
  password: string;
}): Promise<void> {
  const passwordHash = await opts.passwordHasher.hash(opts.password);
  const credential = await opts.credentials.upsert({ email: opts.email, passwordHash });

  logger.info('seed.credential_ready', {
    flow: 'seed.dev',
    subject: credential.subject,
    email: credential.email,
  });
}
