import { describe, it, expect } from 'vitest';
import { seedCredentials } from '../../../src/modules/auth/credentials/seed-credentials';
import { InMemCredentialDirectory } from '../../../src/modules/auth/credentials/credential-directory';
import { BcryptPasswordHasher } from '../../../src/shared/security/bcrypt-password-hasher';

describe('seedCredentials', () => {
  it('is idempotent: re-seeding keeps the subject and updates the password', async () => {
    const credentials = new InMemCredentialDirectory();
    const passwordHasher = new BcryptPasswordHasher({ cost: 10 });

    await seedCredentials({ credentials, passwordHasher, email: 'Dev@Example.com', password: 'first-password' });
    const first = await credentials.findByEmail('dev@example.com');

    await seedCredentials({ credentials, passwordHasher, email: 'dev@example.com', password: 'second-password' });
    const second = await credentials.findByEmail('dev@example.com');

    expect(first?.subject).toMatch(/^usr_/);
    expect(second?.subject).toBe(first?.subject);
    await expect(passwordHasher.verify('second-password', second?.passwordHash ?? '')).resolves.toBe(true);
    await expect(passwordHasher.verify('first-password', second?.passwordHash ?? '')).resolves.toBe(false);
  });
});
