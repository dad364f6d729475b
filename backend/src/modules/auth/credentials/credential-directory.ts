/**
 * src/modules/auth/credentials/credential-directory.ts
 *
 * WHY:
 * - Sign-in on the primary needs to map an email to a subject + password hash.
 * - The user backend itself lives outside this service; the service depends on
 *   this interface so a real directory can be plugged in at the composition root.
 *
 * RULES:
 * - Emails are normalized to lowercase on both write and read.
 * - Stores hashes only.
 */

import { randomUUID } from 'node:crypto';
import type { Credential } from '../auth.types';

export interface CredentialDirectory {
  findByEmail(email: string): Promise<Credential | null>;
  upsert(input: { email: string; passwordHash: string }): Promise<Credential>;
}

export class InMemCredentialDirectory implements CredentialDirectory {
  private readonly byEmail = new Map<string, Credential>();

  findByEmail(email: string): Promise<Credential | null> {
    return Promise.resolve(this.byEmail.get(email.toLowerCase()) ?? null);
  }

  upsert(input: { email: string; passwordHash: string }): Promise<Credential> {
    const email = input.email.toLowerCase();
    const existing = this.byEmail.get(email);

    const credential: Credential = {
      subject: existing?.subject ?? `usr_${randomUUID()}`,
      email,
      passwordHash: input.passwordHash,
    };

    this.byEmail.set(email, credential);
    return Promise.resolve(credential);
  }
}
