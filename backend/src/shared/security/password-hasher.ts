/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Primary sign-in compares a submitted password against a stored hash.
 * - Services depend on this interface (DIP), not on bcrypt directly.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
