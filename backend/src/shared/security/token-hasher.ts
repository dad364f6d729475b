/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Identifiers that must not appear raw in infra keys (emails in rate-limit keys)
 *   are hashed first.
 *
 * NOTE:
 * - Callers depend on the interface (DIP); the algorithm can change without
 *   touching services.
 */

export interface TokenHasher {
  hash(raw: string): string;
}
