/**
 * backend/src/shared/security/sha256-token-hasher.ts
 *
 * Concrete TokenHasher using SHA-256 (hex). Deterministic: the same email always
 * maps to the same rate-limit key.
 */

import { createHash } from 'node:crypto';
import type { TokenHasher } from './token-hasher';

export class Sha256TokenHasher implements TokenHasher {
  hash(raw: string): string {
    return createHash('sha256').update(raw).digest('hex');
  }
}
