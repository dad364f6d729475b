/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Session ids, recognition ids and handoff token ids must be unguessable.
 * - We generate raw tokens that are safe for URLs and cookies.
 *
 * HOW TO USE:
 * - const id = generateSecureToken()      // 32 bytes, 256 bits
 * - const jti = generateSecureToken(16)   // 128 bits
 */

import { randomBytes } from 'node:crypto';

export function generateSecureToken(bytes: number = 32): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}
