/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants shared across flows.
 *
 * RULES:
 * - Must not import from HTTP/framework code.
 */

export const AUTH_RATE_LIMITS = {
  signIn: {
    perEmail: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 20, windowSeconds: 900 },
  },
} as const;
