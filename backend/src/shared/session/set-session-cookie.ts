/**
 * backend/src/shared/session/set-session-cookie.ts
 *
 * WHY:
 * - Sign-in, sign-out and handoff redemption all set or clear session cookies with
 *   the same flags. Centralising here keeps the flags from drifting.
 *
 * RULES:
 * - No business logic here.
 * - SameSite=Lax (not Strict): the satellite → primary → satellite chain is a series of
 *   top-level cross-site navigations, and Strict cookies are withheld on those, which
 *   would loop the user back to sign-in.
 * - HttpOnly always; Secure in production.
 */

import type { FastifyReply } from 'fastify';

export type CookieOptions = {
  name: string;
  isProduction: boolean;
  maxAgeSeconds?: number;
};

export function setSessionCookie(reply: FastifyReply, value: string, opts: CookieOptions): void {
  const parts = [`${opts.name}=${value}`, 'Path=/', 'HttpOnly', 'SameSite=Lax'];

  if (opts.maxAgeSeconds !== undefined) {
    parts.push(`Max-Age=${opts.maxAgeSeconds}`);
  }
  if (opts.isProduction) {
    parts.push('Secure');
  }

  reply.header('Set-Cookie', parts.join('; '));
}

export function clearSessionCookie(reply: FastifyReply, opts: Omit<CookieOptions, 'maxAgeSeconds'>): void {
  // Max-Age=0 instructs the browser to delete the cookie immediately.
  const parts = [`${opts.name}=`, 'Path=/', 'HttpOnly', 'SameSite=Lax', 'Max-Age=0'];

  if (opts.isProduction) {
    parts.push('Secure');
  }

  reply.header('Set-Cookie', parts.join('; '));
}
