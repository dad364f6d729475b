/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require session" logic.
 * - Centralizes authContext validation to prevent drift across endpoints.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch cache, services, or stores.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { SessionSource } from './auth-context';

export type RequiredAuthContext = Readonly<{
  subject: string;
  sessionId: string;
  source: SessionSource;
  expiresAt: string;
}>;

export type RequireSessionOptions = Readonly<{
  source?: SessionSource;
}>;

/**
 * Controller guard: requires local session evidence, and optionally a specific source.
 *
 * 1) no session -> 401 "Authentication required"
 * 2) wrong source -> 403 "Session not valid on this domain."
 */
export function requireSession(
  req: FastifyRequest,
  opts: RequireSessionOptions = {},
): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx) throw AppError.unauthorized('Authentication required');

  if (!ctx.subject || !ctx.sessionId || !ctx.source || !ctx.expiresAt) {
    throw AppError.unauthorized('Authentication required');
  }

  if (opts.source && ctx.source !== opts.source) {
    throw AppError.forbidden('Session not valid on this domain.');
  }

  return {
    subject: ctx.subject,
    sessionId: ctx.sessionId,
    source: ctx.source,
    expiresAt: ctx.expiresAt,
  };
}
