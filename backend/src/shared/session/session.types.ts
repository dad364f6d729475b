/**
 * src/shared/session/session.types.ts
 *
 * WHY:
 * - Defines the server-side session records.
 * - Primary sessions are created only by the primary instance after sign-in.
 * - Satellite sessions are local recognition of a primary session, created only
 *   by redeeming a handoff token. They never feed back into the primary store.
 *
 * RULES:
 * - Records must be JSON-serializable (stored in Redis as JSON string).
 * - Records are parsed with zod on read; anything that fails is treated as missing.
 * - Never store passwords or tokens in session data.
 */

import { z } from 'zod';

export const SessionSchema = z.object({
  id: z.string().min(1),
  subject: z.string().min(1),
  issuedAt: z.string(), // ISO string (JSON-safe)
  expiresAt: z.string(),
  revokedAt: z.string().nullable(),
});

export type Session = z.infer<typeof SessionSchema>;

export const SatelliteSessionSchema = z.object({
  id: z.string().min(1),
  subject: z.string().min(1),
  primarySessionId: z.string().min(1),
  origin: z.string().min(1),
  createdAt: z.string(),
  expiresAt: z.string(),
});

export type SatelliteSession = z.infer<typeof SatelliteSessionSchema>;

/** Primary session evidence. */
export const SESSION_COOKIE_NAME = '__session';

/** Satellite-local recognition evidence. */
export const SATELLITE_SESSION_COOKIE_NAME = '__satellite_session';

/** Full key: `session:{sessionId}`. */
export const SESSION_KEY_PREFIX = 'session';

/** Full key: `satellite-session:{id}`. */
export const SATELLITE_SESSION_KEY_PREFIX = 'satellite-session';
