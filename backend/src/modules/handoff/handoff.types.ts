/**
 * src/modules/handoff/handoff.types.ts
 *
 * A handoff token is a short-lived, single-use, origin-bound proof that the primary
 * holds an active session for `sub`. Times are unix seconds.
 */

import { z } from 'zod';

export const HandoffClaimsSchema = z.object({
  v: z.literal(1),
  jti: z.string().min(16),
  sub: z.string().min(1),
  sid: z.string().min(1),
  iss: z.string().min(1),
  aud: z.string().min(1),
  app: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
  sexp: z.number().int(),
});

export type HandoffClaims = z.infer<typeof HandoffClaimsSchema>;

export type IssuedHandoff = {
  token: string;
  jti: string;
  expiresAt: Date;
};

export type HandoffRedemption = {
  subject: string;
  primarySessionId: string;
  primarySessionExpiresAt: Date;
};

export type HandoffRejectReason =
  | 'malformed'
  | 'bad_signature'
  | 'wrong_app'
  | 'expired'
  | 'not_yet_valid'
  | 'session_expired'
  | 'wrong_audience'
  | 'replayed';
