/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - redirect URLs are validated for shape here only; which origins are allowed is
 *   decided by the redirect-target policy.
 */

import { z } from 'zod';
import { MAX_RETURN_URL_LENGTH } from '../guard/guard.types';

const redirectUrl = z.string().min(1).max(MAX_RETURN_URL_LENGTH);

export const signInSchema = z.object({
  email: z.string().email('Invalid email address'),
  password: z.string().min(1, 'Password is required'),
  redirectUrl: redirectUrl.optional(),
});

export const signInQuerySchema = z.object({
  redirect_url: redirectUrl.optional(),
});
