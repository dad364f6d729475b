/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Domain types for primary sign-in.
 *
 * RULES:
 * - Never include raw passwords, hashes, session ids or tokens in response types.
 */

export type Credential = {
  subject: string;
  email: string;
  passwordHash: string;
};

export type SignInRequiredResult = {
  status: 'SIGN_IN_REQUIRED';
  redirectUrl: string;
};

export type AuthenticatedResult = {
  status: 'AUTHENTICATED';
  subject: string;
  redirectTo: string;
};

export type SignedOutResult = {
  status: 'SIGNED_OUT';
};

export type CurrentSessionResult = {
  subject: string;
  source: 'primary' | 'satellite';
  expiresAt: string;
};
