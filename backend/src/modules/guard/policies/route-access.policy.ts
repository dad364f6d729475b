/**
 * backend/src/modules/guard/policies/route-access.policy.ts
 *
 * WHY:
 * - Pure decision: given classification, protection and authentication, decide
 *   allow / redirect / reject. The hook only executes the decision.
 *
 * RULES:
 * - Classification failed → reject 500 (dynamic configuration fault).
 * - Public route → allow.
 * - Protected + authenticated → allow.
 * - Protected + unauthenticated → redirect to sign-in with the original URL:
 *     satellite: <primarySignInUrl>?redirect_url=<origin + raw path>
 *     primary:   <origin><signInPath>?redirect_url=<origin + raw path>
 * - The return URL is bounded by MAX_RETURN_URL_LENGTH so sign-in always accepts it.
 * - Never yields allow for an unauthenticated protected request.
 */

import type { DomainContext } from '../../domains/domain-context';
import { appendQueryParam } from '../../../shared/http/url';
import { MAX_RETURN_URL_LENGTH, REDIRECT_URL_PARAM, type GuardDecision } from '../guard.types';

/**
 * origin + raw path when it fits MAX_RETURN_URL_LENGTH; otherwise the path without
 * query/fragment; otherwise the origin root.
 */
export function boundedReturnUrl(origin: string, rawUrl: string): string {
  const full = `${origin}${rawUrl}`;
  if (full.length <= MAX_RETURN_URL_LENGTH) return full;

  const cut = rawUrl.search(/[?#]/);
  const pathOnly = `${origin}${cut === -1 ? rawUrl : rawUrl.slice(0, cut)}`;
  return pathOnly.length <= MAX_RETURN_URL_LENGTH ? pathOnly : `${origin}/`;
}

export function decideRouteAccess(input: {
  domain: DomainContext;
  isProtected: boolean;
  authenticated: boolean;
  rawUrl: string;
  signInPath: string;
}): GuardDecision {
  if (!input.domain.ok) {
    return {
      action: 'reject',
      status: 500,
      code: 'INTERNAL',
      message: 'This domain is not configured correctly.',
    };
  }

  if (!input.isProtected || input.authenticated) return { action: 'allow' };

  const { classification } = input.domain;
  const originalUrl = boundedReturnUrl(classification.origin, input.rawUrl);

  const signInUrl = classification.primarySignInUrl
    ? classification.primarySignInUrl.href
    : `${classification.origin}${input.signInPath}`;

  return {
    action: 'redirect',
    location: appendQueryParam(signInUrl, REDIRECT_URL_PARAM, originalUrl),
  };
}
