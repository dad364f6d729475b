/**
 * backend/src/modules/handoff/policies/redirect-target.policy.ts
 *
 * WHY:
 * - Pure decision: where may the primary send the browser after sign-in?
 * - A satellite target needs a handoff token; a local target does not.
 *
 * RULES:
 * - Missing/empty → local "/".
 * - Control characters or whitespace anywhere → 400.
 * - Same-origin path ("/x", never "//x" or "/\x", and resolving to the primary
 *   origin) → local, kept verbatim.
 * - Absolute http(s) URL on the primary origin → local, kept verbatim.
 * - Absolute http(s) URL on an allowed satellite origin → satellite, kept verbatim.
 * - Anything else → 400. No open redirects.
 */

import { HandoffErrors } from '../handoff.errors';

// ASCII control characters and any whitespace.
const UNSAFE_CHARS = /[\u0000-\u001F\u007F\s]/;

export type RedirectTarget =
  | { kind: 'local'; location: string }
  | { kind: 'satellite'; location: string; origin: string };

export function resolveRedirectTarget(input: {
  redirectUrl: string | null | undefined;
  primaryOrigin: string;
  satelliteOrigins: readonly string[];
}): RedirectTarget {
  const raw = input.redirectUrl ?? '';
  if (!raw.trim()) return { kind: 'local', location: '/' };

  // Browsers drop tab/newline from URLs, so "/\t/evil.test" navigates off-site.
  if (UNSAFE_CHARS.test(raw)) {
    throw HandoffErrors.redirectNotAllowed({ reason: 'unsafe_characters' });
  }

  if (raw.startsWith('/')) {
    if (raw.startsWith('//') || raw.startsWith('/\\')) {
      throw HandoffErrors.redirectNotAllowed({ reason: 'protocol_relative' });
    }
    if (new URL(raw, input.primaryOrigin).origin !== input.primaryOrigin) {
      throw HandoffErrors.redirectNotAllowed({ reason: 'path_leaves_origin' });
    }
    return { kind: 'local', location: raw };
  }

  if (!URL.canParse(raw)) {
    throw HandoffErrors.redirectNotAllowed({ reason: 'unparseable' });
  }

  const url = new URL(raw);
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw HandoffErrors.redirectNotAllowed({ reason: 'scheme' });
  }

  if (url.origin === input.primaryOrigin) {
    return { kind: 'local', location: raw };
  }

  if (input.satelliteOrigins.includes(url.origin)) {
    return { kind: 'satellite', location: raw, origin: url.origin };
  }

  throw HandoffErrors.redirectNotAllowed({ reason: 'origin_not_allowed', origin: url.origin });
}
