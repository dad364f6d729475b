/**
 * src/modules/guard/route-matcher.ts
 *
 * WHY:
 * - Protection is explicit opt-in. Applications describe protected routes as
 *   patterns (`/dashboard(.*)`), regular expressions, or a predicate.
 *
 * PATTERN SYNTAX:
 * - `(.*)` matches any run of characters (including `/`).
 * - Everything else matches literally against the URL pathname, raw or decoded.
 */

import type { RoutePattern, RoutePredicate, RouteRequest } from './guard.types';

const WILDCARD = '(.*)';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function patternToRegExp(pattern: string): RegExp {
  const body = pattern.split(WILDCARD).map(escapeRegExp).join('.*');
  return new RegExp(`^${body}$`);
}

/**
 * The router dispatches on the percent-decoded path, so `/%64ashboard` reaches the
 * `/dashboard` handler. Patterns are tested against both the raw and the decoded
 * form. A path that cannot be decoded yields null and is treated as protected.
 */
function candidatePaths(pathname: string): string[] | null {
  try {
    return [pathname, decodeURIComponent(pathname)];
  } catch {
    return null;
  }
}

export function createRouteMatcher(routes: RoutePattern[] | RoutePredicate): RoutePredicate {
  if (typeof routes === 'function') return routes;

  const regexps = routes.map((r) => (typeof r === 'string' ? patternToRegExp(r) : r));

  if (regexps.length === 0) return () => false;

  return (req: RouteRequest) => {
    const paths = candidatePaths(req.url.pathname);
    if (!paths) return true;
    return regexps.some((re) => paths.some((path) => re.test(path)));
  };
}
