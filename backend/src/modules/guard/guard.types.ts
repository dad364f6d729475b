/**
 * src/modules/guard/guard.types.ts
 *
 * Route classification is not persisted: it is recomputed per request from static
 * configuration. Routes are public unless the matcher says otherwise.
 */

export type RouteRequest = {
  method: string;
  url: URL;
};

export type RoutePredicate = (req: RouteRequest) => boolean;

export type RoutePattern = string | RegExp;

export type GuardDecision =
  | { action: 'allow' }
  | { action: 'redirect'; location: string }
  | { action: 'reject'; status: number; code: 'INTERNAL'; message: string };

/** Query parameter carrying the return URL on the satellite → primary leg. */
export const REDIRECT_URL_PARAM = 'redirect_url';

/**
 * Longest return URL carried in `redirect_url`. The guard never emits a longer one
 * and sign-in accepts anything up to it.
 */
export const MAX_RETURN_URL_LENGTH = 8192;
