/**
 * src/modules/domains/domain.types.ts
 *
 * WHY:
 * - One instance per origin. Static values are read once; function values are
 *   evaluated per request because the origin is only known at request time in
 *   multi-tenant deployments.
 *
 * RULES:
 * - Resolver functions must be pure and safe to call concurrently.
 */

export type RequestUrlResolver<T> = (url: URL) => T;

export type InstanceConfig = {
  isSatellite: boolean | RequestUrlResolver<boolean>;

  /**
   * Bare host ("app.example.com") or origin ("http://localhost:3001"). null, or a resolver
   * returning null: request origin.
   */
  domain: string | RequestUrlResolver<string | null> | null;

  /** Absolute URL of the primary's sign-in route. Required for satellites outside production. */
  signInUrl: string | null;

  /** Production-only fallback: sign-in URL becomes https://<primaryDomain><signInPath>. */
  primaryDomain: string | null;

  /** Local sign-in route path (used by the primary, and to build the fallback above). */
  signInPath: string;

  isProduction: boolean;
};

export type DomainClassification = {
  isSatellite: boolean;
  origin: string;
  /** Non-null exactly when isSatellite is true. */
  primarySignInUrl: URL | null;
};
