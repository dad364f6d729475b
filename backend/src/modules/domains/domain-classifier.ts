/**
 * src/modules/domains/domain-classifier.ts
 *
 * WHY:
 * - Decides per request whether this instance acts as primary or satellite, which
 *   origin it serves, and where the primary sign-in route lives.
 * - Validates everything that can be validated at construction so a misconfigured
 *   satellite fails at startup, not on the first user request.
 *
 * ORIGIN RULES:
 * - "http(s)://host[:port]" → used as-is (origin only).
 * - bare "host[:port]" → https, except localhost / *.localhost / 127.0.0.1 which
 *   take the request protocol (local dev over plain http).
 * - null → the request URL's origin.
 */

import { ConfigurationError } from './domain.errors';
import type { DomainClassification, InstanceConfig } from './domain.types';

const LOCAL_HOSTS = /^(localhost|[^.]+\.localhost|127\.0\.0\.1)(:\d+)?$/;

export function toOrigin(domain: string, requestProtocol: string): string {
  const trimmed = domain.trim();
  if (!trimmed) throw new ConfigurationError('Domain must not be empty.');

  const candidate = trimmed.includes('://')
    ? trimmed
    : `${LOCAL_HOSTS.test(trimmed) ? requestProtocol : 'https:'}//${trimmed}`;

  if (!URL.canParse(candidate)) {
    throw new ConfigurationError(`Invalid domain: "${trimmed}".`);
  }

  const url = new URL(candidate);
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError(`Domain must use http or https: "${trimmed}".`);
  }
  return url.origin;
}

function parseAbsoluteUrl(value: string, label: string): URL {
  if (!URL.canParse(value)) {
    throw new ConfigurationError(`${label} must be an absolute URL. Got "${value}".`);
  }
  const url = new URL(value);
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError(`${label} must use http or https. Got "${value}".`);
  }
  return url;
}

export class DomainClassifier {
  private readonly primarySignInUrl: URL | null;

  constructor(private readonly config: InstanceConfig) {
    this.primarySignInUrl = this.resolvePrimarySignInUrl();

    const mayBeSatellite = config.isSatellite !== false;
    if (mayBeSatellite && !this.primarySignInUrl) {
      throw new ConfigurationError(
        config.isProduction
          ? 'Satellite instances require signInUrl or primaryDomain.'
          : 'Satellite instances require signInUrl outside production.',
      );
    }

    if (typeof config.domain === 'string') {
      const origin = toOrigin(config.domain, 'http:');

      if (config.isSatellite === true && this.primarySignInUrl?.origin === origin) {
        throw new ConfigurationError(
          'A satellite cannot use its own origin as the primary sign-in URL.',
        );
      }
    }
  }

  private resolvePrimarySignInUrl(): URL | null {
    if (this.config.signInUrl) {
      return parseAbsoluteUrl(this.config.signInUrl, 'signInUrl');
    }
    if (this.config.isProduction && this.config.primaryDomain) {
      return parseAbsoluteUrl(
        `${toOrigin(this.config.primaryDomain, 'https:')}${this.config.signInPath}`,
        'primaryDomain',
      );
    }
    return null;
  }

  /**
   * Throws ConfigurationError when a resolver yields an unusable value for this request.
   */
  classify(requestUrl: URL): DomainClassification {
    const { isSatellite: isSatelliteCfg, domain: domainCfg } = this.config;

    const isSatellite =
      typeof isSatelliteCfg === 'function' ? isSatelliteCfg(requestUrl) : isSatelliteCfg;

    const domain = typeof domainCfg === 'function' ? domainCfg(requestUrl) : domainCfg;
    const origin = domain === null ? requestUrl.origin : toOrigin(domain, requestUrl.protocol);

    if (!isSatellite) {
      return { isSatellite: false, origin, primarySignInUrl: null };
    }

    // Guaranteed by the constructor whenever isSatellite can be true.
    if (!this.primarySignInUrl) {
      throw new ConfigurationError('Satellite instance has no primary sign-in URL.');
    }
    if (this.primarySignInUrl.origin === origin) {
      throw new ConfigurationError(
        'A satellite cannot use its own origin as the primary sign-in URL.',
      );
    }

    return { isSatellite: true, origin, primarySignInUrl: new URL(this.primarySignInUrl.href) };
  }
}
