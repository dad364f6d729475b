/**
 * src/modules/domains/domain-context.ts
 *
 * WHY:
 * - Classification is computed once per request and shared by session middleware,
 *   the route guard, controllers and request logging.
 *
 * RULES:
 * - Never throws from the hook: a failed classification is recorded on the request
 *   and the route guard turns it into a reject.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import type { DomainClassifier } from './domain-classifier';
import { ConfigurationError } from './domain.errors';
import type { DomainClassification } from './domain.types';

export type DomainContext =
  | { ok: true; classification: DomainClassification }
  | { ok: false; error: ConfigurationError };

declare module 'fastify' {
  interface FastifyRequest {
    domainContext: DomainContext;
  }
}

export function classifyRequest(classifier: DomainClassifier, requestUrl: URL | null): DomainContext {
  if (!requestUrl) {
    return { ok: false, error: new ConfigurationError('Request has no usable Host header.') };
  }

  try {
    return { ok: true, classification: classifier.classify(requestUrl) };
  } catch (err) {
    // A resolver that throws is a configuration fault, not a request fault.
    const error =
      err instanceof ConfigurationError
        ? err
        : new ConfigurationError(
            `Domain resolver failed: ${err instanceof Error ? err.message : String(err)}`,
          );
    return { ok: false, error };
  }
}

export function registerDomainContext(app: FastifyInstance, classifier: DomainClassifier) {
  app.decorateRequest('domainContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.domainContext = classifyRequest(classifier, req.requestContext.requestUrl);
    done();
  });
}

/**
 * Controller helper. The route guard already rejects unclassified requests, so
 * reaching a handler without a classification is an internal fault.
 */
export function requireClassification(req: FastifyRequest): DomainClassification {
  const ctx = req.domainContext;
  if (!ctx?.ok) {
    throw AppError.internal('Domain classification unavailable', { flow: 'domain.classify' });
  }
  return ctx.classification;
}
