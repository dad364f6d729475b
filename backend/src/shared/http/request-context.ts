/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - Domain classification needs the absolute request URL (protocol + host + raw path).
 * - We also want a stable requestId for logs, debugging and tracing a redirect chain.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 *
 * RULES:
 * - requestUrl is built by concatenation, never by resolving req.url against a base:
 *   a raw path such as `//evil.test/x` must stay a path on this host.
 * - requestUrl can be null (malformed Host header); downstream treats that as a
 *   classification failure.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
  host: string | null;
  requestUrl: URL | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

function parseHost(rawHost: unknown): string | null {
  if (typeof rawHost !== 'string') return null;

  const trimmed = rawHost.trim().toLowerCase();
  return trimmed ? trimmed : null;
}

export function buildRequestUrl(protocol: string, host: string | null, rawUrl: string): URL | null {
  if (!host) return null;
  if (!URL.canParse(`${protocol}://${host}${rawUrl}`)) return null;
  return new URL(`${protocol}://${host}${rawUrl}`);
}

export function registerRequestContext(app: FastifyInstance) {
  // We decorate the request so TypeScript + Fastify know the property exists.
  // The real value is assigned on each request in the onRequest hook.
  app.decorateRequest('requestContext', null);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    const host = parseHost(req.headers.host);

    req.requestContext = {
      requestId: randomUUID(),
      host,
      requestUrl: buildRequestUrl(req.protocol, host, req.url),
    };

    done();
  });
}
