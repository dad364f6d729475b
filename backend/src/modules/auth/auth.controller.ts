/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for sign-in / sign-out / current session.
 * - Behaviour depends on the request's classification:
 *   primary serves sign-in; a satellite forwards sign-in to the primary.
 *
 * RULES:
 * - No cache access here.
 * - No business rules here.
 * - Cookie logic lives in shared/session/set-session-cookie (DRY).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { signInQuerySchema, signInSchema } from './auth.schemas';
import { AppError } from '../../shared/http/errors';
import { appendQueryParam } from '../../shared/http/url';
import { requireSession } from '../../shared/http/require-auth-context';
import { clearSessionCookie, setSessionCookie } from '../../shared/session/set-session-cookie';
import {
  SATELLITE_SESSION_COOKIE_NAME,
  SESSION_COOKIE_NAME,
} from '../../shared/session/session.types';
import { requireClassification } from '../domains/domain-context';
import { REDIRECT_URL_PARAM } from '../guard/guard.types';
import type { AuthService } from './auth.service';
import { AuthErrors } from './auth.errors';
import type {
  AuthenticatedResult,
  CurrentSessionResult,
  SignedOutResult,
  SignInRequiredResult,
} from './auth.types';

export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly opts: { isProduction: boolean; sessionTtlSeconds: number },
  ) {}

  private parseQuery(req: FastifyRequest) {
    const parsed = signInQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw AppError.validationError('Invalid query string', { issues: parsed.error.issues });
    }
    return parsed.data;
  }

  /**
   * GET /sign-in?redirect_url=...
   * - satellite: 302 to the primary sign-in URL, forwarding redirect_url.
   * - primary, signed in: 302 to the continuation (handoff for satellite targets).
   * - primary, signed out: 200 SIGN_IN_REQUIRED (the sign-in UI is rendered elsewhere).
   */
  async getSignIn(req: FastifyRequest, reply: FastifyReply) {
    const domain = requireClassification(req);
    const query = this.parseQuery(req);

    if (domain.primarySignInUrl) {
      const location = appendQueryParam(
        domain.primarySignInUrl.href,
        REDIRECT_URL_PARAM,
        query.redirect_url ?? `${domain.origin}/`,
      );
      return reply.code(302).header('location', location).send();
    }

    const target = this.authService.resolveTarget(query.redirect_url, domain.origin);

    const ctx = req.authContext;
    if (ctx.source === 'primary' && ctx.sessionId) {
      const session = await this.authService.activeSession(ctx.sessionId);
      if (session) {
        const location = this.authService.continuation({
          session,
          primaryOrigin: domain.origin,
          target,
          requestId: req.requestContext.requestId,
        });
        return reply.code(302).header('location', location).send();
      }
    }

    const body: SignInRequiredResult = {
      status: 'SIGN_IN_REQUIRED',
      redirectUrl: target.location,
    };
    return reply.status(200).send(body);
  }

  /**
   * POST /sign-in { email, password, redirectUrl? }
   * The redirect target is validated BEFORE credentials so a rejected target never
   * leaves a fresh session behind.
   */
  async postSignIn(req: FastifyRequest, reply: FastifyReply) {
    const domain = requireClassification(req);
    if (domain.isSatellite) throw AuthErrors.primaryOnly({ flow: 'auth.sign_in' });

    const parsed = signInSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const query = this.parseQuery(req);
    const target = this.authService.resolveTarget(
      parsed.data.redirectUrl ?? query.redirect_url,
      domain.origin,
    );

    const session = await this.authService.signIn({
      email: parsed.data.email,
      password: parsed.data.password,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    const location = this.authService.continuation({
      session,
      primaryOrigin: domain.origin,
      target,
      requestId: req.requestContext.requestId,
    });

    setSessionCookie(reply, session.id, {
      name: SESSION_COOKIE_NAME,
      isProduction: this.opts.isProduction,
      maxAgeSeconds: this.opts.sessionTtlSeconds,
    });

    const body: AuthenticatedResult = {
      status: 'AUTHENTICATED',
      subject: session.subject,
      redirectTo: location,
    };
    return reply.code(303).header('location', location).send(body);
  }

  async signOut(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    await this.authService.signOut({
      source: session.source,
      sessionId: session.sessionId,
      requestId: req.requestContext.requestId,
    });

    clearSessionCookie(reply, {
      name: session.source === 'primary' ? SESSION_COOKIE_NAME : SATELLITE_SESSION_COOKIE_NAME,
      isProduction: this.opts.isProduction,
    });

    const body: SignedOutResult = { status: 'SIGNED_OUT' };
    return reply.status(200).send(body);
  }

  me(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const body: CurrentSessionResult = {
      subject: session.subject,
      source: session.source,
      expiresAt: session.expiresAt,
    };
    return reply.status(200).send(body);
  }
}
