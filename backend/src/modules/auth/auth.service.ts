/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Primary sign-in / sign-out and the continuation after sign-in.
 * - Continuation is where Authenticated-On-Primary turns into Redirected-To-Satellite:
 *   a satellite return URL gets a freshly minted handoff token appended.
 *
 * RULES:
 * - Only the primary creates or revokes primary sessions.
 * - Satellites only drop their own local recognition on sign-out.
 * - Rate limit at the start of sign-in (before any credential work).
 * - Never store/log raw passwords, session ids or tokens.
 * - Store lookups are bounded by lookupTimeoutMs and fail closed (503).
 */

import type { Logger } from '../../shared/logger/logger';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { SessionStore } from '../../shared/session/session.store';
import type { SatelliteSessionStore } from '../../shared/session/satellite-session.store';
import type { Session } from '../../shared/session/session.types';
import type { SessionSource } from '../../shared/http/auth-context';
import { AppError } from '../../shared/http/errors';
import { appendQueryParam, stripQueryParam } from '../../shared/http/url';
import { withTimeout } from '../../shared/util/with-timeout';

import type { HandoffService } from '../handoff/handoff.service';
import { HANDOFF_PARAM } from '../handoff/handoff.constants';
import {
  resolveRedirectTarget,
  type RedirectTarget,
} from '../handoff/policies/redirect-target.policy';

import type { CredentialDirectory } from './credentials/credential-directory';
import { AuthErrors } from './auth.errors';
import { AUTH_RATE_LIMITS } from './auth.constants';

// We avoid putting raw emails into infra keys (Redis) or operational logs.
function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}

export type SignInParams = {
  email: string;
  password: string;
  ip: string;
  requestId: string;
};

export type ContinuationParams = {
  session: Session;
  primaryOrigin: string;
  target: RedirectTarget;
  requestId: string;
};

export class AuthService {
  constructor(
    private readonly deps: {
      credentials: CredentialDirectory;
      passwordHasher: PasswordHasher;
      tokenHasher: TokenHasher;
      rateLimiter: RateLimiter;
      sessionStore: SessionStore;
      satelliteSessionStore: SatelliteSessionStore;
      handoffService: HandoffService;
      logger: Logger;
      satelliteOrigins: readonly string[];
      lookupTimeoutMs: number;
    },
  ) {}

  private bounded<T>(promise: Promise<T>, flow: string): Promise<T> {
    return withTimeout(promise, this.deps.lookupTimeoutMs, () =>
      AppError.unavailable(undefined, { flow }),
    );
  }

  resolveTarget(redirectUrl: string | undefined, primaryOrigin: string): RedirectTarget {
    return resolveRedirectTarget({
      redirectUrl,
      primaryOrigin,
      satelliteOrigins: this.deps.satelliteOrigins,
    });
  }

  async signIn(params: SignInParams): Promise<Session> {
    const email = params.email.toLowerCase();
    const domain = emailDomain(email);

    await this.deps.rateLimiter.hitOrThrow({
      key: `signin:email:${this.deps.tokenHasher.hash(email)}`,
      ...AUTH_RATE_LIMITS.signIn.perEmail,
    });
    await this.deps.rateLimiter.hitOrThrow({
      key: `signin:ip:${params.ip}`,
      ...AUTH_RATE_LIMITS.signIn.perIp,
    });

    const credential = await this.deps.credentials.findByEmail(email);
    if (!credential) {
      this.deps.logger.warn('auth.sign_in.failed', {
        flow: 'auth.sign_in',
        requestId: params.requestId,
        emailDomain: domain,
        reason: 'unknown_email',
      });
      throw AuthErrors.invalidCredentials();
    }

    const ok = await this.deps.passwordHasher.verify(params.password, credential.passwordHash);
    if (!ok) {
      this.deps.logger.warn('auth.sign_in.failed', {
        flow: 'auth.sign_in',
        requestId: params.requestId,
        emailDomain: domain,
        reason: 'bad_password',
      });
      throw AuthErrors.invalidCredentials();
    }

    const session = await this.bounded(
      this.deps.sessionStore.create(credential.subject),
      'session.create',
    );

    this.deps.logger.info('auth.sign_in.success', {
      flow: 'auth.sign_in',
      requestId: params.requestId,
      subject: credential.subject,
      emailDomain: domain,
    });

    return session;
  }

  /**
   * Re-reads the primary session so a token is only ever minted for a session that
   * is active at this moment.
   */
  async activeSession(sessionId: string): Promise<Session | null> {
    return this.bounded(this.deps.sessionStore.validate(sessionId), 'session.validate');
  }

  /**
   * Where the browser goes after the primary has an active session.
   * Local targets are returned verbatim; satellite targets get `__handoff=<token>`
   * appended without touching any other byte of the return URL.
   */
  continuation(params: ContinuationParams): string {
    if (params.target.kind === 'local') return params.target.location;

    const issued = this.deps.handoffService.issue({
      session: params.session,
      primaryOrigin: params.primaryOrigin,
      targetOrigin: params.target.origin,
      requestId: params.requestId,
    });

    return appendQueryParam(
      stripQueryParam(params.target.location, HANDOFF_PARAM),
      HANDOFF_PARAM,
      issued.token,
    );
  }

  async signOut(params: { source: SessionSource; sessionId: string; requestId: string }) {
    if (params.source === 'primary') {
      await this.bounded(this.deps.sessionStore.revoke(params.sessionId), 'session.revoke');
    } else {
      await this.bounded(
        this.deps.satelliteSessionStore.destroy(params.sessionId),
        'satellite_session.destroy',
      );
    }

    this.deps.logger.info('auth.sign_out', {
      flow: 'auth.sign_out',
      requestId: params.requestId,
      source: params.source,
    });
  }
}
