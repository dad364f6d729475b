import { describe, it, expect } from 'vitest';
import {
  buildSatelliteTestApp,
  buildTestApp,
  PRIMARY_HOST,
  SATELLITE_HOST,
  seedTestUser,
  TEST_EMAIL,
  TEST_PASSWORD,
} from '../helpers/build-test-app';
import { locationOf, readCookie, readJson, setCookieHeaders } from '../helpers/http';

type ErrorResponseBody = {
  error: { code: string; message: string };
};

type AuthenticatedResponseBody = {
  status: 'AUTHENTICATED';
  subject: string;
  redirectTo: string;
};

describe('POST /sign-in (primary)', () => {
  it('valid credentials => session cookie + 303 to a local target', async () => {
    const built = await buildTestApp();
    const credential = await seedTestUser(built);

    try {
      const res = await built.app.inject({
        method: 'POST',
        url: '/sign-in',
        headers: { host: PRIMARY_HOST },
        payload: { email: TEST_EMAIL, password: TEST_PASSWORD, redirectUrl: '/account?tab=1' },
      });

      expect(res.statusCode).toBe(303);
      expect(locationOf(res.headers)).toBe('/account?tab=1');
      expect(readJson<AuthenticatedResponseBody>(res)).toEqual({
        status: 'AUTHENTICATED',
        subject: credential.subject,
        redirectTo: '/account?tab=1',
      });

      const [cookie] = setCookieHeaders(res.headers);
      const sessionId = readCookie(res.headers, '__session');
      expect(cookie).toBe(`__session=${sessionId}; Path=/; HttpOnly; SameSite=Lax; Max-Age=86400`);

      const me = await built.app.inject({
        method: 'GET',
        url: '/me',
        headers: { host: PRIMARY_HOST, cookie: `__session=${sessionId}` },
      });
      expect(me.statusCode).toBe(200);
      expect(me.json()).toMatchObject({ subject: credential.subject, source: 'primary' });
    } finally {
      await built.close();
    }
  });

  it('email is matched case-insensitively', async () => {
    const built = await buildTestApp();
    await seedTestUser(built);

    try {
      const res = await built.app.inject({
        method: 'POST',
        url: '/sign-in',
        headers: { host: PRIMARY_HOST },
        payload: { email: 'USER@Example.com', password: TEST_PASSWORD },
      });

      expect(res.statusCode).toBe(303);
      expect(locationOf(res.headers)).toBe('/');
    } finally {
      await built.close();
    }
  });

  it('wrong password and unknown email => the same 401', async () => {
    const built = await buildTestApp();
    await seedTestUser(built);

    try {
      for (const payload of [
        { email: TEST_EMAIL, password: 'wrong-password' },
        { email: 'nobody@example.com', password: TEST_PASSWORD },
      ]) {
        const res = await built.app.inject({
          method: 'POST',
          url: '/sign-in',
          headers: { host: PRIMARY_HOST },
          payload,
        });

        expect(res.statusCode).toBe(401);
        expect(readJson<ErrorResponseBody>(res)).toEqual({
          error: { code: 'UNAUTHORIZED', message: 'Invalid email or password.' },
        });
        expect(setCookieHeaders(res.headers)).toEqual([]);
      }
    } finally {
      await built.close();
    }
  });

  it('redirect to a foreign origin => 400 and no session', async () => {
    const built = await buildTestApp();
    await seedTestUser(built);

    try {
      const res = await built.app.inject({
        method: 'POST',
        url: '/sign-in',
        headers: { host: PRIMARY_HOST },
        payload: { email: TEST_EMAIL, password: TEST_PASSWORD, redirectUrl: 'https://evil.test/x' },
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res)).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Redirect URL is not allowed.' },
      });
      expect(setCookieHeaders(res.headers)).toEqual([]);
    } finally {
      await built.close();
    }
  });

  it.each([
    ['a tab', '/\t/evil.test/x'],
    ['CRLF', '/account\r\nX-Injected: 1'],
  ])('redirect containing %s => 400 and no session', async (_label, redirectUrl) => {
    const built = await buildTestApp();
    await seedTestUser(built);

    try {
      const res = await built.app.inject({
        method: 'POST',
        url: '/sign-in',
        headers: { host: PRIMARY_HOST },
        payload: { email: TEST_EMAIL, password: TEST_PASSWORD, redirectUrl },
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res)).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Redirect URL is not allowed.' },
      });
      expect(setCookieHeaders(res.headers)).toEqual([]);
    } finally {
      await built.close();
    }
  });

  it('invalid body => 400', async () => {
    const built = await buildTestApp();

    try {
      const res = await built.app.inject({
        method: 'POST',
        url: '/sign-in',
        headers: { host: PRIMARY_HOST },
        payload: { email: 'not-an-email' },
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res).error.code).toBe('VALIDATION_ERROR');
    } finally {
      await built.close();
    }
  });

  it('satellites do not accept credentials', async () => {
    const built = await buildSatelliteTestApp();

    try {
      const res = await built.app.inject({
        method: 'POST',
        url: '/sign-in',
        headers: { host: SATELLITE_HOST },
        payload: { email: TEST_EMAIL, password: TEST_PASSWORD },
      });

      expect(res.statusCode).toBe(404);
    } finally {
      await built.close();
    }
  });
});

describe('GET /sign-in', () => {
  it('satellite forwards to the primary with its own root as default return URL', async () => {
    const built = await buildSatelliteTestApp();

    try {
      const res = await built.app.inject({
        method: 'GET',
        url: '/sign-in',
        headers: { host: SATELLITE_HOST },
      });

      expect(res.statusCode).toBe(302);
      expect(locationOf(res.headers)).toBe(
        'https://primary.dev/sign-in?redirect_url=https%3A%2F%2Fsatellite.dev%2F',
      );
    } finally {
      await built.close();
    }
  });

  it('primary without a session => SIGN_IN_REQUIRED with the validated target', async () => {
    const built = await buildTestApp();

    try {
      const res = await built.app.inject({
        method: 'GET',
        url: '/sign-in',
        query: { redirect_url: 'https://satellite.dev/dashboard' },
        headers: { host: PRIMARY_HOST },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        status: 'SIGN_IN_REQUIRED',
        redirectUrl: 'https://satellite.dev/dashboard',
      });
    } finally {
      await built.close();
    }
  });
});

describe('GET /sign-in (long return URLs)', () => {
  it('accepts a satellite return URL well past 2048 characters', async () => {
    const built = await buildTestApp();
    const redirectUrl = `https://satellite.dev/dashboard?q=${'a'.repeat(3000)}`;

    try {
      const res = await built.app.inject({
        method: 'GET',
        url: '/sign-in',
        query: { redirect_url: redirectUrl },
        headers: { host: PRIMARY_HOST },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ status: 'SIGN_IN_REQUIRED', redirectUrl });
    } finally {
      await built.close();
    }
  });
});

describe('POST /sign-out', () => {
  it('primary: revokes the session and clears the cookie', async () => {
    const built = await buildTestApp();
    await seedTestUser(built);

    try {
      const signIn = await built.app.inject({
        method: 'POST',
        url: '/sign-in',
        headers: { host: PRIMARY_HOST },
        payload: { email: TEST_EMAIL, password: TEST_PASSWORD },
      });
      const cookie = `__session=${readCookie(signIn.headers, '__session')}`;

      const res = await built.app.inject({
        method: 'POST',
        url: '/sign-out',
        headers: { host: PRIMARY_HOST, cookie },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ status: 'SIGNED_OUT' });
      expect(setCookieHeaders(res.headers)).toEqual([
        '__session=; Path=/; HttpOnly; SameSite=Lax; Max-Age=0',
      ]);

      const me = await built.app.inject({
        method: 'GET',
        url: '/me',
        headers: { host: PRIMARY_HOST, cookie },
      });
      expect(me.statusCode).toBe(401);
      expect(readJson<ErrorResponseBody>(me)).toEqual({
        error: { code: 'UNAUTHORIZED', message: 'Authentication required' },
      });
    } finally {
      await built.close();
    }
  });

  it('without a session => 401', async () => {
    const built = await buildTestApp();

    try {
      const res = await built.app.inject({
        method: 'POST',
        url: '/sign-out',
        headers: { host: PRIMARY_HOST },
      });

      expect(res.statusCode).toBe(401);
    } finally {
      await built.close();
    }
  });
});
