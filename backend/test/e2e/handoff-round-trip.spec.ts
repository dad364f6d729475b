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
import { locationOf, rawPathOf, readCookie, readJson, setCookieHeaders } from '../helpers/http';

type ErrorResponseBody = {
  error: { code: string; message: string };
};

const ORIGINAL_PATH = '/dashboard?tab=a%20b&x=1';

/**
 * Walks the full chain with two independent apps sharing only SECRET_KEY and
 * PUBLISHABLE_KEY: satellite → primary sign-in → satellite with `__handoff`.
 */
async function buildPair() {
  const primary = await buildTestApp();
  const satellite = await buildSatelliteTestApp();
  const credential = await seedTestUser(primary);

  const close = async () => {
    await satellite.close();
    await primary.close();
  };

  return { primary, satellite, credential, close };
}

async function signInFromSatellite(pair: Awaited<ReturnType<typeof buildPair>>) {
  const first = await pair.satellite.app.inject({
    method: 'GET',
    url: ORIGINAL_PATH,
    headers: { host: SATELLITE_HOST },
  });
  const returnUrl = new URL(locationOf(first.headers)).searchParams.get('redirect_url');
  if (!returnUrl) throw new Error('satellite redirect carried no redirect_url');

  const signIn = await pair.primary.app.inject({
    method: 'POST',
    url: '/sign-in',
    headers: { host: PRIMARY_HOST },
    payload: { email: TEST_EMAIL, password: TEST_PASSWORD, redirectUrl: returnUrl },
  });

  return { first, returnUrl, signIn };
}

describe('cross-domain handoff', () => {
  it('satellite → primary → satellite ends on the exact original URL', async () => {
    const pair = await buildPair();

    try {
      const { returnUrl, signIn } = await signInFromSatellite(pair);
      expect(returnUrl).toBe(`https://satellite.dev${ORIGINAL_PATH}`);

      // primary appends the token to the return URL without touching anything else
      expect(signIn.statusCode).toBe(303);
      const handoffUrl = locationOf(signIn.headers);
      expect(handoffUrl.startsWith(`https://satellite.dev${ORIGINAL_PATH}&__handoff=v1.`)).toBe(
        true,
      );

      const redeem = await pair.satellite.app.inject({
        method: 'GET',
        url: rawPathOf(handoffUrl),
        headers: { host: SATELLITE_HOST },
      });

      expect(redeem.statusCode).toBe(302);
      expect(locationOf(redeem.headers)).toBe(ORIGINAL_PATH);

      const satelliteSession = readCookie(redeem.headers, '__satellite_session');
      expect(setCookieHeaders(redeem.headers)).toEqual([
        `__satellite_session=${satelliteSession}; Path=/; HttpOnly; SameSite=Lax; Max-Age=3600`,
      ]);

      const page = await pair.satellite.app.inject({
        method: 'GET',
        url: ORIGINAL_PATH,
        headers: { host: SATELLITE_HOST, cookie: `__satellite_session=${satelliteSession}` },
      });

      expect(page.statusCode).toBe(200);
      expect(page.json()).toEqual({ page: 'dashboard', subject: pair.credential.subject });

      const me = await pair.satellite.app.inject({
        method: 'GET',
        url: '/me',
        headers: { host: SATELLITE_HOST, cookie: `__satellite_session=${satelliteSession}` },
      });
      expect(me.json()).toMatchObject({ subject: pair.credential.subject, source: 'satellite' });
    } finally {
      await pair.close();
    }
  });

  it('already signed in on the primary: GET /sign-in hands off immediately', async () => {
    const pair = await buildPair();

    try {
      const signIn = await pair.primary.app.inject({
        method: 'POST',
        url: '/sign-in',
        headers: { host: PRIMARY_HOST },
        payload: { email: TEST_EMAIL, password: TEST_PASSWORD },
      });
      const primaryCookie = `__session=${readCookie(signIn.headers, '__session')}`;

      const res = await pair.primary.app.inject({
        method: 'GET',
        url: '/sign-in',
        query: { redirect_url: `https://satellite.dev${ORIGINAL_PATH}` },
        headers: { host: PRIMARY_HOST, cookie: primaryCookie },
      });

      expect(res.statusCode).toBe(302);
      const handoffUrl = locationOf(res.headers);
      expect(handoffUrl.startsWith(`https://satellite.dev${ORIGINAL_PATH}&__handoff=`)).toBe(true);

      const redeem = await pair.satellite.app.inject({
        method: 'GET',
        url: rawPathOf(handoffUrl),
        headers: { host: SATELLITE_HOST },
      });
      expect(redeem.statusCode).toBe(302);
      expect(locationOf(redeem.headers)).toBe(ORIGINAL_PATH);
    } finally {
      await pair.close();
    }
  });

  it('a replayed handoff URL => generic 401 and no cookie', async () => {
    const pair = await buildPair();

    try {
      const { signIn } = await signInFromSatellite(pair);
      const url = rawPathOf(locationOf(signIn.headers));

      const first = await pair.satellite.app.inject({
        method: 'GET',
        url,
        headers: { host: SATELLITE_HOST },
      });
      expect(first.statusCode).toBe(302);

      const replay = await pair.satellite.app.inject({
        method: 'GET',
        url,
        headers: { host: SATELLITE_HOST },
      });

      expect(replay.statusCode).toBe(401);
      expect(readJson<ErrorResponseBody>(replay)).toEqual({
        error: { code: 'UNAUTHORIZED', message: 'Authentication failed. Please sign in again.' },
      });
      expect(setCookieHeaders(replay.headers)).toEqual([]);
    } finally {
      await pair.close();
    }
  });

  it('a token minted for one satellite is refused by another', async () => {
    const pair = await buildPair();
    const other = await buildSatelliteTestApp({ instance: { domain: 'other-satellite.dev' } });

    try {
      const { signIn } = await signInFromSatellite(pair);

      const res = await other.app.inject({
        method: 'GET',
        url: rawPathOf(locationOf(signIn.headers)),
        headers: { host: 'other-satellite.dev' },
      });

      expect(res.statusCode).toBe(401);
      expect(readJson<ErrorResponseBody>(res).error.message).toBe(
        'Authentication failed. Please sign in again.',
      );
    } finally {
      await other.close();
      await pair.close();
    }
  });

  it('a satellite with a different secret refuses the token', async () => {
    const pair = await buildPair();
    const stranger = await buildSatelliteTestApp({
      secretKey: 'another-secret-another-secret-000',
    });

    try {
      const { signIn } = await signInFromSatellite(pair);

      const res = await stranger.app.inject({
        method: 'GET',
        url: rawPathOf(locationOf(signIn.headers)),
        headers: { host: SATELLITE_HOST },
      });

      expect(res.statusCode).toBe(401);
    } finally {
      await stranger.close();
      await pair.close();
    }
  });

  it('the primary ignores __handoff on its own requests', async () => {
    const pair = await buildPair();

    try {
      const res = await pair.primary.app.inject({
        method: 'GET',
        url: '/health?__handoff=v1.abc.def',
        headers: { host: PRIMARY_HOST },
      });

      expect(res.statusCode).toBe(200);
    } finally {
      await pair.close();
    }
  });

  it('satellite sign-out drops local recognition only', async () => {
    const pair = await buildPair();

    try {
      const { signIn } = await signInFromSatellite(pair);
      const primaryCookie = `__session=${readCookie(signIn.headers, '__session')}`;

      const redeem = await pair.satellite.app.inject({
        method: 'GET',
        url: rawPathOf(locationOf(signIn.headers)),
        headers: { host: SATELLITE_HOST },
      });
      const satelliteCookie = `__satellite_session=${readCookie(redeem.headers, '__satellite_session')}`;

      const signOut = await pair.satellite.app.inject({
        method: 'POST',
        url: '/sign-out',
        headers: { host: SATELLITE_HOST, cookie: satelliteCookie },
      });
      expect(signOut.statusCode).toBe(200);
      expect(setCookieHeaders(signOut.headers)).toEqual([
        '__satellite_session=; Path=/; HttpOnly; SameSite=Lax; Max-Age=0',
      ]);

      const page = await pair.satellite.app.inject({
        method: 'GET',
        url: '/dashboard',
        headers: { host: SATELLITE_HOST, cookie: satelliteCookie },
      });
      expect(page.statusCode).toBe(302);

      const primaryMe = await pair.primary.app.inject({
        method: 'GET',
        url: '/me',
        headers: { host: PRIMARY_HOST, cookie: primaryCookie },
      });
      expect(primaryMe.statusCode).toBe(200);
    } finally {
      await pair.close();
    }
  });

  it('a primary cookie presented to the satellite is not evidence there', async () => {
    const pair = await buildPair();

    try {
      const signIn = await pair.primary.app.inject({
        method: 'POST',
        url: '/sign-in',
        headers: { host: PRIMARY_HOST },
        payload: { email: TEST_EMAIL, password: TEST_PASSWORD },
      });

      const res = await pair.satellite.app.inject({
        method: 'GET',
        url: '/dashboard',
        headers: {
          host: SATELLITE_HOST,
          cookie: `__session=${readCookie(signIn.headers, '__session')}`,
        },
      });

      expect(res.statusCode).toBe(302);
    } finally {
      await pair.close();
    }
  });
});
