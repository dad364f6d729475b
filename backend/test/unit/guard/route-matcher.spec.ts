import { describe, it, expect } from 'vitest';
import { createRouteMatcher, patternToRegExp } from '../../../src/modules/guard/route-matcher';

function req(path: string, method = 'GET') {
  return { method, url: new URL(`https://app.dev${path}`) };
}

describe('patternToRegExp', () => {
  it('(.*) is the only wildcard, the rest is literal', () => {
    const re = patternToRegExp('/files/report.pdf');

    expect(re.test('/files/report.pdf')).toBe(true);
    expect(re.test('/files/reportxpdf')).toBe(false);
  });

  it('is anchored on both ends', () => {
    const re = patternToRegExp('/dashboard(.*)');

    expect(re.test('/dashboard')).toBe(true);
    expect(re.test('/dashboard/settings/billing')).toBe(true);
    expect(re.test('/public/dashboard')).toBe(false);
  });
});

describe('createRouteMatcher', () => {
  it('no patterns => everything public', () => {
    expect(createRouteMatcher([])(req('/dashboard'))).toBe(false);
    expect(createRouteMatcher([])(req('/%E0%A4%A'))).toBe(false);
  });

  it('matches against the pathname only (query ignored)', () => {
    const isProtected = createRouteMatcher(['/dashboard(.*)', '/account']);

    expect(isProtected(req('/dashboard?tab=1'))).toBe(true);
    expect(isProtected(req('/account'))).toBe(true);
    expect(isProtected(req('/account/extra'))).toBe(false);
    expect(isProtected(req('/about?next=/dashboard'))).toBe(false);
  });

  it('matches percent-encoded spellings of a protected path', () => {
    const isProtected = createRouteMatcher(['/dashboard(.*)']);

    expect(isProtected(req('/%64ashboard'))).toBe(true);
    expect(isProtected(req('/dashboar%64'))).toBe(true);
    expect(isProtected(req('/%64ashboard/settings'))).toBe(true);
    expect(isProtected(req('/about%2Fdashboard'))).toBe(false);
  });

  it('a path that cannot be decoded is treated as protected', () => {
    const isProtected = createRouteMatcher(['/dashboard(.*)']);

    expect(isProtected(req('/%E0%A4%A'))).toBe(true);
  });

  it('accepts RegExp patterns', () => {
    const isProtected = createRouteMatcher([/^\/admin\//]);

    expect(isProtected(req('/admin/users'))).toBe(true);
    expect(isProtected(req('/administrator'))).toBe(false);
  });

  it('passes predicates through unchanged', () => {
    const isProtected = createRouteMatcher((r) => r.method !== 'GET');

    expect(isProtected(req('/anything', 'POST'))).toBe(true);
    expect(isProtected(req('/anything', 'GET'))).toBe(false);
  });
});
