/**
 * backend/src/shared/http/cookies.ts
 *
 * Parses a raw Cookie header into key-value pairs.
 * Handles the standard format: "key1=value1; key2=value2"
 */

export function parseCookies(raw: string | undefined): Record<string, string> {
  if (!raw) return {};

  const cookies: Record<string, string> = {};
  for (const pair of raw.split(';')) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) continue;

    const key = pair.substring(0, eqIdx).trim();
    const value = pair.substring(eqIdx + 1).trim();
    if (key) cookies[key] = value;
  }
  return cookies;
}
