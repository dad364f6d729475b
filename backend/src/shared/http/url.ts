/**
 * backend/src/shared/http/url.ts
 *
 * WHY:
 * - Return URLs must survive both redirect legs byte-for-byte.
 * - URL / URLSearchParams re-serialize the whole query (`%20` becomes `+`, order of
 *   duplicates, etc.), so the parameters we add and remove are handled textually.
 *
 * RULES:
 * - Only the named parameter is touched; every other byte of the URL is preserved.
 * - appendQueryParam always adds exactly one separator, so stripping it gives back
 *   the original string, trailing `?` or `&` included.
 * - Values are encoded with encodeURIComponent (never emits `+`).
 */

export function appendQueryParam(url: string, name: string, value: string): string {
  const hashIdx = url.indexOf('#');
  const base = hashIdx === -1 ? url : url.slice(0, hashIdx);
  const fragment = hashIdx === -1 ? '' : url.slice(hashIdx);

  const sep = base.includes('?') ? '&' : '?';

  return `${base}${sep}${encodeURIComponent(name)}=${encodeURIComponent(value)}${fragment}`;
}

/**
 * Removes every `name=...` pair from the query string of a raw URL or path.
 * Empty pairs are kept, so this is the exact inverse of appendQueryParam:
 * `/d?` → `/d?&k=v` → `/d?`. The `?` is dropped only when no pair remains.
 */
export function stripQueryParam(url: string, name: string): string {
  const hashIdx = url.indexOf('#');
  const beforeHash = hashIdx === -1 ? url : url.slice(0, hashIdx);
  const fragment = hashIdx === -1 ? '' : url.slice(hashIdx);

  const qIdx = beforeHash.indexOf('?');
  if (qIdx === -1) return url;

  const path = beforeHash.slice(0, qIdx);
  const kept = beforeHash
    .slice(qIdx + 1)
    .split('&')
    .filter((pair) => {
      const key = pair.split('=', 1)[0] ?? '';
      return key !== name && key !== encodeURIComponent(name);
    });

  return `${path}${kept.length > 0 ? `?${kept.join('&')}` : ''}${fragment}`;
}
