/**
 * Canonical job URLs. The canonical form is the dedup identity in the store:
 * two links that differ only in tracking parameters, fragment, query order,
 * host case or a trailing slash refer to the same posting.
 */

const TRACKING_PARAMS = new Set([
  'gclid',
  'fbclid',
  'mc_cid',
  'mc_eid',
  'ref',
  'src',
  'source',
  'trk',
  'trackingid',
]);

function isTrackingParam(key: string): boolean {
  const k = key.toLowerCase();
  return k.startsWith('utm_') || TRACKING_PARAMS.has(k);
}

/** Returns the trimmed input unchanged when it is not an absolute URL. */
export function canonicalizeJobUrl(rawUrl: string): string {
  const trimmed = rawUrl.trim();
  let u: URL;
  try {
    u = new URL(trimmed);
  } catch {
    return trimmed;
  }

  u.hash = '';
  u.hostname = u.hostname.toLowerCase();
  for (const key of Array.from(u.searchParams.keys())) {
    if (isTrackingParam(key)) u.searchParams.delete(key);
  }
  u.searchParams.sort();

  if (u.pathname.length > 1 && u.pathname.endsWith('/')) {
    u.pathname = u.pathname.replace(/\/+$/, '') || '/';
  }
  return u.toString();
}

