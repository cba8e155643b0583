// Listing link helpers: resolving hrefs against the page and the key that decides when two links are the same sale

const TRACKING_PARAMS = new Set(['gclid', 'fbclid', 'msclkid', 'ref', 'refid', 'source']);

function isTrackingParam(name: string): boolean {
  const n = name.toLowerCase();
  return n.startsWith('utm_') || n.startsWith('mc_') || TRACKING_PARAMS.has(n);
}

export function absoluteUrl(href: string | undefined | null, base: string): string | null {
  const h = String(href ?? '').trim();
  if (!h || h === '#' || /^javascript:/i.test(h)) return null;
  try { return new URL(h, base).toString(); } catch { return null; }
}

/**
 * De-duplication key for a listing URL: host without `www.`, path without
 * repeated or trailing slashes, remaining query parameters sorted. The scheme,
 * fragment and tracking parameters do not take part, so the http and https
 * links of one sale, or a link shared from a newsletter, collapse together.
 * Text that does not parse as a URL is its own key.
 */
export function listingKey(url: string): string {
  let u: URL;
  try {
    u = new URL(url.trim());
  } catch {
    return url.trim();
  }
  const host = u.hostname.toLowerCase().replace(/^www\./, '');
  const port = u.port ? `:${u.port}` : '';
  const path = u.pathname.replace(/\/{2,}/g, '/').replace(/(.)\/$/, '$1');
  const params = [...u.searchParams.entries()]
    .filter(([name]) => !isTrackingParam(name))
    .sort(([a, av], [b, bv]) => a.localeCompare(b) || av.localeCompare(bv))
    .map(([name, value]) => `${encodeURIComponent(name)}=${encodeURIComponent(value)}`);
  return `${host}${port}${path}${params.length ? `?${params.join('&')}` : ''}`;
}
