const TRACKING_PARAMS = new Set(['fbclid', 'gclid', 'ref', 'referer']);

function isTrackingParam(name: string): boolean {
  const key = name.toLowerCase();
  return TRACKING_PARAMS.has(key) || key.startsWith('utm_') || key.startsWith('referrer');
}

/**
 * Resolves `href` against `base` and strips everything that does not identify the
 * resource: fragment, tracking parameters, default port and trailing slash.
 * Returns null when no absolute http(s) URL can be built.
 */
export function canonicalizeUrl(href: string, base?: string): string | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#') || /^(javascript|mailto|tel):/i.test(trimmed)) {
    return null;
  }

  let url: URL;
  try {
    url = base ? new URL(trimmed, base) : new URL(trimmed);
  } catch {
    return null;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return null;
  }

  url.hash = '';
  const kept = [...url.searchParams.entries()]
    .filter(([name]) => !isTrackingParam(name))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  url.search = kept.length > 0 ? `?${new URLSearchParams(kept).toString()}` : '';

  if ((url.protocol === 'http:' && url.port === '80') || (url.protocol === 'https:' && url.port === '443')) {
    url.port = '';
  }
  if (url.pathname !== '/' && url.pathname.endsWith('/')) {
    url.pathname = url.pathname.replace(/\/+$/, '');
  }

  return url.toString();
}

/**
 * Key used by the dedup sweep. URL keys collapse when they differ only in URL noise
 * or in the case of scheme and host; path and query keep their case. Other keys
 * compare by whitespace-collapsed lowercase text.
 */
export function keyFingerprint(naturalKey: string): string {
  const canonical = /^https?:\/\//i.test(naturalKey.trim()) ? canonicalizeUrl(naturalKey) : null;
  if (canonical) {
    return canonical;
  }
  return naturalKey.replace(/\s+/g, ' ').trim().toLowerCase();
}
