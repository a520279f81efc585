import { LUMA_CONFIG } from './config.js';

/**
 * Normalize an event link into the form used as the dedup key: https,
 * lower-case host without `www.`, no query, no fragment, no trailing slash.
 * Relative links resolve against `base`. Returns null for anything that is
 * not an http(s) URL.
 */
export function canonicalizeEventUrl(href: string, base: string = LUMA_CONFIG.BASE_URL): string | null {
  let parsed: URL;
  try {
    parsed = new URL(href.trim(), base);
  } catch {
    return null;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return null;
  }

  const host = parsed.hostname.toLowerCase().replace(/^www\./, '');
  const port = parsed.port ? `:${parsed.port}` : '';
  let path = parsed.pathname.replace(/\/{2,}/g, '/');
  if (path.length > 1) {
    path = path.replace(/\/+$/, '');
  }

  return `https://${host}${port}${path || '/'}`;
}

/**
 * True when `url` (already canonical) points at a single event page on the
 * site host rather than a listing, account or static page.
 */
export function isEventUrl(url: string, base: string = LUMA_CONFIG.BASE_URL): boolean {
  let parsed: URL;
  let site: URL;
  try {
    parsed = new URL(url);
    site = new URL(base);
  } catch {
    return false;
  }

  const siteHost = site.hostname.toLowerCase().replace(/^www\./, '');
  if (parsed.hostname !== siteHost) {
    return false;
  }

  const segments = parsed.pathname.split('/').filter(Boolean);
  if (segments.length === 0) {
    return false;
  }

  const first = `/${segments[0].toLowerCase()}`;
  if (LUMA_CONFIG.NON_EVENT_PATHS.some(path => path === first)) {
    return false;
  }

  // Event pages live at /<slug>, optionally under /e/<slug>
  return segments.length === 1 || (segments.length === 2 && segments[0] === 'e');
}

/** Build the listing surface for a named calendar, or the discover page. */
export function searchSurfaceUrl(base: string, calendar?: string): string {
  const root = base.replace(/\/+$/, '');
  if (!calendar) {
    return `${root}${LUMA_CONFIG.DISCOVER_PATH}`;
  }

  const slug = calendar
    .trim()
    .replace(/^https?:\/\/[^/]+\//i, '')
    .replace(/^\/+|\/+$/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9/_-]+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-|-$/g, '');

  return slug ? `${root}/${slug}` : `${root}${LUMA_CONFIG.DISCOVER_PATH}`;
}
