import markers from '../data/markers.json';

const TRACKING_PARAMS = new Set(markers.trackingParams.map((param) => param.toLowerCase()));

function isTrackingParam(name: string): boolean {
  const lower = name.toLowerCase();
  return lower.startsWith('utm_') || TRACKING_PARAMS.has(lower);
}

const SESSION_PARAMS = new Set(markers.sessionParams.map((param) => param.toLowerCase()));
// account history pages refuse to render without the reader's session parameters
const SESSION_PATHS = /^\/mp\/profile_ext\b/;

function isDroppedParam(name: string, pathname: string): boolean {
  return isTrackingParam(name) || (SESSION_PARAMS.has(name.toLowerCase()) && !SESSION_PATHS.test(pathname));
}

/**
 * Canonical key for dedup: absolute, https, lowercase host, no fragment,
 * no tracking parameters, remaining parameters sorted. Reader session
 * parameters survive on account history pages and are dropped elsewhere.
 */
export function canonicalizeUrl(input: string, base?: string): string | null {
  const trimmed = input.trim();
  if (!trimmed || /^(javascript|mailto|tel|data):/i.test(trimmed)) {
    return null;
  }

  let url: URL;
  try {
    const withScheme = trimmed.startsWith('//') ? `https:${trimmed}` : trimmed;
    url = base ? new URL(withScheme, base) : new URL(withScheme);
  } catch {
    return null;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return null;
  }

  url.protocol = 'https:';
  url.hostname = url.hostname.toLowerCase();
  url.hash = '';
  url.username = '';
  url.password = '';
  if (url.port === '443' || url.port === '80') {
    url.port = '';
  }

  const kept = [...url.searchParams.entries()]
    .filter(([name]) => !isDroppedParam(name, url.pathname))
    .sort(([a, av], [b, bv]) => (a === b ? av.localeCompare(bv) : a.localeCompare(b)));
  url.search = '';
  for (const [name, value] of kept) {
    url.searchParams.append(name, value);
  }

  if (url.pathname.length > 1 && url.pathname.endsWith('/')) {
    url.pathname = url.pathname.replace(/\/+$/, '');
  }

  return url.toString();
}

/** Strips tracking parameters from an asset URL without touching anything else. */
export function stripTracking(input: string, base?: string): string | null {
  let url: URL;
  try {
    const withScheme = input.trim().startsWith('//') ? `https:${input.trim()}` : input.trim();
    url = base ? new URL(withScheme, base) : new URL(withScheme);
  } catch {
    return null;
  }
  for (const name of [...url.searchParams.keys()]) {
    if (isDroppedParam(name, url.pathname)) {
      url.searchParams.delete(name);
    }
  }
  return url.toString();
}

export function isArticleUrl(input: string, hosts: readonly string[]): boolean {
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    return false;
  }
  if (!hosts.includes(url.hostname.toLowerCase())) {
    return false;
  }
  if (url.searchParams.has('action')) {
    return false;
  }
  return url.pathname === '/s' || url.pathname.startsWith('/s/');
}

export function getQueryParam(input: string, name: string): string | null {
  try {
    return new URL(input).searchParams.get(name);
  } catch {
    return null;
  }
}

/** Account history pages and album directories: fetched for their links, never extracted. */
export function isListingUrl(input: string, hosts: readonly string[]): boolean {
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    return false;
  }
  if (!hosts.includes(url.hostname.toLowerCase())) {
    return false;
  }
  if (url.pathname === '/mp/profile_ext') {
    const action = url.searchParams.get('action');
    return action === 'home' || action === 'getmsg';
  }
  return url.pathname === '/mp/appmsgalbum' || url.pathname === '/mp/homepage';
}
