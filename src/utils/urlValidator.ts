const DEFAULT_PORTS: Record<string, string> = {
  'http:': '80',
  'https:': '443',
};

const TRACKING_PARAMS = new Set([
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'gclid',
  'fbclid',
  'igshid',
  'mc_cid',
  'mc_eid',
]);

/**
 * Prefix scheme-less input with https://
 */
export function ensureScheme(input: string): string {
  const trimmed = input.trim();
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

const removeTrackingParams = (params: URLSearchParams): void => {
  for (const key of Array.from(params.keys())) {
    if (TRACKING_PARAMS.has(key.toLowerCase())) params.delete(key);
  }
};

const sortParams = (params: URLSearchParams): string => {
  const sorted = new URLSearchParams();
  Array.from(new Set(params.keys()))
    .sort()
    .forEach(k => params.getAll(k).forEach(v => sorted.append(k, v)));
  return sorted.toString();
};

export function normalizeUrl(input: string): string {
  const url = new URL(input);
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error('Only http(s) URLs are supported');
  }

  url.protocol = url.protocol.toLowerCase();
  url.hostname = url.hostname.toLowerCase();

  if (url.port && DEFAULT_PORTS[url.protocol] === url.port) {
    url.port = '';
  }

  url.hash = '';

  const params = new URLSearchParams(url.search);
  removeTrackingParams(params);
  url.search = sortParams(params);

  let pathname = url.pathname;
  if (!pathname) pathname = '/';
  pathname = pathname.replace(/\/{2,}/g, '/');
  if (pathname.length > 1 && pathname.endsWith('/')) pathname = pathname.slice(0, -1);
  url.pathname = pathname;

  return url.toString();
}

/**
 * Identity used to deduplicate links found in a deck: normalized, without a
 * leading `www.`, and without the trailing slash on a bare origin.
 */
export function canonicalizeLink(input: string): string {
  const url = new URL(normalizeUrl(ensureScheme(input)));
  if (url.hostname.startsWith('www.')) {
    url.hostname = url.hostname.slice(4);
  }

  if (url.pathname === '/' && !url.search) {
    return url.origin;
  }
  return url.toString();
}

export function hostOf(input: string): string | null {
  try {
    return new URL(ensureScheme(input)).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return null;
  }
}

/**
 * True when `host` is `domain` itself or one of its subdomains.
 */
export function hostMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}
