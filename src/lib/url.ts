/**
 * Feedgate — URL Canonicalization
 *
 * Normalizes links into the key used for uniqueness across
 * tracked items and seen records. Must stay pure: the same input
 * always yields the same key.
 */

/** Hosts that serve the same content under another name. */
const HOST_ALIASES: Record<string, string> = {
  'old.reddit.com': 'reddit.com',
  'np.reddit.com': 'reddit.com',
  'm.reddit.com': 'reddit.com',
  'new.reddit.com': 'reddit.com',
  'mobile.twitter.com': 'twitter.com',
  'm.youtube.com': 'youtube.com',
};

export const TRACKING_PARAMS: ReadonlySet<string> = new Set([
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'ref',
  'source',
  'fbclid',
  'gclid',
  'mc_cid',
  'mc_eid',
]);

function isTrackingParam(key: string): boolean {
  const lower = key.toLowerCase();
  return TRACKING_PARAMS.has(lower) || lower.startsWith('utm_');
}

function canonicalHost(hostname: string): string {
  let host = hostname.toLowerCase();
  if (host.startsWith('www.')) {
    host = host.slice(4);
  }
  return HOST_ALIASES[host] ?? host;
}

function paramName(pair: string): string {
  const raw = pair.split('=')[0] ?? '';
  try {
    return decodeURIComponent(raw.replace(/\+/g, ' '));
  } catch {
    return raw;
  }
}

/**
 * Drop tracking parameters, keeping the rest in their original order
 * and original encoding.
 */
function filterQuery(search: string): string {
  if (!search || search === '?') return '';

  const kept = search
    .slice(1)
    .split('&')
    .filter(pair => pair.length > 0 && !isTrackingParam(paramName(pair)));

  return kept.length > 0 ? `?${kept.join('&')}` : '';
}

/**
 * Canonicalize a URL. Malformed input and non-web schemes come back unchanged.
 */
export function canonicalizeUrl(input: string): string {
  let parsed: URL;
  try {
    parsed = new URL(input.trim());
  } catch {
    return input;
  }

  const protocol = parsed.protocol.toLowerCase();
  if (protocol !== 'http:' && protocol !== 'https:') {
    return input;
  }

  const host = canonicalHost(parsed.hostname);
  const port = parsed.port ? `:${parsed.port}` : '';
  const auth = parsed.username
    ? `${parsed.username}${parsed.password ? `:${parsed.password}` : ''}@`
    : '';
  const path = parsed.pathname.replace(/\/+$/, '') || '/';

  return `${protocol}//${auth}${host}${port}${path}${filterQuery(parsed.search)}`;
}

/**
 * Hostname without www., for display and attribution.
 */
export function getDomain(url: string): string {
  try {
    return canonicalHost(new URL(url).hostname);
  } catch {
    return 'unknown';
  }
}
