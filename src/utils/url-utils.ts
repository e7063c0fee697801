/**
 * URL helpers shared by analyzers and discovery
 */

/**
 * Parse an absolute http(s) URL, or return null
 */
export function parseHttpUrl(url: string): URL | null {
  try {
    const parsed = new URL(url);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:' ? parsed : null;
  } catch {
    return null;
  }
}

export function isHttpUrl(url: string): boolean {
  return parseHttpUrl(url) !== null;
}

/**
 * Resolve a possibly relative reference against a base URL.
 * Returns null for non-http(s) results (mailto:, javascript:, data:).
 */
export function resolveUrl(href: string, baseUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#')) return null;
  try {
    const resolved = new URL(trimmed, baseUrl);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;
    resolved.hash = '';
    return resolved.href;
  } catch {
    return null;
  }
}

/**
 * Same scheme, host and port
 */
export function isSameOrigin(a: string, b: string): boolean {
  const left = parseHttpUrl(a);
  const right = parseHttpUrl(b);
  return left !== null && right !== null && left.origin === right.origin;
}

function registrableHost(hostname: string): string {
  return hostname.toLowerCase().replace(/^www\./, '');
}

/**
 * Same host, ignoring a leading `www.` and the scheme
 */
export function isSameSite(a: string, b: string): boolean {
  const left = parseHttpUrl(a);
  const right = parseHttpUrl(b);
  return left !== null && right !== null && registrableHost(left.hostname) === registrableHost(right.hostname);
}

/**
 * Key used to dedupe URLs: lower-cased, no scheme, no leading `www.`, no
 * fragment, no trailing slash
 */
export function urlKey(url: string): string {
  const parsed = parseHttpUrl(url);
  const base = parsed ? `//${registrableHost(parsed.host)}${parsed.pathname}${parsed.search}` : url;
  return base.toLowerCase().replace(/#.*$/, '').replace(/\/+$/, '');
}

/**
 * Keep the first URL for each dedupe key, preserving order
 */
export function dedupeUrls(urls: Iterable<string>, limit = Number.POSITIVE_INFINITY): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const url of urls) {
    if (result.length >= limit) break;
    const key = urlKey(url);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(url);
  }
  return result;
}
