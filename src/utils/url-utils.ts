/**
 * Extract the hostname from a URL
 *
 * @throws Error if the URL cannot be parsed
 */
export function extractDomain(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    throw new Error(`Invalid URL: "${url}"`);
  }
}

/**
 * Check that a string is an http(s) URL
 */
export function isValidUrl(url: string): boolean {
  try {
    const { protocol } = new URL(url);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Clean a URL the way it usually arrives from a clipboard: surrounding
 * whitespace and one pair of matching quotes are removed.
 */
export function cleanUrlInput(raw: string): string {
  const trimmed = raw.trim();
  const quoted = trimmed.match(/^(["'])(.*)\1$/s);
  return (quoted?.[2] ?? trimmed).trim();
}

/**
 * Normalize a URL for use as a stable identifier: the fragment, `utm_*`
 * tracking parameters and a trailing slash are dropped.
 */
export function normalizeUrl(url: string): string {
  try {
    const urlObj = new URL(url);
    urlObj.hash = '';
    for (const key of Array.from(urlObj.searchParams.keys())) {
      if (key.startsWith('utm_')) {
        urlObj.searchParams.delete(key);
      }
    }
    if (urlObj.pathname.length > 1 && urlObj.pathname.endsWith('/')) {
      urlObj.pathname = urlObj.pathname.slice(0, -1);
    }
    return urlObj.toString();
  } catch {
    return url;
  }
}
