import { posix } from 'node:path';

/**
 * Extract domain from URL
 *
 * @param url - URL to extract domain from
 * @returns Domain (e.g., "feeds.example.com")
 */
export function extractDomain(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    throw new Error(`Invalid URL: "${url}"`);
  }
}

/**
 * Check if URL is a valid http(s) URL
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
 * Derive a subscription name from a feed URL: the host name without a
 * leading `www.`
 */
export function nameFromUrl(url: string): string {
  const domain = extractDomain(url);
  return domain.startsWith('www.') ? domain.slice(4) : domain;
}

/**
 * File extension of the URL's path, lower-cased and without the dot.
 * Query and fragment are ignored; returns undefined when there is none.
 */
export function extensionFromUrl(url: string): string | undefined {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return undefined;
  }

  const ext = posix.extname(decodeURIComponent(pathname)).slice(1).toLowerCase();
  return /^[a-z0-9]{1,5}$/.test(ext) ? ext : undefined;
}
