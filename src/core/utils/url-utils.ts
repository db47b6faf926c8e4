/**
 * URL utility functions
 */
import { createHash } from 'crypto';

/**
 * Extract domain from a URL or domain string
 * @param urlOrDomain - Full URL or domain string
 * @returns Clean domain (e.g., "example.com")
 */
export function extractDomain(urlOrDomain: string): string {
  try {
    // If it's already a clean domain (no protocol), return as-is
    if (!urlOrDomain.includes('://') && !urlOrDomain.includes('/')) {
      return urlOrDomain.toLowerCase();
    }

    const url = new URL(urlOrDomain.startsWith('http') ? urlOrDomain : `https://${urlOrDomain}`);
    return url.hostname.replace(/^www\./, '').toLowerCase();
  } catch {
    return urlOrDomain
      .replace(/^https?:\/\//, '')
      .replace(/^www\./, '')
      .split('/')[0]
      .toLowerCase();
  }
}

/**
 * Validate if a string is a valid http(s) URL
 */
export function isValidUrl(str: string): boolean {
  try {
    const url = new URL(str);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Canonical form of a grant locator: scheme and host lower-cased, default port,
 * fragment and trailing slash dropped. Query strings are kept since many grant
 * portals identify calls by them.
 */
export function canonicalizeUrl(url: string): string {
  const trimmed = url.trim();
  try {
    const parsed = new URL(trimmed);
    parsed.hash = '';
    // URL already lower-cases scheme/host and drops default ports
    let canonical = parsed.toString();
    if (parsed.search === '' && canonical.endsWith('/')) {
      canonical = canonical.slice(0, -1);
    }
    return canonical;
  } catch {
    return trimmed.endsWith('/') ? trimmed.slice(0, -1) : trimmed;
  }
}

/**
 * Stable grant identifier derived from the canonical source URL, never from titles
 * or extracted text.
 */
export function mkGrantId(url: string): string {
  return createHash('sha256').update(canonicalizeUrl(url)).digest('hex');
}

export function normalizeRecipientId(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * Filesystem-safe name for a site, used for `<site>_links.json`
 */
export function siteFileStem(site: string): string {
  return extractDomain(site).replace(/[^a-z0-9.-]+/gi, '_');
}
