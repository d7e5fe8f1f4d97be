/**
 * URL manipulation utilities
 */

/**
 * Builds the URL of listing page `pageNumber` (1-based). Page 1 is the bare
 * category URL; later pages append `page=n` to the query string.
 */
export function listingPageUrl(categoryUrl: string, pageNumber: number): string {
  if (pageNumber <= 1) return categoryUrl;
  const sep = categoryUrl.includes("?") ? "&" : "?";
  return `${categoryUrl}${sep}page=${pageNumber}`;
}

/**
 * Resolves a relative or absolute location URL against a base URL
 * @returns Resolved absolute URL or null if invalid
 */
export function resolveLocation(baseUrl: string, loc: string): string | null {
  try {
    if (/^https?:/i.test(loc)) return new URL(loc).toString();
    if (loc.startsWith("//")) return new URL(`https:${loc}`).toString();
    return new URL(loc, baseUrl).toString();
  } catch {
    return null;
  }
}

/**
 * True when `host` equals `baseHost` or is one of its subdomains
 */
export function isOnHost(host: string, baseHost: string): boolean {
  const h = host.toLowerCase();
  const b = baseHost.toLowerCase();
  return h === b || h.endsWith(`.${b}`);
}
