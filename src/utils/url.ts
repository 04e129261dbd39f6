/**
 * URL helpers
 */

/**
 * Extract the lower-cased host (with port, if any) from a URL
 */
export function getDomain(url: string): string {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return '';
  }
}

/**
 * Resolve a possibly relative reference against a base URL
 */
export function resolveUrl(href: string, baseUrl: string): string | undefined {
  try {
    return new URL(href.trim(), baseUrl).toString();
  } catch {
    return undefined;
  }
}
