/**
 * @module utils/url
 * @fileoverview URL helpers for listing pagination and link resolution.
 *
 * @example
 * ```ts
 * listingPageUrl("https://forum.example.com/f/general", 1, "page");
 * // => "https://forum.example.com/f/general"
 *
 * listingPageUrl("https://forum.example.com/f/general", 3, "page");
 * // => "https://forum.example.com/f/general?page=3"
 *
 * resolveHref("/t/123", "https://forum.example.com/f/general");
 * // => "https://forum.example.com/t/123"
 * ```
 */

/** Schemes the transport can fetch. */
const FETCHABLE_SCHEMES: ReadonlySet<string> = new Set(["http:", "https:"]);

/**
 * URL of listing page `page` of a forum.
 *
 * Page 1 is the bare forum URL; later pages add `pageParam=<page>` to the
 * query string, replacing any existing value of that parameter.
 *
 * @throws {TypeError} If `forumUrl` is not an absolute URL.
 */
export function listingPageUrl(forumUrl: string, page: number, pageParam: string): string {
  if (page <= 1) {
    return forumUrl;
  }

  const url = new URL(forumUrl);
  url.searchParams.set(pageParam, String(page));
  return url.toString();
}

/**
 * Resolve an `href` taken from markup.
 *
 * With a base URL the result is absolute and must use http(s); without one
 * the trimmed href is returned unchanged. Returns `null` for empty,
 * fragment-only or unresolvable hrefs.
 */
export function resolveHref(href: string | undefined, baseUrl?: string): string | null {
  const trimmed = href?.trim() ?? "";
  if (trimmed === "" || trimmed.startsWith("#")) {
    return null;
  }

  if (baseUrl === undefined) {
    return trimmed;
  }

  try {
    const resolved = new URL(trimmed, baseUrl);
    if (!FETCHABLE_SCHEMES.has(resolved.protocol)) {
      return null;
    }
    resolved.hash = "";
    return resolved.toString();
  } catch {
    return null;
  }
}

/**
 * Whether `value` parses as an absolute http(s) URL.
 */
export function isFetchableUrl(value: string): boolean {
  try {
    return FETCHABLE_SCHEMES.has(new URL(value).protocol);
  } catch {
    return false;
  }
}
