/**
 * @module extractor/pagination
 * @fileoverview Read the highest listing page number from rendered markup.
 */

import * as cheerio from "cheerio";
import { DEFAULT_SELECTORS, type PaginationSelectors } from "./selectors.js";

/**
 * Highest page number among the "last page" links, or `null` when the page
 * has none with a positive integer page attribute.
 *
 * @example
 * ```ts
 * parseLastPage('<a class="last" data-type="last" data-page="412">Last</a>');
 * // => 412
 * ```
 */
export function parseLastPage(
  body: string | null | undefined,
  selectors: PaginationSelectors = DEFAULT_SELECTORS.pagination,
): number | null {
  if (!body) {
    return null;
  }

  const $ = cheerio.load(body);
  let last: number | null = null;

  $(selectors.lastPageLink).each((_, element) => {
    const raw = ($(element).attr(selectors.pageAttribute) ?? "").trim();
    if (!/^\d+$/.test(raw)) {
      return;
    }
    const page = Number.parseInt(raw, 10);
    if (page >= 1 && (last === null || page > last)) {
      last = page;
    }
  });

  return last;
}
