/**
 * @module extractor/listing-parser
 * @fileoverview Extract thread entries from a forum listing page.
 *
 * A listing page is a grid of cells. Each thread has a "name" cell with a
 * link to the thread and, next to it, a status cell whose icon says whether
 * the thread has a verified answer, a suggested answer, or none:
 *
 * ```
 *   <div class="icon cell answer-status"> <a class="verified ..."> </div>
 *   <div class="name cell"> <a class="internal-link view-post" href="..."> </div>
 * ```
 *
 * Depending on the skin the status cell comes before or after the name
 * cell, so both directions are searched.
 */

import * as cheerio from "cheerio";
import { resolveHref } from "../utils/url.js";
import { DEFAULT_SELECTORS, cleanText, type ListingSelectors } from "./selectors.js";

export type ListingStatus = "Answered" | "NotAnswered" | "Unknown";

export interface ListingItem {
  title: string;
  url: string;
  status: ListingStatus;
}

/**
 * Parse every thread entry out of a listing page.
 *
 * Items without a usable link are skipped. An empty or missing body gives
 * an empty list.
 *
 * @param body - Listing page markup, or `null` when the fetch failed.
 * @param baseUrl - URL the page was fetched from; relative hrefs are
 *   resolved against it. Without it hrefs are kept as written.
 *
 * @example
 * ```ts
 * const items = parseListing(html, "https://forum.example.com/f/general");
 * // [{ title: "Boot hangs", url: "https://forum.example.com/t/1", status: "Answered" }]
 * ```
 */
export function parseListing(
  body: string | null | undefined,
  baseUrl?: string,
  selectors: ListingSelectors = DEFAULT_SELECTORS.listing,
): ListingItem[] {
  if (!body) {
    return [];
  }

  const $ = cheerio.load(body);
  const items: ListingItem[] = [];

  $(selectors.item).each((_, element) => {
    const container = $(element);
    const link = container.find(selectors.link).first();
    if (link.length === 0) {
      return;
    }

    const url = resolveHref(link.attr("href"), baseUrl);
    if (url === null) {
      return;
    }

    const statusCell = container.prevAll(selectors.statusCell).first();
    const cell =
      statusCell.length > 0 ? statusCell : container.nextAll(selectors.statusCell).first();

    let status: ListingStatus = "Unknown";
    if (cell.length > 0) {
      if (selectors.answeredMarkers.some((marker) => cell.find(marker).length > 0)) {
        status = "Answered";
      } else if (selectors.unansweredMarkers.some((marker) => cell.find(marker).length > 0)) {
        status = "NotAnswered";
      }
    }

    items.push({ title: cleanText(link.text()), url, status });
  });

  return items;
}
