/**
 * @module crawler/chunk-planner
 * @fileoverview Split the listing page range into fixed-size chunks.
 *
 * ```
 *   planChunks(250, 100)
 *   // => [ {1..100}, {101..200}, {201..250} ]
 * ```
 */

import { ConfigError } from "../utils/errors.js";

/** Inclusive range of listing pages processed as one unit. */
export interface CrawlRange {
  startPage: number;
  endPage: number;
}

/**
 * Contiguous, non-overlapping ranges covering `[1, totalPages]` in order.
 * Every range has `chunkSize` pages except possibly the last.
 *
 * @throws {ConfigError} If either argument is not a positive integer.
 */
export function planChunks(totalPages: number, chunkSize: number): CrawlRange[] {
  if (!Number.isInteger(totalPages) || totalPages < 1) {
    throw new ConfigError(`Total page count must be a positive integer, got ${totalPages}`, [
      "totalPages: must be >= 1",
    ]);
  }
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ConfigError(`Chunk size must be a positive integer, got ${chunkSize}`, [
      "chunkSize: must be >= 1",
    ]);
  }

  const ranges: CrawlRange[] = [];
  for (let startPage = 1; startPage <= totalPages; startPage += chunkSize) {
    ranges.push({ startPage, endPage: Math.min(totalPages, startPage + chunkSize - 1) });
  }
  return ranges;
}

/** Page numbers of a range, in order. */
export function pagesOf(range: CrawlRange): number[] {
  return Array.from({ length: range.endPage - range.startPage + 1 }, (_, i) => range.startPage + i);
}
