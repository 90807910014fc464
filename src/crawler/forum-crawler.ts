/**
 * @module crawler/forum-crawler
 * @fileoverview Chunked two-pass crawl of a paginated Q&A forum.
 *
 * ## Phases
 *
 * ```
 *   Probe ──> for each chunk ──────────────────────────────────────────┐
 *              ListingPhase ─> FilterPhase ─> DetailPhase ─> Flush ──┘
 *                                                                   └─> Done
 * ```
 *
 * - **Probe**: page count from the override, else from the rendered first
 *   listing page, else 1.
 * - **ListingPhase**: every listing page of the chunk through the listing
 *   gate; parse each body into {@link ListingItem}s.
 * - **FilterPhase**: drop threads in the SeenSet, threads already emitted
 *   this run, and threads without an answer.
 * - **DetailPhase**: every remaining thread through the detail gate; parse
 *   question and answer.
 * - **Flush**: append the records and, with checkpointing on, rewrite the
 *   artifact.
 *
 * ## Failure Model
 * Request failures come back from the transport as values and are counted,
 * never thrown. A failed listing page contributes no items; a failed detail
 * page yields the placeholder question/answer pair (or nothing, when
 * `keepFailedDetails` is off). Only configuration errors and artifact write
 * failures end a run early.
 *
 * ## Resuming
 * Artifacts of earlier runs in `priorArtifactsDir` form the SeenSet. If the
 * run's own output file already exists (an interrupted run on the same day),
 * its records are carried over and their threads are not fetched again.
 *
 * ## Cancellation
 * The optional `signal` reaches every request. It is checked between
 * phases; once it fires the run writes what it has and returns with
 * `aborted: true`.
 *
 * @example
 * ```ts
 * import { loadConfig } from "../config.js";
 * import { crawlForum } from "./forum-crawler.js";
 *
 * const report = await crawlForum(loadConfig());
 * console.log(`${report.stats.records} new records in ${report.outputPath}`);
 * ```
 */

import type { CrawlConfig } from "../config.js";
import { parseDetail } from "../extractor/detail-parser.js";
import { parseListing, type ListingItem } from "../extractor/listing-parser.js";
import { parseLastPage } from "../extractor/pagination.js";
import { DEFAULT_SELECTORS, type ForumSelectors } from "../extractor/selectors.js";
import {
  FETCH_FAILURE_KINDS,
  HttpTransport,
  type FetchFailureKind,
  type FetchOutcome,
  type PageTransport,
} from "../services/fetch.js";
import { RequestGate } from "../services/queue.js";
import { writeArtifact } from "../store/artifact-writer.js";
import {
  loadSeenSet,
  readArtifact,
  type DetailRecord,
  type SeenSet,
} from "../store/dedup-store.js";
import { formatError } from "../utils/errors.js";
import { log, type LogFields } from "../utils/log.js";
import { listingPageUrl } from "../utils/url.js";
import { pagesOf, planChunks, type CrawlRange } from "./chunk-planner.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/** Counters for one chunk or a whole run. */
export interface CrawlStats {
  /** Listing pages requested. */
  listingPages: number;
  /** Listing pages that returned no body. */
  listingFailures: number;
  /** Threads found on listing pages. */
  itemsListed: number;
  /** Threads skipped because an earlier artifact has them. */
  skippedSeen: number;
  /** Threads skipped because this run already emitted or queued them. */
  skippedDuplicate: number;
  /** Threads marked unanswered. */
  notAnswered: number;
  /** Threads with no recognizable status marker. */
  unknownStatus: number;
  /** Threads sent to the detail phase. */
  answered: number;
  /** Detail pages fetched successfully. */
  detailFetched: number;
  /** Detail pages that returned no body. */
  detailFailures: number;
  /** Records added to the artifact. */
  records: number;
  /** Failed requests of both phases, per classification. */
  failures: Record<FetchFailureKind, number>;
}

export interface CrawlReport {
  totalPages: number;
  /** Ranges actually processed; shorter than planned when aborted. */
  chunks: CrawlRange[];
  stats: CrawlStats;
  /** Everything written to the artifact, carried-over records first. */
  records: DetailRecord[];
  /** Records carried over from an existing output file. */
  resumedRecords: number;
  outputPath: string;
  aborted: boolean;
  elapsedMs: number;
}

export interface CrawlDependencies {
  /** Defaults to an {@link HttpTransport} built from the config. */
  transport?: PageTransport;
  /** Defaults to {@link DEFAULT_SELECTORS}. */
  selectors?: ForumSelectors;
  /** Run-level cancellation. */
  signal?: AbortSignal;
  /** Source of randomness for request pacing. */
  random?: () => number;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Stats Helpers
 * ──────────────────────────────────────────────────────────────────────────── */

export function emptyStats(): CrawlStats {
  return {
    listingPages: 0,
    listingFailures: 0,
    itemsListed: 0,
    skippedSeen: 0,
    skippedDuplicate: 0,
    notAnswered: 0,
    unknownStatus: 0,
    answered: 0,
    detailFetched: 0,
    detailFailures: 0,
    records: 0,
    failures: { blocked: 0, http_error: 0, network_error: 0, timeout: 0, aborted: 0 },
  };
}

function addStats(total: CrawlStats, chunk: CrawlStats): void {
  total.listingPages += chunk.listingPages;
  total.listingFailures += chunk.listingFailures;
  total.itemsListed += chunk.itemsListed;
  total.skippedSeen += chunk.skippedSeen;
  total.skippedDuplicate += chunk.skippedDuplicate;
  total.notAnswered += chunk.notAnswered;
  total.unknownStatus += chunk.unknownStatus;
  total.answered += chunk.answered;
  total.detailFetched += chunk.detailFetched;
  total.detailFailures += chunk.detailFailures;
  total.records += chunk.records;
  for (const kind of FETCH_FAILURE_KINDS) {
    total.failures[kind] += chunk.failures[kind];
  }
}

function statsFields(stats: CrawlStats): LogFields {
  return {
    listed: stats.itemsListed,
    seen: stats.skippedSeen,
    duplicate: stats.skippedDuplicate,
    unanswered: stats.notAnswered,
    unknown: stats.unknownStatus,
    answered: stats.answered,
    fetched: stats.detailFetched,
    failed: stats.listingFailures + stats.detailFailures,
    blocked: stats.failures.blocked,
    timeouts: stats.failures.timeout,
    records: stats.records,
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Phases
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Decide how many listing pages to crawl.
 *
 * @returns The override when set; otherwise the last page found on the
 *   rendered first listing page; otherwise 1.
 */
export async function probeTotalPages(
  config: CrawlConfig,
  transport: PageTransport,
  selectors: ForumSelectors = DEFAULT_SELECTORS,
  signal?: AbortSignal,
): Promise<number> {
  if (config.totalPages !== undefined) {
    log.info("forum-crawler", "using configured page count", { totalPages: config.totalPages });
    return config.totalPages;
  }

  const outcome = await transport.fetchRendered(config.forumUrl, signal);
  const lastPage = outcome.ok ? parseLastPage(outcome.body, selectors.pagination) : null;
  if (lastPage !== null) {
    log.info("forum-crawler", "detected last listing page", { totalPages: lastPage });
    return lastPage;
  }

  log.warn("forum-crawler", "could not determine page count, defaulting to 1", {
    url: config.forumUrl,
    cause: outcome.ok ? "no pagination links in rendered page" : outcome.cause,
  });
  return 1;
}

/**
 * Keep only threads that warrant a detail fetch, recording why the others
 * were dropped. `claimed` collects accepted URLs so a thread listed twice
 * in one run is fetched once.
 */
export function selectAnswered(
  items: readonly ListingItem[],
  seen: SeenSet,
  claimed: Set<string>,
  stats: CrawlStats,
): ListingItem[] {
  const selected: ListingItem[] = [];

  for (const item of items) {
    if (seen.has(item.url)) {
      stats.skippedSeen += 1;
    } else if (claimed.has(item.url)) {
      stats.skippedDuplicate += 1;
    } else if (item.status === "NotAnswered") {
      stats.notAnswered += 1;
    } else if (item.status === "Unknown") {
      stats.unknownStatus += 1;
    } else {
      claimed.add(item.url);
      selected.push(item);
    }
  }

  stats.answered += selected.length;
  return selected;
}

function countFailure(stats: CrawlStats, outcome: FetchOutcome): void {
  if (!outcome.ok) {
    stats.failures[outcome.kind] += 1;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Main Crawl Function
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Run a full crawl and write the artifact.
 *
 * @throws {ConfigError} If the page count or chunk size is not a positive
 *   integer.
 * @throws {PersistenceError} If a checkpoint or the final artifact cannot
 *   be written.
 */
export async function crawlForum(
  config: CrawlConfig,
  deps: CrawlDependencies = {},
): Promise<CrawlReport> {
  const startedAt = Date.now();
  const selectors = deps.selectors ?? DEFAULT_SELECTORS;
  const signal = deps.signal;
  const transport =
    deps.transport ??
    new HttpTransport({
      userAgent: config.userAgent,
      timeoutMs: config.fetchTimeoutMs,
      renderTimeoutMs: config.renderTimeoutMs,
      renderSettleMs: config.renderSettleMs,
    });

  // ── Prior state ──
  const seen = await loadSeenSet(config.priorArtifactsDir, { exclude: [config.outputPath] });

  let resumed: DetailRecord[] = [];
  try {
    resumed = (await readArtifact(config.outputPath)) ?? [];
  } catch (error) {
    log.warn("forum-crawler", "ignoring unreadable output file, it will be overwritten", {
      file: config.outputPath,
      cause: formatError(error),
    });
  }

  const records: DetailRecord[] = [];
  const claimed = new Set<string>();
  for (const record of resumed) {
    if (!claimed.has(record.url)) {
      claimed.add(record.url);
      records.push(record);
    }
  }
  const resumedRecords = records.length;
  if (resumedRecords > 0) {
    log.info("forum-crawler", "resuming from existing output", {
      file: config.outputPath,
      records: records.length,
    });
  }

  // ── Probe ──
  const totalPages = await probeTotalPages(config, transport, selectors, signal);
  const ranges = planChunks(totalPages, config.chunkSize);

  const listingGate = new RequestGate({
    concurrency: config.listingConcurrency,
    minDelayMs: config.requestDelayMinMs,
    maxDelayMs: config.requestDelayMaxMs,
    signal,
    random: deps.random,
  });
  const detailGate = new RequestGate({
    concurrency: config.detailConcurrency,
    minDelayMs: config.requestDelayMinMs,
    maxDelayMs: config.requestDelayMaxMs,
    signal,
    random: deps.random,
  });

  const totals = emptyStats();
  const processed: CrawlRange[] = [];
  let aborted = false;

  for (const range of ranges) {
    if (signal?.aborted) {
      aborted = true;
      break;
    }

    log.info("forum-crawler", "processing chunk", {
      pages: `${range.startPage}-${range.endPage}`,
    });
    const chunk = emptyStats();

    // ── ListingPhase ──
    const listingUrls = pagesOf(range).map((page) =>
      listingPageUrl(config.forumUrl, page, config.pageParam),
    );
    const listingOutcomes = await listingGate.map(listingUrls, (url) =>
      transport.fetchPage(url, signal),
    );

    const listed: ListingItem[] = [];
    for (const outcome of listingOutcomes) {
      chunk.listingPages += 1;
      if (outcome.ok) {
        listed.push(...parseListing(outcome.body, outcome.url, selectors.listing));
      } else {
        chunk.listingFailures += 1;
        countFailure(chunk, outcome);
      }
    }
    chunk.itemsListed = listed.length;

    // ── FilterPhase ──
    const answered = selectAnswered(listed, seen, claimed, chunk);

    if (signal?.aborted) {
      aborted = true;
      addStats(totals, chunk);
      processed.push(range);
      break;
    }

    // ── DetailPhase ──
    const detailOutcomes = await detailGate.map(answered, (item) =>
      transport.fetchPage(item.url, signal),
    );

    const chunkRecords: DetailRecord[] = [];
    answered.forEach((item, index) => {
      const outcome = detailOutcomes[index];
      if (outcome.ok) {
        chunk.detailFetched += 1;
      } else {
        chunk.detailFailures += 1;
        countFailure(chunk, outcome);
        if (outcome.kind === "aborted" || !config.keepFailedDetails) {
          claimed.delete(item.url);
          return;
        }
      }

      const { question, answer } = parseDetail(outcome.ok ? outcome.body : null, selectors.detail);
      chunkRecords.push({ title: item.title, url: item.url, question, answer });
    });

    // ── Flush ──
    records.push(...chunkRecords);
    chunk.records = chunkRecords.length;
    addStats(totals, chunk);
    processed.push(range);

    if (config.checkpoint) {
      await writeArtifact(config.outputPath, records);
    }

    log.info("forum-crawler", "chunk complete", {
      pages: `${range.startPage}-${range.endPage}`,
      ...statsFields(chunk),
    });
  }

  if (signal?.aborted) {
    aborted = true;
  }

  // ── Done ──
  await writeArtifact(config.outputPath, records);

  const elapsedMs = Date.now() - startedAt;
  log.info("forum-crawler", aborted ? "run aborted, partial results saved" : "run complete", {
    file: config.outputPath,
    chunks: `${processed.length}/${ranges.length}`,
    total: records.length,
    elapsedMs,
    ...statsFields(totals),
  });

  return {
    totalPages,
    chunks: processed,
    stats: totals,
    records,
    resumedRecords,
    outputPath: config.outputPath,
    aborted,
    elapsedMs,
  };
}
