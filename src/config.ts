/**
 * @module config
 * @fileoverview Run parameters for the forum crawler, loaded from environment
 * variables and optionally overridden from the command line.
 *
 * Every setting has a default so a bare `forum-qa-crawler` invocation works.
 * Values are validated with zod; anything out of range raises a
 * {@link ConfigError} before the first request goes out.
 *
 * ## Architecture Position
 * Imported by the CLI and the orchestrator; imports only the error types and
 * URL helpers from the rest of the application.
 *
 * ```
 *  +---------+   +-----------------+
 *  |   cli   |   |  forum-crawler  |
 *  +----+----+   +--------+--------+
 *       |                 |
 *       +--------+--------+
 *                |
 *          +-----v-----+
 *          |  config   |
 *          +-----------+
 * ```
 *
 * ## Environment Variables
 * | Variable                | Setting              | Default                      |
 * |-------------------------|----------------------|------------------------------|
 * | `FORUM_URL`             | `forumUrl`           | processors forum             |
 * | `FORUM_PAGE_PARAM`      | `pageParam`          | `pifragment-322293`          |
 * | `DATA_DIR`              | `dataDir`            | `data`                       |
 * | `OUTPUT_PATH`           | `outputPath`         | `<dataDir>/answered_forum_<date>.json` |
 * | `PRIOR_ARTIFACTS_DIR`   | `priorArtifactsDir`  | `<dataDir>`                  |
 * | `CHUNK_SIZE`            | `chunkSize`          | `100`                        |
 * | `TOTAL_PAGES`           | `totalPages`         | probed                       |
 * | `LISTING_CONCURRENCY`   | `listingConcurrency` | `5`                          |
 * | `DETAIL_CONCURRENCY`    | `detailConcurrency`  | `10`                         |
 * | `REQUEST_DELAY_MIN_MS`  | `requestDelayMinMs`  | `100`                        |
 * | `REQUEST_DELAY_MAX_MS`  | `requestDelayMaxMs`  | `300`                        |
 * | `FETCH_TIMEOUT_MS`      | `fetchTimeoutMs`     | `30000`                      |
 * | `RENDER_TIMEOUT_MS`     | `renderTimeoutMs`    | `60000`                      |
 * | `RENDER_SETTLE_MS`      | `renderSettleMs`     | `1000`                       |
 * | `USER_AGENT`            | `userAgent`          | desktop Chrome               |
 * | `CHECKPOINT`            | `checkpoint`         | `true`                       |
 * | `KEEP_FAILED_DETAILS`   | `keepFailedDetails`  | `true`                       |
 *
 * @example
 * ```ts
 * import { loadConfig } from "./config.js";
 *
 * const config = loadConfig(process.env, { chunkSize: 50 });
 * config.listingConcurrency; // 5
 * ```
 */

import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./utils/errors.js";
import { isFetchableUrl } from "./utils/url.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Defaults
 * ──────────────────────────────────────────────────────────────────────────── */

export const DEFAULT_FORUM_URL =
  "https://e2e.ti.com/support/processors-group/processors/f/processors-forum";

export const DEFAULT_PAGE_PARAM = "pifragment-322293";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 12_6) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/112.0.0.0 Safari/537.36";

/* ────────────────────────────────────────────────────────────────────────────
 * Schema
 * ──────────────────────────────────────────────────────────────────────────── */

const positiveInt = z.coerce.number().int().min(1, "must be >= 1");
const nonNegativeInt = z.coerce.number().int().min(0, "must be >= 0");

const flag = z.preprocess((value) => {
  if (typeof value !== "string") {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "off"].includes(normalized)) return false;
  return value;
}, z.boolean());

const ConfigSchema = z
  .object({
    forumUrl: z
      .string()
      .refine(isFetchableUrl, "must be an absolute http(s) URL")
      .default(DEFAULT_FORUM_URL),
    pageParam: z.string().min(1).default(DEFAULT_PAGE_PARAM),
    dataDir: z.string().min(1).default("data"),
    outputPath: z.string().min(1).optional(),
    priorArtifactsDir: z.string().min(1).optional(),
    chunkSize: positiveInt.default(100),
    totalPages: positiveInt.optional(),
    listingConcurrency: positiveInt.default(5),
    detailConcurrency: positiveInt.default(10),
    requestDelayMinMs: nonNegativeInt.default(100),
    requestDelayMaxMs: nonNegativeInt.default(300),
    fetchTimeoutMs: positiveInt.default(30_000),
    renderTimeoutMs: positiveInt.default(60_000),
    renderSettleMs: nonNegativeInt.default(1_000),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
    checkpoint: flag.default(true),
    keepFailedDetails: flag.default(true),
  })
  .refine((value) => value.requestDelayMinMs <= value.requestDelayMaxMs, {
    message: "must not exceed requestDelayMaxMs",
    path: ["requestDelayMinMs"],
  });

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Fully resolved run parameters.
 */
export interface CrawlConfig {
  /** First listing page of the forum. Later pages add {@link pageParam}. */
  forumUrl: string;
  /** Query parameter carrying the listing page number. */
  pageParam: string;
  /** Directory holding artifacts when no explicit paths are given. */
  dataDir: string;
  /** Where this run writes its artifact. */
  outputPath: string;
  /** Directory scanned for earlier artifacts to build the SeenSet. */
  priorArtifactsDir: string;
  /** Listing pages per chunk. */
  chunkSize: number;
  /** Explicit page count; skips the rendered probe when set. */
  totalPages?: number;
  /** In-flight listing requests. Kept lower than detail requests. */
  listingConcurrency: number;
  /** In-flight detail requests. */
  detailConcurrency: number;
  /** Lower bound of the random pause before each request. */
  requestDelayMinMs: number;
  /** Upper bound of the random pause before each request. */
  requestDelayMaxMs: number;
  /** Per-request timeout. */
  fetchTimeoutMs: number;
  /** Budget for the rendered page-count probe, download and scripts included. */
  renderTimeoutMs: number;
  /** Extra wait after `load` for scripts that build pagination late. */
  renderSettleMs: number;
  /** `User-Agent` header sent on every request. */
  userAgent: string;
  /** Rewrite the artifact after every chunk. */
  checkpoint: boolean;
  /**
   * Emit a placeholder record when an answered thread's detail page cannot
   * be fetched. When off, the thread is left out and a later run retries it.
   */
  keepFailedDetails: boolean;
}

/** Settings a caller (usually the CLI) may override. */
export type ConfigOverrides = Partial<Record<keyof CrawlConfig, string | number | boolean>>;

type Env = Record<string, string | undefined>;

/* ────────────────────────────────────────────────────────────────────────────
 * Loader
 * ──────────────────────────────────────────────────────────────────────────── */

const ENV_KEYS: Record<keyof CrawlConfig, string> = {
  forumUrl: "FORUM_URL",
  pageParam: "FORUM_PAGE_PARAM",
  dataDir: "DATA_DIR",
  outputPath: "OUTPUT_PATH",
  priorArtifactsDir: "PRIOR_ARTIFACTS_DIR",
  chunkSize: "CHUNK_SIZE",
  totalPages: "TOTAL_PAGES",
  listingConcurrency: "LISTING_CONCURRENCY",
  detailConcurrency: "DETAIL_CONCURRENCY",
  requestDelayMinMs: "REQUEST_DELAY_MIN_MS",
  requestDelayMaxMs: "REQUEST_DELAY_MAX_MS",
  fetchTimeoutMs: "FETCH_TIMEOUT_MS",
  renderTimeoutMs: "RENDER_TIMEOUT_MS",
  renderSettleMs: "RENDER_SETTLE_MS",
  userAgent: "USER_AGENT",
  checkpoint: "CHECKPOINT",
  keepFailedDetails: "KEEP_FAILED_DETAILS",
};

/**
 * Name of the artifact a run writes when no output path is configured:
 * `answered_forum_<YYYY-MM-DD>.json`, dated in UTC.
 */
export function defaultOutputName(now: Date = new Date()): string {
  return `answered_forum_${now.toISOString().slice(0, 10)}.json`;
}

/**
 * Build a {@link CrawlConfig} from environment variables and overrides.
 *
 * Empty environment values count as unset. Overrides win over the
 * environment.
 *
 * @throws {ConfigError} When any setting fails validation. `issues` lists
 *   every offending setting, not only the first.
 */
export function loadConfig(
  env: Env = process.env,
  overrides: ConfigOverrides = {},
  now: Date = new Date(),
): CrawlConfig {
  const raw: Record<string, unknown> = {};

  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName];
    if (value !== undefined && value.trim() !== "") {
      raw[key] = value.trim();
    }
  }

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      raw[key] = value;
    }
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  const settings = parsed.data;
  return {
    ...settings,
    outputPath: settings.outputPath ?? path.join(settings.dataDir, defaultOutputName(now)),
    priorArtifactsDir: settings.priorArtifactsDir ?? settings.dataDir,
  };
}
