/**
 * @module cli
 * @fileoverview Command-line surface of the crawler.
 *
 * Flags override the matching environment variables (see {@link loadConfig}).
 *
 * ```
 * forum-qa-crawler [--total-pages N] [--chunk-size N] [--output FILE]
 *                  [--prior-dir DIR] [--data-dir DIR] [--forum-url URL]
 *                  [--listing-concurrency N] [--detail-concurrency N]
 *                  [--timeout MS] [--no-checkpoint] [--help]
 * ```
 */

import { parseArgs } from "node:util";
import { loadConfig, type ConfigOverrides } from "./config.js";
import { crawlForum, type CrawlDependencies, type CrawlReport } from "./crawler/forum-crawler.js";
import { ConfigError, formatError } from "./utils/errors.js";
import { log } from "./utils/log.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export const USAGE = `Usage: forum-qa-crawler [options]

Crawl answered threads of a paginated forum into a JSON artifact.

Options:
  --total-pages <n>          Number of listing pages (skips the page-count probe)
  --chunk-size <n>           Listing pages per chunk (default 100)
  --output <file>            Artifact to write
  --prior-dir <dir>          Directory of earlier artifacts to skip
  --data-dir <dir>           Default location of artifacts (default "data")
  --forum-url <url>          First listing page of the forum
  --listing-concurrency <n>  Parallel listing requests (default 5)
  --detail-concurrency <n>   Parallel detail requests (default 10)
  --timeout <ms>             Per-request timeout (default 30000)
  --no-checkpoint            Write the artifact only once, at the end
  -h, --help                 Show this message
`;

export interface CliArgs {
  help: boolean;
  overrides: ConfigOverrides;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: false,
      options: {
        "total-pages": { type: "string" },
        "chunk-size": { type: "string" },
        output: { type: "string" },
        "prior-dir": { type: "string" },
        "data-dir": { type: "string" },
        "forum-url": { type: "string" },
        "listing-concurrency": { type: "string" },
        "detail-concurrency": { type: "string" },
        timeout: { type: "string" },
        "no-checkpoint": { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (error) {
    throw new ConfigError(formatError(error), [formatError(error)]);
  }
}

/**
 * Translate argv (without the node and script entries) into config
 * overrides.
 *
 * @throws {ConfigError} On unknown flags or missing flag values.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = readArgs(argv);
  const overrides: ConfigOverrides = {};

  if (values["total-pages"] !== undefined) overrides.totalPages = values["total-pages"];
  if (values["chunk-size"] !== undefined) overrides.chunkSize = values["chunk-size"];
  if (values.output !== undefined) overrides.outputPath = values.output;
  if (values["prior-dir"] !== undefined) overrides.priorArtifactsDir = values["prior-dir"];
  if (values["data-dir"] !== undefined) overrides.dataDir = values["data-dir"];
  if (values["forum-url"] !== undefined) overrides.forumUrl = values["forum-url"];
  if (values["listing-concurrency"] !== undefined) {
    overrides.listingConcurrency = values["listing-concurrency"];
  }
  if (values["detail-concurrency"] !== undefined) {
    overrides.detailConcurrency = values["detail-concurrency"];
  }
  if (values.timeout !== undefined) overrides.fetchTimeoutMs = values.timeout;
  if (values["no-checkpoint"] === true) overrides.checkpoint = false;

  return { help: values.help === true, overrides };
}

/**
 * Summary printed on stdout when a run ends.
 */
export function summarizeReport(report: CrawlReport): Record<string, unknown> {
  return {
    output: report.outputPath,
    aborted: report.aborted,
    totalPages: report.totalPages,
    chunks: report.chunks.length,
    newRecords: report.stats.records,
    resumedRecords: report.resumedRecords,
    totalRecords: report.records.length,
    skippedSeen: report.stats.skippedSeen,
    failures: report.stats.failures,
    elapsedMs: report.elapsedMs,
  };
}

/**
 * Parse arguments, run the crawl and map the outcome to an exit code.
 */
export async function runCli(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
  deps: CrawlDependencies = {},
): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      console.log(USAGE);
      return EXIT_OK;
    }

    const config = loadConfig(env, args.overrides);
    const report = await crawlForum(config, deps);
    console.log(JSON.stringify(summarizeReport(report), null, 2));
    return report.aborted ? EXIT_INTERRUPTED : EXIT_OK;
  } catch (error) {
    log.error("cli", "run failed", { cause: formatError(error) });
    return EXIT_FAILURE;
  }
}
