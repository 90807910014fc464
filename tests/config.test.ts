/**
 * @fileoverview Tests for configuration loading.
 *
 * Covers: defaults, environment parsing, override precedence, derived paths
 * and validation failures.
 */

import path from "node:path";
import { describe, it, expect } from "vitest";
import {
  DEFAULT_FORUM_URL,
  DEFAULT_PAGE_PARAM,
  DEFAULT_USER_AGENT,
  defaultOutputName,
  loadConfig,
} from "../src/config.js";
import { ConfigError } from "../src/utils/errors.js";

const NOW = new Date("2025-03-09T22:15:00Z");

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a ConfigError");
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

describe("loadConfig — defaults", () => {
  it("fills every setting when nothing is configured", () => {
    expect(loadConfig({}, {}, NOW)).toEqual({
      forumUrl: DEFAULT_FORUM_URL,
      pageParam: DEFAULT_PAGE_PARAM,
      dataDir: "data",
      outputPath: path.join("data", "answered_forum_2025-03-09.json"),
      priorArtifactsDir: "data",
      chunkSize: 100,
      listingConcurrency: 5,
      detailConcurrency: 10,
      requestDelayMinMs: 100,
      requestDelayMaxMs: 300,
      fetchTimeoutMs: 30_000,
      renderTimeoutMs: 60_000,
      renderSettleMs: 1_000,
      userAgent: DEFAULT_USER_AGENT,
      checkpoint: true,
      keepFailedDetails: true,
    });
  });

  it("leaves the page count unset so it is probed", () => {
    expect(loadConfig({}, {}, NOW).totalPages).toBeUndefined();
  });
});

describe("defaultOutputName", () => {
  it("uses the UTC date", () => {
    expect(defaultOutputName(new Date("2024-12-31T23:59:59Z"))).toBe(
      "answered_forum_2024-12-31.json",
    );
  });
});

// ---------------------------------------------------------------------------
// Environment and overrides
// ---------------------------------------------------------------------------

describe("loadConfig — environment", () => {
  it("parses numbers and flags from strings", () => {
    const config = loadConfig(
      {
        CHUNK_SIZE: "25",
        TOTAL_PAGES: " 40 ",
        DETAIL_CONCURRENCY: "3",
        REQUEST_DELAY_MIN_MS: "0",
        REQUEST_DELAY_MAX_MS: "0",
        CHECKPOINT: "off",
        KEEP_FAILED_DETAILS: "No",
      },
      {},
      NOW,
    );

    expect(config).toMatchObject({
      chunkSize: 25,
      totalPages: 40,
      detailConcurrency: 3,
      requestDelayMinMs: 0,
      requestDelayMaxMs: 0,
      checkpoint: false,
      keepFailedDetails: false,
    });
  });

  it("derives output and prior directories from DATA_DIR", () => {
    const config = loadConfig({ DATA_DIR: "/var/crawl" }, {}, NOW);

    expect(config.outputPath).toBe(path.join("/var/crawl", "answered_forum_2025-03-09.json"));
    expect(config.priorArtifactsDir).toBe("/var/crawl");
  });

  it("keeps explicit output and prior paths", () => {
    const config = loadConfig(
      { OUTPUT_PATH: "out/run.json", PRIOR_ARTIFACTS_DIR: "archive" },
      {},
      NOW,
    );

    expect(config.outputPath).toBe("out/run.json");
    expect(config.priorArtifactsDir).toBe("archive");
  });

  it("treats empty values as unset", () => {
    const config = loadConfig({ CHUNK_SIZE: "", FORUM_URL: "  " }, {}, NOW);

    expect(config.chunkSize).toBe(100);
    expect(config.forumUrl).toBe(DEFAULT_FORUM_URL);
  });

  it("lets overrides win over the environment", () => {
    const config = loadConfig({ CHUNK_SIZE: "25" }, { chunkSize: "7", checkpoint: false }, NOW);

    expect(config.chunkSize).toBe(7);
    expect(config.checkpoint).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe("loadConfig — validation", () => {
  it("rejects a zero chunk size", () => {
    const error = configError(() => loadConfig({ CHUNK_SIZE: "0" }, {}, NOW));

    expect(error.issues).toEqual(["chunkSize: must be >= 1"]);
    expect(error.message).toBe("Invalid configuration: chunkSize: must be >= 1");
  });

  it("rejects fractional counts", () => {
    const error = configError(() => loadConfig({ TOTAL_PAGES: "2.5" }, {}, NOW));

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^totalPages: /);
  });

  it("rejects an inverted delay window", () => {
    const error = configError(() =>
      loadConfig({ REQUEST_DELAY_MIN_MS: "500", REQUEST_DELAY_MAX_MS: "100" }, {}, NOW),
    );

    expect(error.issues).toEqual(["requestDelayMinMs: must not exceed requestDelayMaxMs"]);
  });

  it("rejects unknown flag values", () => {
    const error = configError(() => loadConfig({ CHECKPOINT: "maybe" }, {}, NOW));

    expect(error.issues[0]).toMatch(/^checkpoint: /);
  });

  it("rejects a forum URL that is not a URL", () => {
    const error = configError(() => loadConfig({ FORUM_URL: "not a url" }, {}, NOW));

    expect(error.issues[0]).toMatch(/^forumUrl: /);
  });

  it("rejects a forum URL with a non-http scheme", () => {
    const error = configError(() => loadConfig({ FORUM_URL: "ftp://forum.test/f" }, {}, NOW));

    expect(error.issues).toEqual(["forumUrl: must be an absolute http(s) URL"]);
  });

  it("reports every offending setting", () => {
    const error = configError(() =>
      loadConfig({ CHUNK_SIZE: "0", LISTING_CONCURRENCY: "-1" }, {}, NOW),
    );

    expect(error.issues).toEqual(["chunkSize: must be >= 1", "listingConcurrency: must be >= 1"]);
    expect(error.code).toBe("INVALID_CONFIG");
  });
});
