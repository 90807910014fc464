/**
 * @module utils/errors
 * @fileoverview Typed error hierarchy for the forum crawler.
 *
 * Per-request failures never reach this module: the transport reports them
 * as {@link FetchOutcome} values. The classes here cover what is allowed to
 * stop a run (bad configuration, an artifact that cannot be written) and the
 * renderer's internal timeout.
 *
 * ```
 *   CrawlerError (base)
 *     |-- ConfigError        INVALID_CONFIG
 *     |-- PersistenceError   PERSISTENCE_FAILED
 *     +-- TimeoutError       TIMEOUT
 * ```
 *
 * @see {@link formatError} for turning any thrown value into a log message.
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Base Error
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Base class for every error raised by the crawler.
 *
 * Carries a machine-readable `code` in SCREAMING_SNAKE_CASE. Codes are
 * stable: operators grep logs for them.
 */
export class CrawlerError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Specific Errors
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Run parameters failed validation (non-positive chunk size, inverted delay
 * window, unparsable number). Raised before the first request is sent.
 */
export class ConfigError extends CrawlerError {
  /** One entry per offending setting, e.g. `"chunkSize: must be >= 1"`. */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, "INVALID_CONFIG");
    this.issues = issues;
  }
}

/**
 * The output artifact could not be written. Fatal: without a durable
 * artifact the run has produced nothing a later run can resume from.
 */
export class PersistenceError extends CrawlerError {
  /** Path of the artifact that failed to write. */
  public readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, "PERSISTENCE_FAILED", { cause });
    this.path = path;
  }
}

/**
 * An operation exceeded its time budget.
 */
export class TimeoutError extends CrawlerError {
  constructor(message: string) {
    super(message, "TIMEOUT");
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Render any thrown value as a single-line message.
 *
 * Crawler errors get their code as a prefix; other errors keep their
 * message; everything else goes through `String()`.
 *
 * @example
 * ```ts
 * formatError(new ConfigError("chunk size must be positive"));
 * // => "[INVALID_CONFIG] chunk size must be positive"
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof CrawlerError) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * Best-effort description of an error's root cause.
 *
 * Node's fetch wraps socket failures in a `TypeError("fetch failed")` whose
 * `cause` holds the useful part (`ECONNREFUSED`, `ENOTFOUND`, ...). This
 * walks one level down so log lines name the real problem.
 */
export function describeCause(error: unknown): string {
  if (error instanceof Error && error.cause !== undefined) {
    const inner = error.cause;
    const detail =
      inner instanceof Error
        ? inner.message
        : typeof inner === "object" && inner !== null && "code" in inner
          ? String(inner.code)
          : String(inner);
    return `${error.message} (${detail})`;
  }

  return formatError(error);
}
