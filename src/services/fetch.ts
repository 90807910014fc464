/**
 * @fileoverview HTTP transport for the forum crawler.
 *
 * Wraps the platform `fetch()` and turns every request into a
 * {@link FetchOutcome}. Failures are values, not exceptions: the crawl must
 * finish its page range even when a share of requests fail.
 *
 * ## Classification
 *
 * | Situation                                  | `kind`          |
 * |--------------------------------------------|-----------------|
 * | HTTP 403                                   | `blocked`       |
 * | Any other non-2xx status                   | `http_error`    |
 * | DNS, TCP, TLS or body stream failure       | `network_error` |
 * | Per-request timeout elapsed                | `timeout`       |
 * | Run-level signal aborted by the operator   | `aborted`       |
 *
 * Each failure is logged once, here, with its URL, kind and cause.
 *
 * ## Architecture
 *
 * ```
 *   fetchPage(url, signal)
 *     |
 *     +--> per-request AbortSignal (timeout) linked to the run signal
 *     +--> fetch() with User-Agent, redirect: "follow"
 *     +--> status check -> blocked | http_error
 *     +--> body text
 *     +--> FetchOutcome
 *
 *   fetchRendered(url, signal)
 *     |
 *     +--> fetchPage(url)           raw markup
 *     +--> renderDocument(markup)   scripts executed in jsdom
 *     +--> FetchOutcome
 * ```
 *
 * Concurrency is not handled here; callers route requests through a
 * {@link RequestGate}.
 *
 * @module services/fetch
 */

import { TimeoutError, describeCause } from "../utils/errors.js";
import { log } from "../utils/log.js";
import { renderDocument } from "./renderer.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FetchFailureKind =
  | "blocked"
  | "http_error"
  | "network_error"
  | "timeout"
  | "aborted";

export const FETCH_FAILURE_KINDS: readonly FetchFailureKind[] = [
  "blocked",
  "http_error",
  "network_error",
  "timeout",
  "aborted",
];

export interface FetchSuccess {
  ok: true;
  /** URL that was requested. */
  url: string;
  /** HTTP status of the final response. */
  status: number;
  body: string;
}

export interface FetchFailure {
  ok: false;
  url: string;
  kind: FetchFailureKind;
  /** Present for `blocked` and `http_error`. */
  status?: number;
  /** Human-readable reason, suitable for a log line. */
  cause: string;
}

export type FetchOutcome = FetchSuccess | FetchFailure;

/**
 * What the orchestrator needs from a transport. Tests substitute their own
 * implementation.
 */
export interface PageTransport {
  fetchPage(url: string, signal?: AbortSignal): Promise<FetchOutcome>;
  fetchRendered(url: string, signal?: AbortSignal): Promise<FetchOutcome>;
}

/** The subset of `fetch` the transport calls. */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpTransportOptions {
  userAgent: string;
  /** Per-request timeout for {@link HttpTransport.fetchPage}. */
  timeoutMs: number;
  /** Load-event budget for {@link HttpTransport.fetchRendered}. */
  renderTimeoutMs: number;
  /** Wait after `load` before the rendered DOM is read. */
  renderSettleMs: number;
  /** Whether rendering downloads the page's external scripts. */
  renderResources?: boolean;
  /** Defaults to the global `fetch`. */
  fetchFn?: FetchFn;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface LinkedSignal {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * A signal that aborts when either the per-request timeout elapses or the
 * run signal aborts. `dispose()` detaches from the run signal so long runs
 * do not pile up listeners on it.
 */
function linkSignals(timeout: AbortSignal, run?: AbortSignal): LinkedSignal {
  if (!run) {
    return { signal: timeout, dispose: () => undefined };
  }

  const controller = new AbortController();
  const onTimeout = () => controller.abort(timeout.reason);
  const onRun = () => controller.abort(run.reason);

  if (run.aborted) {
    controller.abort(run.reason);
  } else if (timeout.aborted) {
    controller.abort(timeout.reason);
  } else {
    timeout.addEventListener("abort", onTimeout, { once: true });
    run.addEventListener("abort", onRun, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      timeout.removeEventListener("abort", onTimeout);
      run.removeEventListener("abort", onRun);
    },
  };
}

function failure(
  url: string,
  kind: FetchFailureKind,
  cause: string,
  status?: number,
): FetchFailure {
  if (kind !== "aborted") {
    log.warn("transport", "request failed", { url, kind, status, cause });
  }
  return { ok: false, url, kind, status, cause };
}

// ---------------------------------------------------------------------------
// HttpTransport
// ---------------------------------------------------------------------------

/**
 * Transport backed by `fetch()` and jsdom.
 *
 * @example
 * ```typescript
 * const transport = new HttpTransport({
 *   userAgent: config.userAgent,
 *   timeoutMs: config.fetchTimeoutMs,
 *   renderTimeoutMs: config.renderTimeoutMs,
 *   renderSettleMs: config.renderSettleMs,
 * });
 *
 * const outcome = await transport.fetchPage("https://forum.example.com/t/1");
 * if (outcome.ok) {
 *   parseDetail(outcome.body);
 * }
 * ```
 */
export class HttpTransport implements PageTransport {
  private readonly options: HttpTransportOptions;
  private readonly fetchFn: FetchFn;

  constructor(options: HttpTransportOptions) {
    this.options = options;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
  }

  /**
   * Fetch the raw body of `url`. Never rejects.
   *
   * @param signal - Run-level cancellation. Aborting it resolves in-flight
   *   and later requests with `kind: "aborted"`.
   */
  async fetchPage(url: string, signal?: AbortSignal): Promise<FetchOutcome> {
    if (signal?.aborted) {
      return failure(url, "aborted", "run cancelled before request");
    }

    const timeout = AbortSignal.timeout(this.options.timeoutMs);
    const linked = linkSignals(timeout, signal);

    try {
      const response = await this.fetchFn(url, {
        signal: linked.signal,
        headers: {
          "User-Agent": this.options.userAgent,
          Accept: "text/html, application/xhtml+xml, */*;q=0.1",
        },
        redirect: "follow",
      });

      if (response.status === 403) {
        await response.body?.cancel();
        return failure(url, "blocked", "HTTP 403 Forbidden", 403);
      }

      if (!response.ok) {
        await response.body?.cancel();
        return failure(
          url,
          "http_error",
          `HTTP ${response.status} ${response.statusText}`.trim(),
          response.status,
        );
      }

      const body = await response.text();
      return { ok: true, url, status: response.status, body };
    } catch (error) {
      if (signal?.aborted) {
        return failure(url, "aborted", "run cancelled during request");
      }
      if (timeout.aborted) {
        return failure(url, "timeout", `no response within ${this.options.timeoutMs}ms`);
      }
      return failure(url, "network_error", describeCause(error));
    } finally {
      linked.dispose();
    }
  }

  /**
   * Fetch `url` and execute its scripts before returning the markup.
   *
   * Used once per run to discover the page count. Not gated and not
   * retried. A render failure is reported as `network_error` or `timeout`.
   */
  async fetchRendered(url: string, signal?: AbortSignal): Promise<FetchOutcome> {
    const raw = await this.fetchPage(url, signal);
    if (!raw.ok) {
      return raw;
    }

    try {
      const body = await renderDocument(raw.body, url, {
        userAgent: this.options.userAgent,
        timeoutMs: this.options.renderTimeoutMs,
        settleMs: this.options.renderSettleMs,
        loadResources: this.options.renderResources,
      });
      return { ok: true, url, status: raw.status, body };
    } catch (error) {
      const kind = error instanceof TimeoutError ? "timeout" : "network_error";
      return failure(url, kind, `render failed: ${describeCause(error)}`);
    }
  }
}
