/**
 * @fileoverview Tests for the HTTP transport.
 *
 * A stub `fetchFn` stands in for the network: every test builds the
 * responses it needs and inspects the requests the transport made.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { HttpTransport, type FetchFn } from "../../src/services/fetch.js";

const URL_A = "https://forum.test/t/1";

function transport(fetchFn: FetchFn, timeoutMs = 1_000): HttpTransport {
  return new HttpTransport({
    userAgent: "test-agent",
    timeoutMs,
    renderTimeoutMs: 1_000,
    renderSettleMs: 0,
    renderResources: false,
    fetchFn,
  });
}

function respond(body: string, status = 200, statusText = ""): FetchFn {
  return async () => new Response(body, { status, statusText });
}

/** A fetch that never answers until its signal aborts. */
const hangingFetch: FetchFn = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    init.signal?.addEventListener("abort", () => reject(new DOMException("aborted", "AbortError")), {
      once: true,
    });
  });

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// fetchPage — success
// ---------------------------------------------------------------------------

describe("fetchPage — success", () => {
  it("returns the body and status", async () => {
    const outcome = await transport(respond("<p>hi</p>")).fetchPage(URL_A);

    expect(outcome).toEqual({ ok: true, url: URL_A, status: 200, body: "<p>hi</p>" });
  });

  it("sends the configured User-Agent and follows redirects", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response("ok"));

    await transport(fetchFn).fetchPage(URL_A);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe(URL_A);
    expect(init.redirect).toBe("follow");
    expect(init.headers).toMatchObject({ "User-Agent": "test-agent" });
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });
});

// ---------------------------------------------------------------------------
// fetchPage — failures
// ---------------------------------------------------------------------------

describe("fetchPage — failures", () => {
  it("classifies 403 as blocked", async () => {
    const outcome = await transport(respond("denied", 403, "Forbidden")).fetchPage(URL_A);

    expect(outcome).toEqual({
      ok: false,
      url: URL_A,
      kind: "blocked",
      status: 403,
      cause: "HTTP 403 Forbidden",
    });
  });

  it("classifies other error statuses as http_error", async () => {
    const outcome = await transport(respond("gone", 404, "Not Found")).fetchPage(URL_A);

    expect(outcome).toEqual({
      ok: false,
      url: URL_A,
      kind: "http_error",
      status: 404,
      cause: "HTTP 404 Not Found",
    });
  });

  it("classifies thrown fetch errors as network_error with their cause", async () => {
    const fetchFn: FetchFn = async () => {
      throw new TypeError("fetch failed", { cause: new Error("connect ECONNREFUSED 127.0.0.1:443") });
    };

    const outcome = await transport(fetchFn).fetchPage(URL_A);

    expect(outcome).toMatchObject({
      ok: false,
      kind: "network_error",
      cause: "fetch failed (connect ECONNREFUSED 127.0.0.1:443)",
    });
  });

  it("classifies an elapsed per-request timeout as timeout", async () => {
    const outcome = await transport(hangingFetch, 20).fetchPage(URL_A);

    expect(outcome).toMatchObject({ ok: false, kind: "timeout", cause: "no response within 20ms" });
  });

  it("logs each failure once with url and kind", async () => {
    await transport(respond("gone", 404, "Not Found")).fetchPage(URL_A);

    expect(console.error).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith(
      '[transport] WARN request failed url=https://forum.test/t/1 kind=http_error status=404 cause="HTTP 404 Not Found"',
    );
  });
});

// ---------------------------------------------------------------------------
// fetchPage — cancellation
// ---------------------------------------------------------------------------

describe("fetchPage — cancellation", () => {
  it("does not send a request once the run is cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchFn = vi.fn<FetchFn>(async () => new Response("ok"));

    const outcome = await transport(fetchFn).fetchPage(URL_A, controller.signal);

    expect(fetchFn).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({ ok: false, kind: "aborted" });
  });

  it("classifies a request cut short by the run signal as aborted", async () => {
    const controller = new AbortController();
    const pending = transport(hangingFetch, 5_000).fetchPage(URL_A, controller.signal);

    controller.abort();

    expect(await pending).toMatchObject({
      ok: false,
      kind: "aborted",
      cause: "run cancelled during request",
    });
    expect(console.error).not.toHaveBeenCalled();
  });

  it("still times out while a run signal is attached", async () => {
    const controller = new AbortController();

    const outcome = await transport(hangingFetch, 20).fetchPage(URL_A, controller.signal);

    expect(outcome).toMatchObject({ ok: false, kind: "timeout" });
  });
});

// ---------------------------------------------------------------------------
// fetchRendered
// ---------------------------------------------------------------------------

describe("fetchRendered", () => {
  it("returns the DOM after scripts ran", async () => {
    const html = `<html><body><div id="pager"></div><script>
      document.getElementById("pager").innerHTML = '<a class="last" data-type="last" data-page="5">5</a>';
    </script></body></html>`;

    const outcome = await transport(respond(html)).fetchRendered("https://forum.test/f");

    expect(outcome.ok).toBe(true);
    expect(outcome.ok && outcome.body).toContain('data-page="5"');
  });

  it("passes fetch failures through unchanged", async () => {
    const outcome = await transport(respond("denied", 403, "Forbidden")).fetchRendered(URL_A);

    expect(outcome).toMatchObject({ ok: false, kind: "blocked", status: 403 });
  });
});
