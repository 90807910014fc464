/**
 * @fileoverview Script-executing page renderer for the pagination probe.
 *
 * The forum builds its pagination links client-side, so the raw listing
 * markup does not say how many pages exist. {@link renderDocument} loads the
 * markup into a jsdom window with scripts enabled, waits for the `load`
 * event and a short settle period, then serializes the resulting DOM.
 *
 * External scripts referenced by the page are downloaded by jsdom's
 * resource loader with the crawler's User-Agent. Script errors inside the
 * page are reported through the log and do not fail the render.
 *
 * @module services/renderer
 */

import { setTimeout as sleep } from "node:timers/promises";
import { JSDOM, ResourceLoader, VirtualConsole, type DOMWindow } from "jsdom";
import { TimeoutError } from "../utils/errors.js";
import { log } from "../utils/log.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RenderOptions {
  /** User-Agent for sub-resources loaded by the page. */
  userAgent: string;

  /** Maximum wait for the `load` event, in milliseconds. */
  timeoutMs: number;

  /** Additional wait after `load` for late DOM updates, in milliseconds. */
  settleMs: number;

  /** Whether `<script src>` and other sub-resources are fetched. */
  loadResources?: boolean;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function waitForLoad(window: DOMWindow, timeoutMs: number): Promise<void> {
  if (window.document.readyState === "complete") {
    return Promise.resolve();
  }

  return new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      window.removeEventListener("load", onLoad);
      reject(new TimeoutError(`Page did not finish loading within ${timeoutMs}ms`));
    }, timeoutMs);

    function onLoad(): void {
      clearTimeout(timer);
      resolve();
    }

    window.addEventListener("load", onLoad, { once: true });
  });
}

// ---------------------------------------------------------------------------
// Main Export
// ---------------------------------------------------------------------------

/**
 * Execute the scripts of `html` as if it were served from `url` and return
 * the serialized DOM afterwards.
 *
 * @throws {TimeoutError} If the window never fires `load` within
 *   `options.timeoutMs`.
 *
 * @example
 * ```typescript
 * const html = `<div id="pager"></div>
 *   <script>document.getElementById("pager").innerHTML = '<a class="last" data-type="last" data-page="7">7</a>'</script>`;
 * const rendered = await renderDocument(html, "https://forum.example.com/f", {
 *   userAgent: "test-agent", timeoutMs: 1000, settleMs: 0,
 * });
 * // rendered contains the injected <a class="last" ...>
 * ```
 */
export async function renderDocument(
  html: string,
  url: string,
  options: RenderOptions,
): Promise<string> {
  const virtualConsole = new VirtualConsole();
  virtualConsole.on("jsdomError", (error: Error) => {
    log.warn("renderer", "page script error", { url, cause: error.message });
  });

  const dom = new JSDOM(html, {
    url,
    runScripts: "dangerously",
    resources:
      options.loadResources === false
        ? undefined
        : new ResourceLoader({ userAgent: options.userAgent }),
    pretendToBeVisual: true,
    virtualConsole,
  });

  try {
    await waitForLoad(dom.window, options.timeoutMs);
    if (options.settleMs > 0) {
      await sleep(options.settleMs);
    }
    return dom.serialize();
  } finally {
    dom.window.close();
  }
}
