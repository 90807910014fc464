#!/usr/bin/env node
/**
 * @module index
 * @fileoverview forum-qa-crawler entry point.
 *
 * ## Startup Flow
 * 1. Parse flags and environment into a config ({@link runCli}).
 * 2. Install a SIGINT/SIGTERM handler that aborts the run signal. The crawl
 *    stops between phases and saves what it has; a second signal exits
 *    immediately.
 * 3. Run the crawl and exit with its code.
 */

import { EXIT_INTERRUPTED, runCli } from "./cli.js";
import { log } from "./utils/log.js";

const controller = new AbortController();

function onSignal(signal: NodeJS.Signals): void {
  if (controller.signal.aborted) {
    process.exit(EXIT_INTERRUPTED);
  }
  log.warn("index", "stopping after current phase, send again to exit now", { signal });
  controller.abort(new Error(`received ${signal}`));
}

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), process.env, {
    signal: controller.signal,
  });
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
