/**
 * @fileoverview Bounded concurrency with jittered pacing for outbound requests.
 *
 * Each call site that fans out requests (listing pages, detail pages) owns
 * one {@link RequestGate}. A gate admits at most `concurrency` tasks at a
 * time and makes every admitted task wait a random pause before it starts:
 *
 * ```
 *   gate.map(urls, fetchPage)
 *         |
 *         v
 *   [ p-queue, concurrency N ]   <-- slot acquired
 *         |
 *         v
 *   sleep(uniform(minDelay, maxDelay))
 *         |
 *         v
 *   task()                       <-- slot released when it settles
 * ```
 *
 * The pause happens inside the slot, so requests leave the gate spread out
 * rather than in bursts of N.
 *
 * @module services/queue
 */

import { setTimeout as sleep } from "node:timers/promises";
import PQueue from "p-queue";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RequestGateOptions {
  /** Maximum number of tasks running at once. */
  concurrency: number;

  /** Lower bound of the pre-task pause, in milliseconds. */
  minDelayMs: number;

  /** Upper bound of the pre-task pause, in milliseconds. */
  maxDelayMs: number;

  /**
   * When aborted, queued tasks start without their pause so the queue
   * drains quickly. Tasks are still run; they are expected to check the
   * signal themselves.
   */
  signal?: AbortSignal;

  /** Source of randomness in `[0, 1)`. Defaults to `Math.random`. */
  random?: () => number;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Uniformly distributed delay in `[min, max]`, rounded to whole milliseconds.
 *
 * @example
 * ```typescript
 * jitterDelay(100, 300, () => 0.5); // => 200
 * ```
 */
export function jitterDelay(min: number, max: number, random: () => number = Math.random): number {
  if (max <= min) {
    return min;
  }
  return Math.round(min + random() * (max - min));
}

// ---------------------------------------------------------------------------
// RequestGate
// ---------------------------------------------------------------------------

/**
 * A concurrency gate for one call site.
 *
 * ```typescript
 * const gate = new RequestGate({ concurrency: 5, minDelayMs: 100, maxDelayMs: 300 });
 * const bodies = await gate.map(urls, (url) => transport.fetchPage(url));
 * // bodies[i] belongs to urls[i], whatever order the requests finished in
 * ```
 */
export class RequestGate {
  private readonly queue: PQueue;
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly signal?: AbortSignal;
  private readonly random: () => number;

  constructor(options: RequestGateOptions) {
    this.queue = new PQueue({ concurrency: options.concurrency });
    this.minDelayMs = options.minDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.signal = options.signal;
    this.random = options.random ?? Math.random;
  }

  /** Concurrency limit this gate was created with. */
  get concurrency(): number {
    return this.queue.concurrency;
  }

  /** Tasks currently running. */
  get running(): number {
    return this.queue.pending;
  }

  /** Tasks waiting for a slot. */
  get waiting(): number {
    return this.queue.size;
  }

  /**
   * Run `task` once a slot is free and the pacing pause has elapsed.
   *
   * @throws Whatever `task` throws.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    return this.queue.add(
      async () => {
        if (!this.signal?.aborted) {
          const delay = jitterDelay(this.minDelayMs, this.maxDelayMs, this.random);
          if (delay > 0) {
            await sleep(delay);
          }
        }
        return task();
      },
      { throwOnTimeout: true },
    );
  }

  /**
   * Run `task` for every item through the gate and collect the results in
   * input order.
   */
  async map<I, T>(items: readonly I[], task: (item: I, index: number) => Promise<T>): Promise<T[]> {
    return Promise.all(items.map((item, index) => this.run(() => task(item, index))));
  }

  /** Resolves once nothing is running or waiting. */
  async onIdle(): Promise<void> {
    await this.queue.onIdle();
  }
}
