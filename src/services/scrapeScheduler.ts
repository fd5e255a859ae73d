/**
 * Scrape Scheduler
 *
 * Serializes scrape passes: at most one runs at a time, and a trigger that
 * arrives while one is running is skipped rather than queued. Also drives
 * the periodic loop, measuring the interval from one pass start to the next.
 */

import { logger } from '../core/logger.js';
import { toError } from '../errors/index.js';
import type { PassSummary } from '../models/pass.js';
import { nextRunDelayMs } from '../util/runScheduler.js';

export type TriggerResult =
  | { started: true; summary: PassSummary }
  | { started: false };

/**
 * Sleeps for `ms`, waking early when the signal aborts
 */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal.aborted) return resolve();
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}

export class ScrapeScheduler {
  private running = false;

  constructor(private readonly runPass: () => Promise<PassSummary>) {}

  /** Whether a pass is in progress */
  get busy(): boolean {
    return this.running;
  }

  /**
   * Runs one pass unless one is already running
   *
   * Errors from the pass propagate to the caller; the scheduler is free
   * again either way.
   */
  async trigger(): Promise<TriggerResult> {
    if (this.running) {
      logger.warn('Pass already running, trigger skipped');
      return { started: false };
    }

    this.running = true;
    try {
      const summary = await this.runPass();
      return { started: true, summary };
    } finally {
      this.running = false;
    }
  }

  /**
   * Triggers a pass every `intervalMs` until the signal aborts
   *
   * A failed pass is logged and the loop carries on with the next one.
   * With `runFirst: false` the first pass waits one interval.
   */
  async runEvery(intervalMs: number, signal: AbortSignal, options: { runFirst?: boolean } = {}): Promise<void> {
    logger.info({ intervalMs }, 'Periodic scraping started');

    if (options.runFirst === false) {
      await sleep(intervalMs, signal);
    }

    while (!signal.aborted) {
      const started = Date.now();
      try {
        await this.trigger();
      } catch (err) {
        logger.error({ err: toError(err) }, 'Scheduled pass failed');
      }

      if (signal.aborted) break;
      const delayMs = nextRunDelayMs(intervalMs, Date.now() - started);
      logger.debug({ delayMs }, 'Next pass scheduled');
      await sleep(delayMs, signal);
    }

    logger.info('Periodic scraping stopped');
  }
}
