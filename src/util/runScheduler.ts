/**
 * Run Scheduler Utility
 * 
 * Calculates how long to sleep between two scrape passes so that passes
 * start on a fixed interval regardless of how long each one takes.
 */

import { SCHEDULING } from '../core/constants.js';

/**
 * Calculates the delay until the next pass should start
 * 
 * The interval is measured start to start: the time the previous pass
 * took is subtracted from it. A pass that overran its interval is followed
 * by the minimum delay rather than an immediate restart.
 * 
 * @param intervalMs - Target gap between pass starts in milliseconds
 * @param elapsedMs - How long the previous pass ran
 * @returns Delay in milliseconds until the next pass
 * 
 * @example
 * // 5 minute interval, pass took 40 seconds
 * nextRunDelayMs(300000, 40000) // Returns 260000
 * 
 * @example
 * // Pass overran the interval
 * nextRunDelayMs(60000, 90000) // Returns 30000 (minimum delay)
 */
export function nextRunDelayMs(intervalMs: number, elapsedMs: number): number {
  const remaining = intervalMs - Math.max(0, elapsedMs);
  return Math.max(SCHEDULING.MIN_DELAY_MS, remaining);
}
