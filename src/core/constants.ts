/**
 * Application Constants
 *
 * Centralized location for all magic numbers and configuration constants.
 */

/**
 * Scheduling delays (in milliseconds)
 */
export const SCHEDULING = {
  /** Minimum gap between two pass starts (30 seconds) */
  MIN_DELAY_MS: 30000,
} as const;

/**
 * Backend health check configuration
 */
export const HEALTH_CHECK = {
  /** Maximum retries for backend health checks */
  MAX_RETRIES: 30,

  /** Delay between retries (2 seconds) */
  RETRY_DELAY_MS: 2000,
} as const;

/**
 * Read query defaults and bounds
 */
export const QUERY_LIMITS = {
  /** Default row limit for the wide pivot */
  DEFAULT_PIVOT_ROWS: 16,

  /** Default entry count for the top-players aggregate */
  DEFAULT_TOP_PLAYERS: 10,

  /** Preview shape: last 10 timestamp columns, top 10 rows */
  PREVIEW_COLUMNS: 10,
  PREVIEW_ROWS: 10,

  /** Upper bound accepted for any column count or row limit */
  MAX_LIMIT: 1000,
} as const;
