/**
 * Configuration Module
 *
 * Centralizes all application configuration from environment variables.
 * Loads .env file automatically via dotenv/config import.
 */

import 'dotenv/config';

/**
 * Parses a boolean flag from an environment variable
 *
 * Accepts 1/true/yes (case-insensitive) as true; anything else is false.
 */
function flag(name: string, fallback: boolean): boolean {
  const v = process.env[name];
  if (v === undefined || v === '') return fallback;
  return ['1', 'true', 'yes'].includes(v.toLowerCase());
}

/**
 * Splits a comma-separated list, dropping empty entries
 */
function list(name: string): string[] {
  return (process.env[name] || '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

/**
 * PostgreSQL TLS option: an unverified TLS connection when DB_SSL=true, otherwise none
 */
const dbSsl: false | { rejectUnauthorized: boolean } =
  process.env.DB_SSL === 'true' ? { rejectUnauthorized: false } : false;

/**
 * Application configuration object
 *
 * All configuration values are read from environment variables with sensible defaults.
 */
export const cfg = {
  // Scraper configuration
  scrape: {
    url: process.env.SCRAPE_URL || 'https://ggpoker.com/promotions/omaha-daily-leaderboard/', // Page embedding the leaderboard iframe
    game: process.env.SCRAPE_GAME || 'PLO', // Section heading label, also the leaderboard name prefix
    filters: list('SCRAPE_FILTERS'), // Optional allowlist of filter labels (empty = all)
    intervalSeconds: Number(process.env.SCRAPE_INTERVAL_SECONDS || '0'), // Seconds between pass starts, 0 = single pass
    onStart: flag('SCRAPE_ON_START', true), // Run a pass as soon as the service boots
    navigationTimeoutMs: Number(process.env.NAVIGATION_TIMEOUT_MS || '15000'),
    tableTimeoutMs: Number(process.env.TABLE_TIMEOUT_MS || '10000'),
    tableSettleMs: Number(process.env.TABLE_SETTLE_MS || '500') // Poll interval while waiting for the table to stop changing
  },
  // Browser configuration
  browser: {
    headless: flag('HEADLESS', true),
    executablePath: process.env.CHROME_BIN || undefined // System Chromium (e.g. /usr/bin/chromium)
  },
  // Database configuration
  database: {
    url: process.env.DATABASE_URL || '', // PostgreSQL connection string; empty = embedded SQLite
    path: process.env.DB_PATH || 'leaderboards.db', // SQLite file used when DATABASE_URL is empty
    ssl: dbSsl,
    max: Number(process.env.DB_POOL_SIZE || '10'), // Connection pool size
    idleTimeoutMillis: Number(process.env.DB_IDLE_TIMEOUT_MS || '30000'),
    connectionTimeoutMillis: Number(process.env.DB_CONNECTION_TIMEOUT_MS || '5000')
  },
  // Read query defaults
  queries: {
    maxTimestampColumns: Number(process.env.MAX_TS_COLUMNS || '10') // Default pivot column count
  },
  // HTTP API configuration
  api: {
    enabled: flag('API_ENABLED', true),
    port: Number(process.env.PORT || '8000'),
    corsOrigins: list('CORS_ORIGINS') // Origins allowed by CORS (empty = any)
  },
  // Logging configuration
  logLevel: process.env.LOG_LEVEL || 'info' // Log level (trace, debug, info, warn, error, fatal, silent)
};

export type AppConfig = typeof cfg;
