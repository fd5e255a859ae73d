/**
 * Leaderboard Tracker - Main Entry Point
 * 
 * This service scrapes the blind-level leaderboards embedded in a
 * promotions page with a headless browser, stores every pass as one
 * timestamped batch of point facts (SQLite or PostgreSQL), and serves
 * pivot, history and top-player views over HTTP.
 */

import { logger } from './core/logger.js';
import { startApp } from './services/app.js';

// Start the service and handle any uncaught errors
startApp().catch((err) => {
  logger.error({ err }, 'Fatal error occurred');
  process.exit(1);
});
