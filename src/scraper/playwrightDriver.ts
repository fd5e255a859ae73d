/**
 * Playwright Scrape Driver
 *
 * Binds the navigator and extractor to a real Chromium session.
 */

import type { AppConfig } from '../core/config.js';
import type { ScrapeDriver } from '../services/scrapeOrchestrator.js';
import { readRankingTable } from './extractor.js';
import { listFilterOptions, openLeaderboardFrame, selectFilter } from './navigator.js';
import { closeSession, launchSession } from './session.js';
import type { ScrapeSession } from './session.js';

export function createPlaywrightDriver(config: Pick<AppConfig, 'scrape' | 'browser'>): ScrapeDriver<ScrapeSession> {
  const { scrape, browser } = config;

  return {
    openSession: () => launchSession({
      headless: browser.headless,
      executablePath: browser.executablePath,
      timeoutMs: scrape.navigationTimeoutMs
    }),

    navigate: async (session) => {
      await openLeaderboardFrame(session, {
        url: scrape.url,
        game: scrape.game,
        timeoutMs: scrape.navigationTimeoutMs
      });
      return listFilterOptions(session, scrape.navigationTimeoutMs);
    },

    selectFilter: (session, option) => selectFilter(session, option, scrape.tableTimeoutMs),

    readTable: (session) => readRankingTable(session, {
      timeoutMs: scrape.tableTimeoutMs,
      settleMs: scrape.tableSettleMs
    }),

    closeSession
  };
}
