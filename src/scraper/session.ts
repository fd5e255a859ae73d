/**
 * Browser Session
 *
 * Explicit state of one scrape pass's browser: the launched browser, its
 * context, the outer page, the opened leaderboard document and the filter
 * currently applied to it.
 *
 * The navigator and extractor only use the narrow `ScrapePage` and
 * `ScrapeLocator` shapes below, which Playwright's `Page` and `Locator`
 * satisfy.
 */

import { chromium } from 'playwright-core';
import type { Browser } from 'playwright-core';
import { logger } from '../core/logger.js';
import { NavigationError, toError } from '../errors/index.js';

export type WaitState = 'attached' | 'detached' | 'visible' | 'hidden';

export interface ScrapeLocator {
  first(): ScrapeLocator;
  nth(index: number): ScrapeLocator;
  locator(selector: string): ScrapeLocator;
  count(): Promise<number>;
  allTextContents(): Promise<string[]>;
  textContent(options?: { timeout?: number }): Promise<string | null>;
  getAttribute(name: string, options?: { timeout?: number }): Promise<string | null>;
  waitFor(options?: { state?: WaitState; timeout?: number }): Promise<void>;
  click(options?: { timeout?: number }): Promise<void>;
}

export interface ScrapePage {
  locator(selector: string, options?: { hasText?: string }): ScrapeLocator;
  goto(url: string, options?: { waitUntil?: 'load' | 'domcontentloaded'; timeout?: number }): Promise<unknown>;
  url(): string;
  waitForTimeout(timeout: number): Promise<void>;
  setDefaultTimeout(timeout: number): void;
}

export interface ScrapeSession {
  browser: { close(): Promise<void> };
  context: { newPage(): Promise<ScrapePage> };
  page: ScrapePage;

  /** Leaderboard document opened from the iframe's src; null until navigated */
  frame: ScrapePage | null;

  /** Label of the filter last selected */
  currentFilter: string | null;

  /**
   * Row texts of the table shown before the last filter click; null when
   * the click is not expected to change the table
   */
  tableSignature: string | null;
}

export interface LaunchOptions {
  headless: boolean;
  executablePath?: string;
  timeoutMs: number;
}

/**
 * Launches Chromium and opens an empty page
 *
 * @throws NavigationError if the browser cannot be started
 */
export async function launchSession(options: LaunchOptions): Promise<ScrapeSession> {
  let browser: Browser;
  try {
    browser = await chromium.launch({
      headless: options.headless,
      executablePath: options.executablePath,
      timeout: options.timeoutMs
    });
  } catch (err) {
    throw new NavigationError(`Failed to launch browser: ${toError(err).message}`, 'launch', toError(err));
  }

  try {
    const context = await browser.newContext();
    const page = await context.newPage();
    page.setDefaultTimeout(options.timeoutMs);
    logger.debug({ headless: options.headless, executablePath: options.executablePath }, 'Browser session opened');
    return { browser, context, page, frame: null, currentFilter: null, tableSignature: null };
  } catch (err) {
    await browser.close().catch((closeErr: unknown) => logger.warn({ err: closeErr }, 'Error closing browser after failed start'));
    throw new NavigationError(`Failed to open browser page: ${toError(err).message}`, 'launch', toError(err));
  }
}

/**
 * Closes the browser and everything opened in it
 */
export async function closeSession(session: ScrapeSession): Promise<void> {
  try {
    await session.browser.close();
    logger.debug('Browser session closed');
  } catch (err) {
    logger.warn({ err }, 'Error closing browser session');
  }
}
