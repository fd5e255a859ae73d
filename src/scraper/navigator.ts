/**
 * Page Navigator
 *
 * Brings a session from an empty page to the leaderboard document: loads
 * the promotions page, finds the game's section, opens its iframe's
 * document in its own page, then enumerates and selects filters there.
 *
 * Every wait is bounded. Failures before a filter is chosen are
 * NavigationErrors (the pass cannot continue); failing to select one
 * filter is an ExtractionError for that filter only.
 */

import { logger } from '../core/logger.js';
import { ExtractionError, NavigationError, toError } from '../errors/index.js';
import type { FilterOption } from '../types/leaderboard.js';
import { SELECTORS } from './selectors.js';
import type { ScrapeLocator, ScrapePage, ScrapeSession } from './session.js';

export interface OpenFrameOptions {
  url: string;
  game: string;
  timeoutMs: number;
}

/**
 * Runs one navigation step, converting any failure into a NavigationError
 */
async function navigationStep<T>(step: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof NavigationError) throw err;
    const error = toError(err);
    throw new NavigationError(`Navigation failed at ${step}: ${error.message}`, step, error);
  }
}

/**
 * Leaderboard document of a session
 *
 * @throws NavigationError if the frame was never opened
 */
export function requireFrame(session: ScrapeSession): ScrapePage {
  if (!session.frame) {
    throw new NavigationError('Leaderboard frame is not open', 'frame');
  }
  return session.frame;
}

/**
 * Joined row texts of the ranking table, or '' while it has no rows
 */
export async function readRowSignature(frame: ScrapePage): Promise<string> {
  const rows = frame.locator(SELECTORS.rankingBody).first().locator(SELECTORS.rankingRow);
  return (await rows.allTextContents()).join('\n');
}

/**
 * Reads the `src` of the iframe belonging to the game's section
 */
async function findIframeSrc(heading: ScrapeLocator, timeoutMs: number): Promise<string> {
  const inSection = heading.locator(SELECTORS.sectionIframe).first();
  const iframe = (await inSection.count()) > 0 ? inSection : heading.locator(SELECTORS.followingIframe).first();
  await iframe.waitFor({ state: 'attached', timeout: timeoutMs });

  const src = await iframe.getAttribute('src', { timeout: timeoutMs });
  if (!src) {
    throw new NavigationError('Leaderboard iframe has no src', 'iframe');
  }
  return src;
}

/**
 * Opens the game's leaderboard document in a new page of the session
 *
 * @throws NavigationError on a timeout or a missing heading, iframe or src
 */
export async function openLeaderboardFrame(session: ScrapeSession, options: OpenFrameOptions): Promise<void> {
  const { url, game, timeoutMs } = options;

  await navigationStep('page', () => session.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs }));
  logger.info({ url }, 'Promotions page loaded');

  const heading = session.page.locator(SELECTORS.gameHeading, { hasText: game }).first();
  await navigationStep('heading', () => heading.waitFor({ state: 'attached', timeout: timeoutMs }));

  const src = await navigationStep('iframe', () => findIframeSrc(heading, timeoutMs));
  const frameUrl = new URL(src, session.page.url()).toString();

  const frame = await navigationStep('frame', async () => {
    const page = await session.context.newPage();
    page.setDefaultTimeout(timeoutMs);
    await page.goto(frameUrl, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    return page;
  });

  session.frame = frame;
  session.currentFilter = null;
  session.tableSignature = null;
  logger.info({ game, frameUrl }, 'Leaderboard frame opened');
}

/**
 * Enumerates the filter dropdown entries, in on-page order
 *
 * Each option keeps its position among all entries so it can be selected
 * again; blank entries are dropped.
 *
 * @throws NavigationError if the dropdown never appears or lists nothing
 */
export async function listFilterOptions(session: ScrapeSession, timeoutMs: number): Promise<FilterOption[]> {
  const frame = requireFrame(session);

  const labels = await navigationStep('filters', async () => {
    await frame.locator(SELECTORS.dropdown).first().waitFor({ state: 'attached', timeout: timeoutMs });
    await frame.locator(SELECTORS.dropdownOption).first().waitFor({ state: 'attached', timeout: timeoutMs });
    return frame.locator(SELECTORS.dropdownOption).allTextContents();
  });

  const options = labels
    .map((text, index) => ({ index, label: text.trim() }))
    .filter(option => option.label !== '');

  if (options.length === 0) {
    throw new NavigationError('Filter dropdown has no options', 'filters');
  }

  logger.info({ filters: options.map(o => o.label) }, 'Filters enumerated');
  return options;
}

/**
 * Applies one filter: opens the dropdown, waits for it to be open, clicks the entry
 *
 * The rows shown before the click are kept on the session so the next
 * table read can wait for them to be replaced. When the toggle already
 * names the filter, no change is expected.
 *
 * @throws ExtractionError for this filter on any failure
 */
export async function selectFilter(session: ScrapeSession, option: FilterOption, timeoutMs: number): Promise<void> {
  const frame = requireFrame(session);

  try {
    const entry = frame.locator(SELECTORS.dropdownOption).nth(option.index);
    const text = (await entry.textContent({ timeout: timeoutMs }))?.trim() ?? '';
    if (text !== option.label) {
      throw new Error(`dropdown entry ${option.index} now reads "${text}"`);
    }

    const toggle = frame.locator(SELECTORS.dropdownToggle).first();
    const shown = (await toggle.textContent({ timeout: timeoutMs }))?.trim() ?? '';
    session.tableSignature = shown === option.label ? null : await readRowSignature(frame);

    await toggle.click({ timeout: timeoutMs });
    await frame.locator(SELECTORS.dropdownOpen).first().waitFor({ state: 'attached', timeout: timeoutMs });
    await entry.click({ timeout: timeoutMs });
  } catch (err) {
    const error = toError(err);
    throw new ExtractionError(`Failed to select filter ${option.label}: ${error.message}`, option.label, error);
  }

  session.currentFilter = option.label;
  logger.debug({ filter: option.label }, 'Filter selected');
}
