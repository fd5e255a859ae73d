/**
 * Page Selectors
 *
 * Centralized selectors for the promotions page and the embedded
 * leaderboard document, so markup changes are fixed in one place.
 */

export const SELECTORS = {
  /** Section heading that names the game (e.g. "PLO") */
  gameHeading: 'h4',

  /** First iframe inside the heading's section */
  sectionIframe: 'xpath=ancestor::section[1]//iframe',

  /** First iframe anywhere after the heading in document order */
  followingIframe: 'xpath=following::iframe[1]',

  /** Filter (blind level) dropdown and its entries */
  dropdown: '.dropdown-layer',
  dropdownOpen: '.dropdown-layer.layer-open',
  dropdownOption: '.dropdown-layer li',

  /** Toggle that opens the dropdown */
  dropdownToggle: '.blind-text',

  /** Ranking table body, its rows, and the cells of a row */
  rankingBody: '.playerRankingBody',
  rankingRow: 'tr',
  rankingCell: 'td',

  /** Flag image inside the country cell */
  flagImage: 'img',
} as const;

/** Index of the country cell within a ranking row */
export const COUNTRY_CELL = 2;
