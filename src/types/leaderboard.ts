/**
 * Leaderboard Type Definitions
 *
 * Shapes produced by the browser layer and consumed by the orchestrator.
 * Nothing here knows about the DOM: the scraper turns page content into
 * these types and everything downstream works on them only.
 */

/**
 * One selectable filter (blind level) in the leaderboard dropdown
 */
export interface FilterOption {
  index: number; // Position in the dropdown, used to select it again
  label: string; // Human-readable label (e.g., "$0.01/$0.02")
}

/**
 * Cell contents of one rendered ranking table row, before parsing
 */
export interface RawRankingRow {
  cells: string[];
  country: string | null; // Flag image title/alt when the country cell has no text
}

/**
 * Parsed ranking table row
 */
export interface RankingRow {
  rank: number;
  player: string;
  country: string | null;
  points: number;
}

/**
 * Result of reading one filter's ranking table
 */
export interface ExtractedTable {
  rows: RankingRow[];
  skippedRows: number; // Rows dropped because they could not be parsed
}
