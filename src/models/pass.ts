/**
 * Pass Models
 *
 * Defines what one scrape pass hands to persistence and what it reports back.
 */

import type { RankingRow } from '../types/leaderboard.js';

/**
 * Rows collected for one leaderboard during a pass
 */
export interface CollectedLeaderboard {
  /** Leaderboard name, "<game> - <filter label>" */
  name: string;

  /** Filter label as shown in the dropdown */
  filter: string;

  rows: RankingRow[];

  /** Rows skipped by the parser for this filter */
  skippedRows: number;
}

/**
 * A filter that was skipped during a pass
 */
export interface SkippedFilter {
  filter: string;
  reason: string;
}

/**
 * Everything one pass observed, tagged with a single creation timestamp
 *
 * Persisted as one update batch: all facts share `createdAt`.
 */
export interface PassCollection {
  createdAt: Date;
  filters: number;
  leaderboards: CollectedLeaderboard[];
  skippedFilters: SkippedFilter[];
}

/**
 * Outcome of persisting a pass collection
 */
export interface PersistResult {
  batchId: number;
  factsInserted: number;

  /** Facts ignored because the (leaderboard, player, batch) triple already existed */
  duplicateFacts: number;
}

/**
 * Per-leaderboard line of a pass summary
 */
export interface LeaderboardSummary {
  name: string;
  rows: number;
  skippedRows: number;
}

/**
 * Pass summary reported to the caller (scheduler, API)
 *
 * `empty` means no filter produced rows, so no batch was created.
 */
export interface PassSummary {
  status: 'completed' | 'empty';
  batchId: number | null;
  createdAt: string;
  filters: number;
  leaderboards: LeaderboardSummary[];
  skippedFilters: SkippedFilter[];
  skippedRows: number;
  factsInserted: number;
  duplicateFacts: number;
}
