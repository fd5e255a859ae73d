/**
 * API Routes
 *
 * Read endpoints over the pivot queries and one write endpoint that runs a
 * scrape pass. Query-string parameters are validated before any query runs.
 */

import { Router } from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { QUERY_LIMITS } from '../core/constants.js';
import type { Backend } from '../db/backend.js';
import {
  lastUpdateMarker,
  listLeaderboardNames,
  playerHistory,
  previewAll,
  topPlayers,
  widePivot
} from '../services/pivotQueries.js';
import type { TriggerResult } from '../services/scrapeScheduler.js';
import { parsePositiveInt, requireText } from '../util/validation.js';

export interface ApiDeps {
  backend: Backend;

  /** Runs a pass unless one is already running */
  scheduler: { trigger(): Promise<TriggerResult> };

  /** Default pivot column count */
  defaultColumns: number;
}

/**
 * Forwards rejections of an async handler to the error middleware
 */
function asyncHandler(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

export function createApiRouter(deps: ApiDeps): Router {
  const { backend, scheduler, defaultColumns } = deps;
  const router = Router();

  router.get('/tables', asyncHandler(async (_req, res) => {
    res.json({ tables: await listLeaderboardNames(backend) });
  }));

  router.get('/pivot', asyncHandler(async (req, res) => {
    const leaderboard = requireText(req.query.leaderboard, 'leaderboard');
    const columns = parsePositiveInt(req.query.columns, 'columns', defaultColumns, QUERY_LIMITS.MAX_LIMIT);
    const limit = parsePositiveInt(req.query.limit, 'limit', QUERY_LIMITS.DEFAULT_PIVOT_ROWS, QUERY_LIMITS.MAX_LIMIT);
    res.json(await widePivot(backend, leaderboard, columns, limit));
  }));

  router.get('/history', asyncHandler(async (req, res) => {
    const leaderboard = requireText(req.query.leaderboard, 'leaderboard');
    const player = requireText(req.query.player, 'player');
    res.json({ history: await playerHistory(backend, leaderboard, player) });
  }));

  router.get('/top', asyncHandler(async (req, res) => {
    const leaderboard = requireText(req.query.leaderboard, 'leaderboard');
    const limit = parsePositiveInt(req.query.limit, 'limit', QUERY_LIMITS.DEFAULT_TOP_PLAYERS, QUERY_LIMITS.MAX_LIMIT);
    res.json({ entries: await topPlayers(backend, leaderboard, limit) });
  }));

  router.get('/preview', asyncHandler(async (_req, res) => {
    res.json({ previews: await previewAll(backend, QUERY_LIMITS.PREVIEW_COLUMNS, QUERY_LIMITS.PREVIEW_ROWS) });
  }));

  router.get('/last_update', asyncHandler(async (_req, res) => {
    res.json({ last_update: await lastUpdateMarker(backend) });
  }));

  router.post('/scrape', asyncHandler(async (_req, res) => {
    const result = await scheduler.trigger();
    if (!result.started) {
      res.status(409).json({ error: 'A scrape pass is already running' });
      return;
    }
    res.status(202).json({ summary: result.summary });
  }));

  return router;
}
