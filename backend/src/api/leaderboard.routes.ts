import { Router } from 'express';
import type { ApiErrorResponse, LeaderboardResponse } from '../../../shared/src/protocol';
import type { GameService } from '../services/gameService';
import { formatLeaderboard, isLeaderboardError } from '../services/scoreLedger';

const DEFAULT_LIMIT = 10;
const MAX_LIMIT = 100;

function parseLimit(raw: unknown): number | null {
  if (raw === undefined) return DEFAULT_LIMIT;
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 1) return null;
  return Math.min(MAX_LIMIT, limit);
}

export function createLeaderboardRouter(game: GameService): Router {
  const leaderboardRouter = Router();

  leaderboardRouter.get('/', async (req, res) => {
    const limit = parseLimit(req.query.limit);
    if (limit === null) {
      return res.status(400).json({ ok: false, error: 'invalid_limit' } satisfies ApiErrorResponse);
    }

    try {
      const entries = await game.getLeaderboard(limit);
      return res
        .status(200)
        .json({ ok: true, version: 'game_v1', entries, text: formatLeaderboard(entries) } satisfies LeaderboardResponse);
    } catch (error) {
      // eslint-disable-next-line no-console
      console.error('[api] leaderboard failed', error);
      if (isLeaderboardError(error)) {
        return res.status(503).json({ ok: false, error: 'leaderboard_unavailable' } satisfies ApiErrorResponse);
      }
      return res.status(500).json({ ok: false, error: 'internal_error' } satisfies ApiErrorResponse);
    }
  });

  return leaderboardRouter;
}
