import { Router } from 'express';
import type {
  ApiErrorResponse,
  GameMoveRequest,
  GameStartRequest,
  GameTextResponse,
} from '../../../shared/src/protocol';
import type { GameService } from '../services/gameService';
import { readBody, readTrimmedString } from './body';

export function createGameRouter(game: GameService): Router {
  const gameRouter = Router();

  gameRouter.post('/start', async (req, res) => {
    const body = readBody(req);
    const ownerId = readTrimmedString(body, 'ownerId');
    const request: GameStartRequest = {
      sessionKey: readTrimmedString(body, 'sessionKey'),
      ownerId,
      ownerLabel: readTrimmedString(body, 'ownerLabel') || `Player ${ownerId}`,
    };
    const { sessionKey, ownerLabel } = request;

    if (!sessionKey) {
      return res.status(400).json({ ok: false, error: 'invalid_session_key' } satisfies ApiErrorResponse);
    }
    if (!ownerId) {
      return res.status(400).json({ ok: false, error: 'invalid_owner_id' } satisfies ApiErrorResponse);
    }

    try {
      const text = await game.startRound(sessionKey, ownerId, ownerLabel);
      return res.status(200).json({ ok: true, version: 'game_v1', text } satisfies GameTextResponse);
    } catch (error) {
      // eslint-disable-next-line no-console
      console.error('[api] start failed', error);
      return res.status(500).json({ ok: false, error: 'internal_error' } satisfies ApiErrorResponse);
    }
  });

  gameRouter.post('/move', async (req, res) => {
    const body = readBody(req);
    const request: GameMoveRequest = {
      sessionKey: readTrimmedString(body, 'sessionKey'),
      direction: readTrimmedString(body, 'direction').toLowerCase(),
    };
    const { sessionKey, direction } = request;

    if (!sessionKey) {
      return res.status(400).json({ ok: false, error: 'invalid_session_key' } satisfies ApiErrorResponse);
    }

    try {
      const text = await game.processMove(sessionKey, direction);
      return res.status(200).json({ ok: true, version: 'game_v1', text } satisfies GameTextResponse);
    } catch (error) {
      // eslint-disable-next-line no-console
      console.error('[api] move failed', error);
      return res.status(500).json({ ok: false, error: 'internal_error' } satisfies ApiErrorResponse);
    }
  });

  return gameRouter;
}
