import cors from 'cors';
import express, { type Express } from 'express';

import { createGameRouter } from './api/game.routes';
import { createHealthRouter } from './api/health.routes';
import { createLeaderboardRouter } from './api/leaderboard.routes';
import { createTelegramRouter } from './api/telegram.routes';
import type { GameService } from './services/gameService';
import type { TelegramUpdateHandler } from './telegram/updateHandler';

export type AppDeps = {
  game: GameService;
  telegram?: {
    handler: TelegramUpdateHandler;
    webhookSecret?: string;
  };
  corsOrigin?: string;
};

export function createApp(deps: AppDeps): Express {
  const app = express();

  if (deps.corsOrigin) {
    app.use(cors({ origin: deps.corsOrigin }));
  } else {
    app.use(cors());
  }
  app.use(express.json());

  // public
  app.use(createHealthRouter(() => deps.game.registry.size()));

  // api
  app.use('/api/game', createGameRouter(deps.game));
  app.use('/api/leaderboard', createLeaderboardRouter(deps.game));

  // bot
  if (deps.telegram) {
    app.use('/telegram', createTelegramRouter(deps.telegram.handler, deps.telegram.webhookSecret));
  }

  return app;
}
