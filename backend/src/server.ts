import http from 'http';

import { createApp } from './app';
import {
  getBotToken,
  getLeaderboardFilePath,
  getLeaderboardStoreKind,
  getOptionalEnv,
  getPort,
  getTelegramMode,
  getWebhookSecret,
  type LeaderboardStoreKind,
} from './config/env';
import { resolveSchemaPath, runMigrationsFromSchemaSql } from './db/migrate';
import { closePgPool } from './db/pg';
import { GameService } from './services/gameService';
import { JsonFileLeaderboardStore } from './services/leaderboardFileStore';
import {
  MemoryLeaderboardStore,
  PgLeaderboardStore,
  ScoreLedger,
  type LeaderboardStore,
} from './services/scoreLedger';
import { TelegramBotApi } from './telegram/botApi';
import { TelegramPoller } from './telegram/poller';
import { TelegramUpdateHandler } from './telegram/updateHandler';

async function createLeaderboardStore(kind: LeaderboardStoreKind): Promise<LeaderboardStore> {
  switch (kind) {
    case 'pg':
      await runMigrationsFromSchemaSql(resolveSchemaPath());
      return new PgLeaderboardStore();
    case 'memory':
      return new MemoryLeaderboardStore();
    case 'file':
      return new JsonFileLeaderboardStore(getLeaderboardFilePath());
  }
}

async function main(): Promise<void> {
  const storeKind = getLeaderboardStoreKind();
  const ledger = new ScoreLedger(await createLeaderboardStore(storeKind));
  const game = new GameService({ ledger });

  const botToken = getBotToken();
  const telegramMode = getTelegramMode();
  const botApi = botToken ? new TelegramBotApi(botToken) : null;
  const handler = botApi ? new TelegramUpdateHandler(botApi, game) : null;

  const app = createApp({
    game,
    telegram: handler && telegramMode === 'webhook' ? { handler, webhookSecret: getWebhookSecret() } : undefined,
    corsOrigin: getOptionalEnv('CORS_ORIGIN'),
  });

  const port = getPort();
  const server = http.createServer(app);
  const poller = botApi && handler && telegramMode === 'polling' ? new TelegramPoller(botApi, handler) : null;

  server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log('[boot] summary', {
      port,
      nodeEnv: process.env.NODE_ENV ?? 'development',
      leaderboardStore: storeKind,
      telegram: botToken ? telegramMode : 'disabled',
    });
    if (!botToken) {
      // eslint-disable-next-line no-console
      console.warn('[boot] TG_BOT_TOKEN not set; serving the HTTP API only');
    }
  });

  if (poller) {
    void poller.start().catch((error: unknown) => {
      // eslint-disable-next-line no-console
      console.error('[telegram] poller stopped unexpectedly', error);
    });
  }

  const shutdown = (signal: string) => {
    // eslint-disable-next-line no-console
    console.log('[boot] shutting down', { signal });
    void (async () => {
      await poller?.stop();
      await new Promise<void>((resolve) => server.close(() => resolve()));
      if (storeKind === 'pg') await closePgPool();
      process.exit(0);
    })().catch((error: unknown) => {
      // eslint-disable-next-line no-console
      console.error('[boot] shutdown failed', error);
      process.exit(1);
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

void main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('Fatal server startup error', error);
  process.exit(1);
});
