export function requireEnv(name: string): string {
  const v = process.env[name];
  if (!v) throw new Error(`Missing required env var: ${name}`);
  return v;
}

export function getOptionalEnv(name: string): string | undefined {
  const v = process.env[name];
  return v ? v : undefined;
}

export function getPort(): number {
  const raw = Number(process.env.PORT ?? 8080);
  return Number.isFinite(raw) && raw > 0 ? Math.floor(raw) : 8080;
}

/**
 * DB
 * - only read when LEADERBOARD_STORE=pg
 */
export function requireDatabaseUrl(): string {
  return requireEnv('DATABASE_URL');
}

export type LeaderboardStoreKind = 'file' | 'pg' | 'memory';

export function getLeaderboardStoreKind(): LeaderboardStoreKind {
  const raw = String(process.env.LEADERBOARD_STORE ?? 'file').trim().toLowerCase();
  if (raw === 'pg' || raw === 'memory' || raw === 'file') return raw;
  throw new Error(`Unsupported LEADERBOARD_STORE: ${raw} (expected file, pg or memory)`);
}

export function getLeaderboardFilePath(): string {
  return getOptionalEnv('LEADERBOARD_FILE') ?? 'data/leaderboard.json';
}

export type TelegramMode = 'polling' | 'webhook';

export function getTelegramMode(): TelegramMode {
  const raw = String(process.env.TG_MODE ?? 'polling').trim().toLowerCase();
  return raw === 'webhook' ? 'webhook' : 'polling';
}

export function getBotToken(): string | undefined {
  return getOptionalEnv('TG_BOT_TOKEN');
}

export function getWebhookSecret(): string | undefined {
  return getOptionalEnv('TG_WEBHOOK_SECRET');
}
