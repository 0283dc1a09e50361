import fs from 'node:fs/promises';
import path from 'node:path';
import {
  LeaderboardError,
  type LeaderboardDocument,
  type LeaderboardRecord,
  type LeaderboardStore,
} from './scoreLedger';

function isErrnoCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

function parseRecord(value: unknown): LeaderboardRecord | null {
  if (typeof value !== 'object' || value === null) return null;
  const payload = value as Record<string, unknown>;
  const bestScore = Number(payload.bestScore);
  if (!Number.isFinite(bestScore)) return null;
  return {
    label: String(payload.label ?? '').trim() || 'Unknown',
    bestScore: Math.max(0, Math.floor(bestScore)),
  };
}

export function parseLeaderboardDocument(raw: string): LeaderboardDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new LeaderboardError('LEADERBOARD_CORRUPT', 'Leaderboard file is not valid JSON', { cause: error });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new LeaderboardError('LEADERBOARD_CORRUPT', 'Leaderboard file must hold a JSON object');
  }

  const document: LeaderboardDocument = {};
  for (const [playerId, value] of Object.entries(parsed)) {
    const record = parseRecord(value);
    if (!record) {
      throw new LeaderboardError('LEADERBOARD_CORRUPT', `Invalid leaderboard entry for player ${playerId}`);
    }
    document[playerId] = record;
  }
  return document;
}

/**
 * JSON document on disk, replaced as a whole on every save
 * (written to a sibling temp file, then renamed over the original).
 */
export class JsonFileLeaderboardStore implements LeaderboardStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async load(): Promise<LeaderboardDocument> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return {};
      throw new LeaderboardError('LEADERBOARD_READ_FAILED', `Failed to read ${this.filePath}`, { cause: error });
    }

    if (!raw.trim()) return {};
    return parseLeaderboardDocument(raw);
  }

  async save(document: LeaderboardDocument): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      throw new LeaderboardError('LEADERBOARD_WRITE_FAILED', `Failed to write ${this.filePath}`, { cause: error });
    }
  }
}
