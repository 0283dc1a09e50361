import type { LeaderboardRow } from '../../../shared/src/protocol';
import type { PgQueryFn } from '../db/pg';
import { listLeaderboardScores, upsertLeaderboardScores, type LeaderboardScoreRow } from '../db/repos';

export type LeaderboardRecord = {
  label: string;
  bestScore: number;
};

/** playerId -> record */
export type LeaderboardDocument = Record<string, LeaderboardRecord>;

export type LeaderboardErrorCode =
  | 'LEADERBOARD_READ_FAILED'
  | 'LEADERBOARD_WRITE_FAILED'
  | 'LEADERBOARD_CORRUPT';

export class LeaderboardError extends Error {
  readonly code: LeaderboardErrorCode;

  constructor(code: LeaderboardErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LeaderboardError';
    this.code = code;
  }
}

export function isLeaderboardError(error: unknown): error is LeaderboardError {
  return error instanceof LeaderboardError;
}

/**
 * Whole-document storage for the ledger: `save` replaces what `load` returned.
 */
export interface LeaderboardStore {
  load(): Promise<LeaderboardDocument>;
  save(document: LeaderboardDocument): Promise<void>;
}

export class MemoryLeaderboardStore implements LeaderboardStore {
  private document: LeaderboardDocument;

  constructor(initial: LeaderboardDocument = {}) {
    this.document = cloneDocument(initial);
  }

  async load(): Promise<LeaderboardDocument> {
    return cloneDocument(this.document);
  }

  async save(document: LeaderboardDocument): Promise<void> {
    this.document = cloneDocument(document);
  }
}

export class PgLeaderboardStore implements LeaderboardStore {
  constructor(private readonly query?: PgQueryFn) {}

  async load(): Promise<LeaderboardDocument> {
    let rows: LeaderboardScoreRow[];
    try {
      rows = await listLeaderboardScores(this.query);
    } catch (error) {
      throw new LeaderboardError('LEADERBOARD_READ_FAILED', 'Failed to read leaderboard_scores', { cause: error });
    }

    const document: LeaderboardDocument = {};
    for (const row of rows) {
      document[row.playerId] = { label: row.label, bestScore: row.bestScore };
    }
    return document;
  }

  async save(document: LeaderboardDocument): Promise<void> {
    const entries = Object.entries(document).map(([playerId, record]) => ({
      playerId,
      label: record.label,
      bestScore: record.bestScore,
    }));

    try {
      await upsertLeaderboardScores(entries, this.query);
    } catch (error) {
      throw new LeaderboardError('LEADERBOARD_WRITE_FAILED', 'Failed to write leaderboard_scores', { cause: error });
    }
  }
}

function cloneDocument(document: LeaderboardDocument): LeaderboardDocument {
  const copy: LeaderboardDocument = {};
  for (const [playerId, record] of Object.entries(document)) {
    copy[playerId] = { label: record.label, bestScore: record.bestScore };
  }
  return copy;
}

function normalizeLabel(value: string): string {
  return value.trim() || 'Unknown';
}

export const EMPTY_LEADERBOARD_TEXT = 'No scores yet.';

export function formatLeaderboard(rows: LeaderboardRow[]): string {
  if (rows.length === 0) {
    return `🏆 Leaderboard\n${EMPTY_LEADERBOARD_TEXT}`;
  }
  const lines = rows.map((row) => `${row.rank}. ${row.label}: ${row.bestScore}`);
  return ['🏆 Leaderboard', ...lines].join('\n');
}

/**
 * Best score per player. Every load+update+save runs behind one lock so two
 * rounds ending together cannot lose an update.
 */
export class ScoreLedger {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly store: LeaderboardStore) {}

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Returns true when the stored best changed. */
  record(playerId: string, label: string, score: number): Promise<boolean> {
    const safeScore = Math.max(0, Math.floor(score));

    return this.serialize(async () => {
      const document = await this.store.load();
      const existing = document[playerId];
      if (existing && safeScore <= existing.bestScore) {
        return false;
      }

      document[playerId] = { label: normalizeLabel(label), bestScore: safeScore };
      await this.store.save(document);
      return true;
    });
  }

  list(limit?: number): Promise<LeaderboardRow[]> {
    return this.serialize(async () => {
      const document = await this.store.load();
      const sorted = Object.entries(document)
        .map(([playerId, record]) => ({ playerId, label: record.label, bestScore: record.bestScore }))
        .sort((a, b) => {
          if (b.bestScore !== a.bestScore) return b.bestScore - a.bestScore;
          const byLabel = a.label.localeCompare(b.label);
          if (byLabel !== 0) return byLabel;
          return a.playerId.localeCompare(b.playerId);
        });

      const limited = limit === undefined ? sorted : sorted.slice(0, Math.max(1, Math.floor(limit)));
      return limited.map((entry, idx) => ({ rank: idx + 1, ...entry }));
    });
  }

  async render(limit?: number): Promise<string> {
    return formatLeaderboard(await this.list(limit));
  }
}
