import type { QueryResultRow } from 'pg';
import { describe, expect, it } from 'vitest';
import { PgLeaderboardStore, ScoreLedger } from '../services/scoreLedger';
import type { PgQueryFn } from './pg';
import { listLeaderboardScores, upsertLeaderboardScores } from './repos';

type RecordedQuery = { text: string; params: unknown[] };

/** In-process stand-in for the pg pool: records statements, replies with canned rows. */
function createFakeQuery(replies: QueryResultRow[][] = []) {
  const queries: RecordedQuery[] = [];
  let failWith: Error | null = null;

  const query: PgQueryFn = async <T extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []) => {
    queries.push({ text: text.replace(/\s+/g, ' ').trim(), params });
    if (failWith) throw failWith;
    return { rows: (replies.shift() ?? []) as T[] };
  };

  return {
    query,
    queries,
    fail: (error: Error) => {
      failWith = error;
    },
  };
}

describe('leaderboard repos', () => {
  it('maps rows to camelCase records', async () => {
    const fake = createFakeQuery([[{ player_id: 'u1', label: 'Alice', best_score: '70' }]]);
    await expect(listLeaderboardScores(fake.query)).resolves.toEqual([{ playerId: 'u1', label: 'Alice', bestScore: 70 }]);
    expect(fake.queries[0]?.text).toBe(
      'SELECT player_id, label, best_score FROM leaderboard_scores ORDER BY best_score DESC, player_id ASC',
    );
  });

  it('upserts all rows in one statement', async () => {
    const fake = createFakeQuery();
    await upsertLeaderboardScores(
      [
        { playerId: 'u1', label: 'Alice', bestScore: 70 },
        { playerId: 'u2', label: 'Bob', bestScore: 12.9 },
      ],
      fake.query,
    );

    expect(fake.queries).toHaveLength(1);
    expect(fake.queries[0]?.params).toEqual([['u1', 'u2'], ['Alice', 'Bob'], [70, 12]]);
    expect(fake.queries[0]?.text).toContain('WHERE EXCLUDED.best_score > leaderboard_scores.best_score');
  });

  it('skips the statement when there is nothing to write', async () => {
    const fake = createFakeQuery();
    await upsertLeaderboardScores([], fake.query);
    expect(fake.queries).toEqual([]);
  });
});

describe('PgLeaderboardStore', () => {
  it('feeds the ledger from leaderboard_scores', async () => {
    const fake = createFakeQuery([[{ player_id: 'u1', label: 'Alice', best_score: 50 }], [], []]);
    const ledger = new ScoreLedger(new PgLeaderboardStore(fake.query));

    await expect(ledger.record('u2', 'Bob', 60)).resolves.toBe(true);
    expect(fake.queries[1]?.params).toEqual([['u1', 'u2'], ['Alice', 'Bob'], [50, 60]]);
  });

  it('wraps driver failures in a LeaderboardError', async () => {
    const fake = createFakeQuery();
    fake.fail(new Error('connection refused'));
    const store = new PgLeaderboardStore(fake.query);

    await expect(store.load()).rejects.toMatchObject({ code: 'LEADERBOARD_READ_FAILED' });
    await expect(store.save({ u1: { label: 'Alice', bestScore: 1 } })).rejects.toMatchObject({
      code: 'LEADERBOARD_WRITE_FAILED',
    });
  });
});
