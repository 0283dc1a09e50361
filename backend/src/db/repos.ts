import { pgQuery, type PgQueryFn } from './pg';

export type LeaderboardScoreRow = {
  playerId: string;
  label: string;
  bestScore: number;
};

export async function listLeaderboardScores(query: PgQueryFn = pgQuery): Promise<LeaderboardScoreRow[]> {
  const { rows } = await query<{
    player_id: string;
    label: string;
    best_score: number;
  }>(
    `
    SELECT player_id, label, best_score
    FROM leaderboard_scores
    ORDER BY best_score DESC, player_id ASC
    `,
  );

  return rows.map((row) => ({
    playerId: String(row.player_id),
    label: String(row.label ?? 'Unknown'),
    bestScore: Number(row.best_score ?? 0),
  }));
}

/**
 * Writes every row in one statement. A stored score is only replaced by a
 * strictly higher one, so concurrent writers cannot lower a best.
 */
export async function upsertLeaderboardScores(
  entries: LeaderboardScoreRow[],
  query: PgQueryFn = pgQuery,
): Promise<void> {
  if (entries.length === 0) return;

  await query(
    `
    INSERT INTO leaderboard_scores (player_id, label, best_score, updated_at)
    SELECT player_id, label, best_score, now()
    FROM unnest($1::text[], $2::text[], $3::int[]) AS t(player_id, label, best_score)
    ON CONFLICT (player_id)
    DO UPDATE SET
      label = EXCLUDED.label,
      best_score = EXCLUDED.best_score,
      updated_at = now()
    WHERE EXCLUDED.best_score > leaderboard_scores.best_score
    `,
    [
      entries.map((e) => e.playerId),
      entries.map((e) => e.label),
      entries.map((e) => Math.max(0, Math.floor(e.bestScore))),
    ],
  );
}
