import { Pool, type QueryResultRow } from 'pg';
import { requireDatabaseUrl } from '../config/env';

let _pool: Pool | null = null;

export function getPgPool(): Pool {
  if (_pool) return _pool;

  _pool = new Pool({
    connectionString: requireDatabaseUrl(),
    max: 10,
  });

  _pool.on('error', (err: Error) => {
    // eslint-disable-next-line no-console
    console.error('[db] PG pool error:', err);
  });

  return _pool;
}

export async function closePgPool(): Promise<void> {
  if (!_pool) return;
  const pool = _pool;
  _pool = null;
  await pool.end();
}

export type PgQueryFn = <T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
) => Promise<{ rows: T[] }>;

export const pgQuery: PgQueryFn = async <T extends QueryResultRow = QueryResultRow>(
  text: string,
  params: unknown[] = [],
) => {
  const pool = getPgPool();
  const result = await pool.query<T>(text, params);
  return { rows: result.rows };
};
