import fs from 'node:fs';
import path from 'node:path';
import { getPgPool } from './pg';

const MIGRATION_LOCK_KEY = 734_117_902;

/** The slice of a pg client the migration runner touches. */
export interface MigrationClient {
  query(text: string, params?: unknown[]): Promise<unknown>;
  release(): void;
}

export interface MigrationPool {
  connect(): Promise<MigrationClient>;
}

/**
 * Finds backend/sql/schema.sql from either the repo root or backend/.
 */
export function resolveSchemaPath(baseDir = process.cwd()): string {
  const candidates = [path.resolve(baseDir, 'sql', 'schema.sql'), path.resolve(baseDir, 'backend', 'sql', 'schema.sql')];
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) throw new Error(`schema.sql not found (checked ${candidates.join(', ')})`);
  return found;
}

/**
 * Runs the schema in one transaction under a session advisory lock.
 */
export async function applySchema(pool: MigrationPool, schemaSql: string): Promise<void> {
  const client = await pool.connect();

  try {
    await client.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_KEY]);
    try {
      await client.query('BEGIN');
      await client.query(schemaSql);
      await client.query('COMMIT');
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        // eslint-disable-next-line no-console
        console.warn('[db] rollback after failed migration also failed', rollbackError);
      }
      throw error;
    } finally {
      try {
        await client.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_KEY]);
      } catch (unlockError) {
        // eslint-disable-next-line no-console
        console.warn('[db] failed to release migration lock', unlockError);
      }
    }
  } finally {
    client.release();
  }
}

function sharedPoolSource(): MigrationPool {
  return {
    connect: async () => {
      const client = await getPgPool().connect();
      return {
        query: (text, params) => client.query(text, params),
        release: () => client.release(),
      };
    },
  };
}

export async function runMigrationsFromSchemaSql(
  schemaPath: string,
  pool: MigrationPool = sharedPoolSource(),
): Promise<void> {
  const schemaSql = await fs.promises.readFile(schemaPath, 'utf8');
  await applySchema(pool, schemaSql);
  // eslint-disable-next-line no-console
  console.log('[db] schema applied', { schemaPath });
}
