import pg from 'pg';
import { z } from 'zod';

const { Pool } = pg;

export type DbPool = pg.Pool;
export type DbClient = pg.PoolClient;

/** The slice of a pg pool or client the repositories need. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

const poolEnvSchema = z.object({
  DATABASE_URL: z.string().optional(),
  PG_POOL_MAX: z.coerce.number().int().positive().default(20),
});

export function poolConfigFromEnv(env: NodeJS.ProcessEnv = process.env): pg.PoolConfig {
  const parsed = poolEnvSchema.parse(env);
  return {
    connectionString: parsed.DATABASE_URL,
    max: parsed.PG_POOL_MAX,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    application_name: 'relief-router-api',
  };
}

let _pool: pg.Pool | null = null;

export function getPool(): pg.Pool {
  if (!_pool) {
    _pool = new Pool(poolConfigFromEnv());
    _pool.on('error', (err) => {
      console.error('[pg-pool] unexpected error on idle client', err);
    });
  }
  return _pool;
}

/** SqlClient over the shared pool, resolved lazily on each query. */
export function poolClient(): SqlClient {
  return {
    query: (text, values) => getPool().query(text, values),
  };
}

export async function closePool(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
  }
}

/** Run a callback inside a transaction; rolls back on error. */
export async function withTransaction<T>(
  fn: (client: DbClient) => Promise<T>,
): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

export type TransactionRunner = <T>(fn: (client: SqlClient) => Promise<T>) => Promise<T>;

export const poolTransaction: TransactionRunner = (fn) =>
  withTransaction((client) => fn({ query: (text, values) => client.query(text, values) }));
