import { readFile } from 'fs/promises';
import { poolClient } from './pool.js';
import type { SqlClient } from './pool.js';

/** Resolved through the package so it works from sources and from dist alike. */
export const SCHEMA_PATH = require.resolve('@relief-router/adapters/sql/schema.sql');

/** Create the relief schema and its tables (idempotent). */
export async function applySchema(db: SqlClient = poolClient()): Promise<void> {
  const sql = await readFile(SCHEMA_PATH, 'utf-8');
  await db.query(sql);
  console.log('[pg] schema applied');
}
