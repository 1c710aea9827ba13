// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, closePool, withTransaction, poolClient, poolTransaction, poolConfigFromEnv } from './postgres/pool.js';
export type { DbPool, DbClient, SqlClient, TransactionRunner } from './postgres/pool.js';
export { PgMessageRepository } from './postgres/message.repository.js';
export { PgRoutePlanRepository } from './postgres/route-plan.repository.js';
export { applySchema, SCHEMA_PATH } from './postgres/schema.js';
