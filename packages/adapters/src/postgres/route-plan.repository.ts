import type { RoutePlan, RoutePlanRepositoryPort, StoredRoutePlan } from '@relief-router/domain';
import { poolClient, poolTransaction } from './pool.js';
import type { SqlClient, TransactionRunner } from './pool.js';
import { insertedPlanRowSchema, routePlanRowSchema } from './rows.js';

async function insertPlan(db: SqlClient, plan: RoutePlan): Promise<StoredRoutePlan> {
  const { rows } = await db.query(
    `INSERT INTO relief.route_plans
      (mode, depot_lat, depot_lon, stops, total_distance_km,
       estimated_time_minutes, urgent_requests_served, metadata)
     VALUES ($1,$2,$3,$4::jsonb,$5,$6,$7,$8::jsonb)
     RETURNING id, created_at`,
    [
      plan.mode,
      plan.depot_lat,
      plan.depot_lon,
      JSON.stringify(plan.stops),
      plan.total_distance_km,
      plan.estimated_time_minutes,
      plan.urgent_requests_served,
      JSON.stringify(plan.metadata),
    ],
  );
  const { id, created_at } = insertedPlanRowSchema.parse(rows[0]);
  console.log(
    `[route-plans] stored id=${id} mode=${plan.mode} stops=${plan.stops.length} distance=${plan.total_distance_km.toFixed(2)}km`,
  );
  return { ...plan, id, created_at };
}

export class PgRoutePlanRepository implements RoutePlanRepositoryPort {
  constructor(
    private readonly db: SqlClient = poolClient(),
    private readonly transaction: TransactionRunner = poolTransaction,
  ) {}

  async insert(plan: RoutePlan): Promise<StoredRoutePlan> {
    return insertPlan(this.db, plan);
  }

  /** Stores the plans in one transaction, keeping their order. */
  async insertMany(plans: readonly RoutePlan[]): Promise<StoredRoutePlan[]> {
    return this.transaction(async (tx) => {
      const stored: StoredRoutePlan[] = [];
      for (const plan of plans) {
        stored.push(await insertPlan(tx, plan));
      }
      return stored;
    });
  }

  async listRecent(limit: number): Promise<StoredRoutePlan[]> {
    const { rows } = await this.db.query(
      `SELECT id, created_at, mode, depot_lat, depot_lon, stops,
              total_distance_km, estimated_time_minutes, urgent_requests_served, metadata
       FROM relief.route_plans
       ORDER BY created_at DESC, id DESC
       LIMIT $1`,
      [limit],
    );
    return rows.map((row) => routePlanRowSchema.parse(row));
  }
}
