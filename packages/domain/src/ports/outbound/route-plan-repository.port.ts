import type { RoutePlan, StoredRoutePlan } from '../../entities/route-plan.js';

export interface RoutePlanRepositoryPort {
  insert(plan: RoutePlan): Promise<StoredRoutePlan>;
  /** All-or-nothing; results keep the input order. */
  insertMany(plans: readonly RoutePlan[]): Promise<StoredRoutePlan[]>;
  listRecent(limit: number): Promise<StoredRoutePlan[]>;
}
