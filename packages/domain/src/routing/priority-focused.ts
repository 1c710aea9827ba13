import type { DemandPoint } from '../entities/demand-point.js';
import type { PriorityRoutePlan } from '../entities/route-plan.js';
import type { Vehicle } from '../entities/vehicle.js';
import { summarizeWalk, walkRoute } from './route-walk.js';

/** Highest urgency first; oldest request first within an urgency tier. */
export function urgencyOrder(demands: readonly DemandPoint[]): DemandPoint[] {
  return [...demands].sort((a, b) => b.urgency - a.urgency || a.timestamp - b.timestamp);
}

/** Serves demands strictly by urgency, whatever the detour costs. */
export function priorityFocusedRoute(demands: readonly DemandPoint[], vehicle: Vehicle): PriorityRoutePlan {
  const walk = walkRoute(vehicle.depot, urgencyOrder(demands));
  const { summary, sharedMetadata } = summarizeWalk(vehicle, walk);

  return {
    mode: 'priority',
    ...summary,
    metadata: { algorithm: 'urgency_first', ...sharedMetadata },
  };
}
