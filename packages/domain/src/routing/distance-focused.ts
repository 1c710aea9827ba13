import type { DemandPoint } from '../entities/demand-point.js';
import type { Location } from '../entities/location.js';
import type { DistanceRoutePlan } from '../entities/route-plan.js';
import type { Vehicle } from '../entities/vehicle.js';
import { distanceKm } from './geo-distance.js';
import { summarizeWalk, walkRoute } from './route-walk.js';

/**
 * Nearest-neighbour visiting order starting from `start`.
 * Equal distances keep input order.
 */
export function nearestNeighborOrder(demands: readonly DemandPoint[], start: Location): DemandPoint[] {
  const remaining = [...demands];
  const ordered: DemandPoint[] = [];
  let current = start;

  while (remaining.length > 0) {
    let bestIndex = 0;
    let bestDistance = Infinity;
    remaining.forEach((demand, index) => {
      const d = distanceKm(current, demand.location);
      if (d < bestDistance) {
        bestDistance = d;
        bestIndex = index;
      }
    });

    const [next] = remaining.splice(bestIndex, 1);
    if (!next) break;
    ordered.push(next);
    current = next.location;
  }

  return ordered;
}

/** Greedy plan that always drives to the closest unvisited demand. */
export function distanceFocusedRoute(demands: readonly DemandPoint[], vehicle: Vehicle): DistanceRoutePlan {
  const walk = walkRoute(vehicle.depot, nearestNeighborOrder(demands, vehicle.depot));
  const { summary, sharedMetadata } = summarizeWalk(vehicle, walk);

  return {
    mode: 'distance',
    ...summary,
    metadata: { algorithm: 'nearest_neighbor', ...sharedMetadata },
  };
}
