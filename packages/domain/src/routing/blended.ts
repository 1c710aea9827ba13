import type { DemandPoint } from '../entities/demand-point.js';
import type { Location } from '../entities/location.js';
import type { BlendedRoutePlan } from '../entities/route-plan.js';
import type { Vehicle } from '../entities/vehicle.js';
import { distanceKm } from './geo-distance.js';
import { summarizeWalk, walkRoute } from './route-walk.js';

export interface BlendWeights {
  readonly urgencyWeight: number;
  readonly distanceWeight: number;
}

/**
 * score = urgencyWeight * urgency - distanceWeight * (distance / maxDistance)
 *
 * `maxDistance` is the farthest remaining demand from the current position.
 * When every remaining demand sits on the current position it is 0 and 1 is
 * used instead.
 */
export function blendedScore(
  urgency: number,
  distance: number,
  maxDistance: number,
  weights: BlendWeights,
): number {
  const normalized = distance / (maxDistance === 0 ? 1 : maxDistance);
  return weights.urgencyWeight * urgency - weights.distanceWeight * normalized;
}

/**
 * Greedy order picking the best blended score at every step. The
 * normalisation is recomputed from the current position each step; ties keep
 * input order.
 */
export function weightedOrder(
  demands: readonly DemandPoint[],
  start: Location,
  weights: BlendWeights,
): DemandPoint[] {
  const remaining = [...demands];
  const ordered: DemandPoint[] = [];
  let current = start;

  while (remaining.length > 0) {
    const from = current;
    const distances = remaining.map((demand) => distanceKm(from, demand.location));
    const maxDistance = Math.max(...distances);

    let bestIndex = 0;
    let bestScore = -Infinity;
    remaining.forEach((demand, index) => {
      const score = blendedScore(demand.urgency, distances[index] ?? 0, maxDistance, weights);
      if (score > bestScore) {
        bestScore = score;
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

/** Trades urgency against normalised distance. Weights are used as given. */
export function blendedRoute(
  demands: readonly DemandPoint[],
  vehicle: Vehicle,
  urgencyWeight: number,
  distanceWeight: number,
): BlendedRoutePlan {
  const walk = walkRoute(vehicle.depot, weightedOrder(demands, vehicle.depot, { urgencyWeight, distanceWeight }));
  const { summary, sharedMetadata } = summarizeWalk(vehicle, walk);

  return {
    mode: 'blended',
    ...summary,
    metadata: {
      algorithm: 'weighted_scoring',
      urgency_weight: urgencyWeight,
      distance_weight: distanceWeight,
      ...sharedMetadata,
    },
  };
}
