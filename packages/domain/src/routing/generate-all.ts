import type { DemandPoint } from '../entities/demand-point.js';
import type { BlendedRoutePlan, DistanceRoutePlan, PriorityRoutePlan } from '../entities/route-plan.js';
import type { Vehicle } from '../entities/vehicle.js';
import { blendedRoute } from './blended.js';
import { distanceFocusedRoute } from './distance-focused.js';
import { priorityFocusedRoute } from './priority-focused.js';

export const DEFAULT_URGENCY_WEIGHT = 0.6;
export const DEFAULT_DISTANCE_WEIGHT = 0.4;

export type RoutePlanSet = readonly [DistanceRoutePlan, PriorityRoutePlan, BlendedRoutePlan];

/** One plan per mode, always in the order distance, priority, blended. */
export function generateAllRoutes(
  demands: readonly DemandPoint[],
  vehicle: Vehicle,
  urgencyWeight: number = DEFAULT_URGENCY_WEIGHT,
  distanceWeight: number = DEFAULT_DISTANCE_WEIGHT,
): RoutePlanSet {
  return [
    distanceFocusedRoute(demands, vehicle),
    priorityFocusedRoute(demands, vehicle),
    blendedRoute(demands, vehicle, urgencyWeight, distanceWeight),
  ];
}
