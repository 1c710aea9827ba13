import type { DemandPoint } from '../entities/demand-point.js';
import { URGENT_THRESHOLD } from '../entities/demand-point.js';
import type { Location } from '../entities/location.js';
import type { Stop } from '../entities/route-plan.js';
import type { Vehicle } from '../entities/vehicle.js';
import { distanceKm } from './geo-distance.js';

export const AVERAGE_SPEED_KMH = 40;
export const SERVICE_MINUTES_PER_STOP = 10;

/** Rounds to a fixed number of decimals; an exact half goes to the even neighbour. */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;
  if (fraction > 0.5) return (floor + 1) / factor;
  if (fraction < 0.5) return floor / factor;
  return (floor % 2 === 0 ? floor : floor + 1) / factor;
}

export function estimateMinutes(totalKm: number, stopCount: number): number {
  return (totalKm / AVERAGE_SPEED_KMH) * 60 + stopCount * SERVICE_MINUTES_PER_STOP;
}

export function toStop(demand: DemandPoint, legKm: number): Stop {
  return {
    lat: demand.location.lat,
    lon: demand.location.lon,
    node_id: demand.nodeId,
    resource_type: demand.resourceType,
    quantity: demand.quantity,
    urgency: demand.urgency,
    distance_from_prev_km: roundTo(legKm, 2),
  };
}

/** Measured depot → stops → depot tour. Distances are unrounded. */
export interface RouteWalk {
  readonly stops: Stop[];
  readonly totalKm: number;
  /** null when there is nothing to return from */
  readonly returnKm: number | null;
  readonly urgentCount: number;
}

export function walkRoute(depot: Location, ordered: readonly DemandPoint[]): RouteWalk {
  const stops: Stop[] = [];
  let current = depot;
  let totalKm = 0;
  let urgentCount = 0;

  for (const demand of ordered) {
    const legKm = distanceKm(current, demand.location);
    totalKm += legKm;
    stops.push(toStop(demand, legKm));
    if (demand.urgency >= URGENT_THRESHOLD) urgentCount++;
    current = demand.location;
  }

  if (stops.length === 0) {
    return { stops, totalKm: 0, returnKm: null, urgentCount: 0 };
  }

  const returnKm = distanceKm(current, depot);
  return { stops, totalKm: totalKm + returnKm, returnKm, urgentCount };
}

/** The mode-independent part of a plan, plus the metadata every mode shares. */
export function summarizeWalk(vehicle: Vehicle, walk: RouteWalk) {
  return {
    summary: {
      depot_lat: vehicle.depot.lat,
      depot_lon: vehicle.depot.lon,
      stops: walk.stops,
      total_distance_km: roundTo(walk.totalKm, 2),
      estimated_time_minutes: roundTo(estimateMinutes(walk.totalKm, walk.stops.length), 1),
      urgent_requests_served: walk.urgentCount,
    },
    sharedMetadata: {
      vehicle_capacity: vehicle.capacity,
      ...(walk.returnKm === null ? {} : { return_to_depot_km: roundTo(walk.returnKm, 2) }),
    },
  };
}
